/**
 * Stream Command
 *
 * Prints live updates until interrupted.
 */

import type { Command } from 'commander';
import type { SentimentStream } from '@sentiment-investor/client';
import { dim, formatUpdate, green, red, statusBadge } from '../utils/display.js';
import { normalizeSymbols } from '../utils/parse.js';
import { errorMessage } from './rest.js';
import type { CLIContext, GlobalOptions } from '../utils/context.js';

interface StreamOptions {
  all: boolean;
}

/**
 * Resolves when the stream is disconnected, rejects when it gives up
 */
export function followStream(ctx: CLIContext, stream: SentimentStream, options: GlobalOptions): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const removeInterrupt = ctx.onInterrupt(() => {
      ctx.print(dim('Closing stream...'));
      stream.disconnect();
    });

    stream.on('status', (status) => {
      if (!options.json) {
        ctx.print(statusBadge(status));
      }
      if (status === 'DISCONNECTED') {
        removeInterrupt();
        resolve();
      }
    });

    stream.on('authenticated', ({ subscribedTo }) => {
      if (!options.json) {
        ctx.print(green(`Subscribed to: ${subscribedTo.length > 0 ? subscribedTo.join(', ') : 'all stocks'}`));
      }
    });

    stream.on('update', (update) => {
      ctx.print(options.json ? JSON.stringify(update) : formatUpdate(update));
    });

    stream.on('error', (error) => {
      if (stream.getState().status === 'ERROR') {
        removeInterrupt();
        reject(error);
        return;
      }
      ctx.error(red(`Stream error: ${error.message}`));
    });

    stream.connect().catch((error: unknown) => {
      removeInterrupt();
      reject(error);
      stream.disconnect();
    });
  });
}

export function registerStreamCommand(program: Command, ctx: CLIContext): void {
  program
    .command('stream')
    .description('Stream live updates for stocks (Ctrl+C to stop)')
    .argument('[symbols...]', 'stock tickers to follow')
    .option('-a, --all', 'follow every stock', false)
    .action(async (symbols: string[], commandOptions: StreamOptions, command: Command) => {
      try {
        const options = command.optsWithGlobals<GlobalOptions>();
        const selected = normalizeSymbols(symbols);

        if (!commandOptions.all && selected.length === 0) {
          ctx.error(red('Error: give at least one symbol or --all'));
          return;
        }

        const stream = ctx.createStream(options, { symbols: selected, all: commandOptions.all });
        await followStream(ctx, stream, options);
      } catch (error) {
        ctx.error(red(`Error: ${errorMessage(error)}`));
      }
    });
}
