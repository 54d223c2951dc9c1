/**
 * REST Commands
 *
 * One command per Sentiment Investor endpoint.
 */

import type { Command } from 'commander';
import { getAccountTier, type SentimentClient } from '@sentiment-investor/client';
import {
  bold,
  cyan,
  dim,
  metricsTable,
  rankingTable,
  red,
  seriesTable,
  statusBadge,
  tickersTable,
} from '../utils/display.js';
import { normalizeSymbols, parsePositiveInt, parseTimestamp } from '../utils/parse.js';
import type { CLIContext, GlobalOptions } from '../utils/context.js';

interface EnrichOptions {
  enrich: boolean;
}

interface SortOptions {
  limit: number;
}

interface HistoricalOptions {
  start: number;
  end: number;
}

// ============================================
// Helpers
// ============================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function withClient(
  ctx: CLIContext,
  command: Command,
  fn: (client: SentimentClient, options: GlobalOptions) => Promise<void>
): Promise<void> {
  try {
    const options = command.optsWithGlobals<GlobalOptions>();
    await fn(ctx.createClient(options), options);
  } catch (error) {
    ctx.error(red(`Error: ${errorMessage(error)}`));
  }
}

function show(ctx: CLIContext, options: GlobalOptions, title: string, value: unknown, render: () => string): void {
  if (options.json) {
    ctx.print(JSON.stringify(value, null, 2));
    return;
  }
  ctx.print(bold(cyan(`═══ ${title} ═══`)));
  ctx.print(render());
}

function symbolArg(symbol: string): string {
  return symbol.trim().toUpperCase();
}

// ============================================
// Commands
// ============================================

export function registerRestCommands(program: Command, ctx: CLIContext): void {
  program
    .command('parsed')
    .description('Core metrics (AHI, RHI, SGP, sentiment) for a stock')
    .argument('<symbol>', 'stock ticker')
    .action(async (symbol: string, _options: object, command: Command) => {
      await withClient(ctx, command, async (client, options) => {
        const data = await client.parsed(symbolArg(symbol));
        show(ctx, options, `${symbolArg(symbol)} parsed`, data, () => metricsTable(data));
      });
    });

  program
    .command('raw')
    .description('Raw mentions and sentiment per social platform for a stock')
    .argument('<symbol>', 'stock ticker')
    .action(async (symbol: string, _options: object, command: Command) => {
      await withClient(ctx, command, async (client, options) => {
        const data = await client.raw(symbolArg(symbol));
        show(ctx, options, `${symbolArg(symbol)} raw`, data, () => metricsTable(data));
      });
    });

  program
    .command('quote')
    .description('All realtime data for a stock')
    .argument('<symbol>', 'stock ticker')
    .option('-e, --enrich', 'include per-subreddit breakdowns', false)
    .action(async (symbol: string, commandOptions: EnrichOptions, command: Command) => {
      await withClient(ctx, command, async (client, options) => {
        const data = await client.quote(symbolArg(symbol), commandOptions.enrich);
        show(ctx, options, `${symbolArg(symbol)} quote`, data, () => metricsTable(data));
      });
    });

  program
    .command('sort')
    .description('Stocks ranked by a metric')
    .argument('<metric>', 'metric to rank by, e.g. AHI, RHI, SGP or sentiment')
    .option('-l, --limit <n>', 'number of stocks to return', parsePositiveInt, 10)
    .action(async (metric: string, commandOptions: SortOptions, command: Command) => {
      await withClient(ctx, command, async (client, options) => {
        const rows = await client.sort(metric, commandOptions.limit);
        show(ctx, options, `Top ${commandOptions.limit} by ${metric}`, rows, () => rankingTable(rows, metric));
      });
    });

  program
    .command('historical')
    .description('Historical values of a metric for a stock')
    .argument('<symbol>', 'stock ticker')
    .argument('<metric>', 'metric to fetch')
    .requiredOption('-s, --start <time>', 'range start (epoch seconds or date)', parseTimestamp)
    .requiredOption('-e, --end <time>', 'range end (epoch seconds or date)', parseTimestamp)
    .action(async (symbol: string, metric: string, commandOptions: HistoricalOptions, command: Command) => {
      await withClient(ctx, command, async (client, options) => {
        const series = await client.historical(symbolArg(symbol), metric, commandOptions.start, commandOptions.end);
        show(
          ctx,
          options,
          `${symbolArg(symbol)} ${metric} history`,
          Object.fromEntries(series),
          () => seriesTable(series, metric)
        );
      });
    });

  program
    .command('bulk')
    .description('Quote data for several stocks')
    .argument('<symbols...>', 'stock tickers, space or comma separated')
    .option('-e, --enrich', 'include per-subreddit breakdowns', false)
    .action(async (symbols: string[], commandOptions: EnrichOptions, command: Command) => {
      await withClient(ctx, command, async (client, options) => {
        const rows = await client.bulk(normalizeSymbols(symbols), commandOptions.enrich);
        show(ctx, options, 'Bulk quotes', rows, () => tickersTable(rows));
      });
    });

  program
    .command('all')
    .description('Data for every stock (slow)')
    .option('-e, --enrich', 'include per-subreddit breakdowns', false)
    .action(async (commandOptions: EnrichOptions, command: Command) => {
      await withClient(ctx, command, async (client, options) => {
        const rows = await client.all(commandOptions.enrich);
        show(ctx, options, `All stocks (${rows.length})`, rows, () => tickersTable(rows));
      });
    });

  program
    .command('supported')
    .description('Check whether stocks have sentiment data')
    .argument('<symbols...>', 'stock tickers')
    .action(async (symbols: string[], _options: object, command: Command) => {
      await withClient(ctx, command, async (client, options) => {
        const results: Record<string, boolean> = {};
        for (const symbol of normalizeSymbols(symbols)) {
          results[symbol] = await client.supported(symbol);
        }
        show(ctx, options, 'Supported', results, () =>
          Object.entries(results)
            .map(([symbol, supported]) => `${symbol} ${statusBadge(supported ? 'SUPPORTED' : 'UNSUPPORTED')}`)
            .join('\n')
        );
      });
    });

  program
    .command('stocks')
    .description('List every stock with sentiment data')
    .action(async (_options: object, command: Command) => {
      await withClient(ctx, command, async (client, options) => {
        const symbols = [...(await client.allStocks())].sort();
        show(ctx, options, 'Stocks', symbols, () => `${symbols.join('\n')}\n${dim(`${symbols.length} stocks`)}`);
      });
    });

  program
    .command('account')
    .description('Show account information')
    .action(async (_options: object, command: Command) => {
      await withClient(ctx, command, async (client, options) => {
        const info = await client.getAccountInfo();
        const tier = getAccountTier(info);
        show(ctx, options, 'Account', info, () =>
          tier ? `${metricsTable(info)}\n${bold('Tier:')} ${tier}` : metricsTable(info)
        );
      });
    });
}
