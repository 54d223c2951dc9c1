import { Command } from 'commander';
import { registerRestCommands } from './commands/rest.js';
import { registerStreamCommand } from './commands/stream.js';
import { TOKEN_ENV, KEY_ENV } from '@sentiment-investor/client';
import type { CLIContext } from './utils/context.js';

export function buildProgram(ctx: CLIContext): Command {
  const program = new Command();

  program
    .name('sentiment')
    .description('Stock sentiment data from sentimentinvestor.com')
    .version('1.0.0')
    .option('--token <token>', `developer token (defaults to $${TOKEN_ENV})`)
    .option('--key <key>', `developer key (defaults to $${KEY_ENV})`)
    .option('--json', 'print raw JSON instead of tables', false);

  registerRestCommands(program, ctx);
  registerStreamCommand(program, ctx);

  return program;
}
