#!/usr/bin/env -S node --import tsx

/**
 * Sentiment Investor CLI
 *
 * Usage:
 *   sentiment parsed AAPL
 *   sentiment sort AHI --limit 5
 *   sentiment historical AAPL RHI --start 2021-03-01 --end 2021-04-29
 *   sentiment stream AAPL TSLA
 */

import 'dotenv/config';
import { pino } from 'pino';
import { buildProgram } from './program.js';
import { createDefaultContext } from './utils/context.js';

const logger = pino({
  name: 'sentiment-cli',
  level: process.env.LOG_LEVEL || 'warn',
  transport: {
    target: 'pino-pretty',
    options: { colorize: true, destination: 2 },
  },
});

async function main(): Promise<void> {
  const program = buildProgram(createDefaultContext());
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  logger.error({ error }, 'Fatal error');
  process.exit(1);
});
