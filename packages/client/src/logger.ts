import { pino, destination, type Logger } from 'pino';

/**
 * Named logger writing to stderr, so stdout stays free for command output.
 * Level comes from LOG_LEVEL.
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: process.env.LOG_LEVEL || 'info' }, destination(2));
}
