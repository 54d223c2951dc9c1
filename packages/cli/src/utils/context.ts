/**
 * CLI Context
 *
 * Builds clients and streams from the environment and routes output.
 */

import {
  SentimentClient,
  type SentimentStream,
  createAllStocksStream,
  createLogger,
  createStocksStream,
  loadConfig,
} from '@sentiment-investor/client';

const logger = createLogger('sentiment-cli');

export type GlobalOptions = {
  token?: string;
  key?: string;
  json?: boolean;
};

export interface StreamSelection {
  symbols: string[];
  all: boolean;
}

export interface CLIContext {
  createClient(options: GlobalOptions): SentimentClient;
  createStream(options: GlobalOptions, selection: StreamSelection): SentimentStream;
  print(text: string): void;
  error(text: string): void;
  /** Registers a Ctrl+C handler and returns a function that removes it */
  onInterrupt(handler: () => void): () => void;
}

export function createDefaultContext(env: Record<string, string | undefined> = process.env): CLIContext {
  const configFor = (options: GlobalOptions) => {
    const config = loadConfig(env, { token: options.token, key: options.key });
    logger.debug({ apiUrl: config.apiUrl, wsUrl: config.wsUrl }, 'Loaded configuration');
    return config;
  };

  return {
    createClient(options) {
      const config = configFor(options);
      return new SentimentClient({
        token: config.token,
        key: config.key,
        baseUrl: config.apiUrl,
        timeoutMs: config.timeoutMs,
      });
    },

    createStream(options, selection) {
      const config = configFor(options);
      const streamOptions = { token: config.token, key: config.key, wsUrl: config.wsUrl };
      return selection.all
        ? createAllStocksStream(streamOptions)
        : createStocksStream({ ...streamOptions, symbols: selection.symbols });
    },

    print(text) {
      console.log(text);
    },

    error(text) {
      console.error(text);
      process.exitCode = 1;
    },

    onInterrupt(handler) {
      process.once('SIGINT', handler);
      return () => {
        process.off('SIGINT', handler);
      };
    },
  };
}
