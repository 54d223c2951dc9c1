import { ConfigurationError } from './errors.js';

export const DEFAULT_API_URL = 'https://api.sentimentinvestor.com/v4/';
export const DEFAULT_WS_URL = 'ws://socket.sentimentinvestor.com/';
export const DEFAULT_TIMEOUT_MS = 30000;

export const TOKEN_ENV = 'API_SENTIMENTINVESTOR_TOKEN';
export const KEY_ENV = 'API_SENTIMENTINVESTOR_KEY';

export interface SentimentConfig {
  token: string;
  key: string;
  apiUrl: string;
  wsUrl: string;
  timeoutMs: number;
}

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Load client configuration from environment variables.
 * Throws ConfigurationError when the developer token or key is missing.
 */
export function loadConfig(env: Env = process.env, overrides: Partial<SentimentConfig> = {}): SentimentConfig {
  const token = overrides.token ?? readEnv(env, TOKEN_ENV);
  const key = overrides.key ?? readEnv(env, KEY_ENV);

  const missing: string[] = [];
  if (!token) missing.push(TOKEN_ENV);
  if (!key) missing.push(KEY_ENV);

  if (!token || !key) {
    throw new ConfigurationError(`Missing credentials: ${missing.join(', ')}`, { missing });
  }

  const rawTimeout = readEnv(env, 'SENTIMENT_TIMEOUT_MS');
  const timeoutMs = overrides.timeoutMs ?? (rawTimeout ? Number(rawTimeout) : DEFAULT_TIMEOUT_MS);

  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`SENTIMENT_TIMEOUT_MS must be a positive integer, got ${rawTimeout ?? timeoutMs}`);
  }

  return {
    token,
    key,
    apiUrl: overrides.apiUrl ?? readEnv(env, 'SENTIMENT_API_URL') ?? DEFAULT_API_URL,
    wsUrl: overrides.wsUrl ?? readEnv(env, 'SENTIMENT_WS_URL') ?? DEFAULT_WS_URL,
    timeoutMs,
  };
}
