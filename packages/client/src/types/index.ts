// Sentiment Investor API Types

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Flat set of metrics for one ticker.
 *
 * The service decides which metrics are present, e.g. `AHI`, `RHI`, `SGP`,
 * `sentiment`, `rank`, `reddit_comment_mentions` or (enriched) `subreddits`.
 */
export type TickerData = JsonObject;

export type ParsedData = TickerData;
export type RawData = TickerData;
export type QuoteData = TickerData;

export type AccountInfo = JsonObject;

/** Unix timestamp in seconds -> metric value */
export type HistoricalSeries = Map<number, number>;

export const AccountTier = {
  SANDBOX: 0,
  STARTER: 1,
  PREMIUM: 1.5,
  ENTERPRISE: 2,
} as const;

export type AccountTierName = keyof typeof AccountTier;

// Request Types

export type QueryValue = string | number | boolean;

export type QueryParams = Record<string, QueryValue>;

// Client Types

export interface ClientConfig {
  token: string;
  key: string;
  baseUrl: string;
  timeoutMs: number;
}

// Stream Types

export type StreamChannel = 'stocks' | 'all';

export type StreamStatus = 'DISCONNECTED' | 'CONNECTING' | 'CONNECTED' | 'RECONNECTING' | 'ERROR';

export type StockUpdate = JsonObject;

export interface StreamAuthentication {
  authenticatedAt: Date;
  subscribedTo: string[];
}

export interface StreamConfig {
  token: string;
  key: string;
  channel: StreamChannel;
  symbols: string[];
  wsUrl: string;
  reconnectIntervalMs: number;
  maxReconnectAttempts: number;
  heartbeatIntervalMs: number;
  /** How long to wait for a pong before treating the connection as dead */
  pingTimeoutMs: number;
}

export interface StreamState {
  status: StreamStatus;
  connectedAt: Date | null;
  lastMessageAt: Date | null;
  reconnectAttempts: number;
  authenticated: boolean;
  error: string | null;
}
