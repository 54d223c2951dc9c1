/**
 * Sentiment Investor REST Client
 *
 * Authenticates every request with the developer token and key and shapes
 * the JSON envelopes returned by the v4 API.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { createLogger } from '../logger.js';
import { DEFAULT_API_URL, DEFAULT_TIMEOUT_MS } from '../config.js';
import { AuthenticationError, ConfigurationError, SentimentApiError } from '../errors.js';
import {
  flattenResult,
  isJsonObject,
  toHistoricalSeries,
  toResponse,
  toSupported,
  toSymbolSet,
  toTickerList,
} from './responses.js';
import type {
  AccountInfo,
  ClientConfig,
  HistoricalSeries,
  JsonObject,
  JsonValue,
  ParsedData,
  QueryParams,
  QuoteData,
  RawData,
  TickerData,
} from '../types/index.js';

const logger = createLogger('sentiment-client');

const AUTH_FAILURE_BODIES = new Set(['invalid_parameter', 'incorrect_key']);

export interface SentimentClientOptions extends Partial<Omit<ClientConfig, 'token' | 'key'>> {
  token: string;
  key: string;
  /** Replaces the HTTP transport */
  adapter?: AxiosAdapter;
}

function serializeParams(params: QueryParams): Record<string, string> {
  const serialized: Record<string, string> = {};
  for (const [name, value] of Object.entries(params)) {
    serialized[name] = String(value);
  }
  return serialized;
}

function parseBody(body: string): JsonValue | undefined {
  try {
    const parsed: JsonValue = JSON.parse(body);
    return parsed;
  } catch {
    return undefined;
  }
}

export class SentimentClient {
  private readonly config: ClientConfig;
  private readonly http: AxiosInstance;

  constructor(options: SentimentClientOptions) {
    if (!options.token.trim() || !options.key.trim()) {
      throw new ConfigurationError('Both a developer token and a developer key are required');
    }

    this.config = {
      token: options.token,
      key: options.key,
      baseUrl: options.baseUrl ?? DEFAULT_API_URL,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    };

    this.http = axios.create({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeoutMs,
      headers: {
        'Accept': 'application/json',
      },
      adapter: options.adapter,
    });
  }

  /**
   * The token and key this client authenticates with
   */
  get apiCredentials(): readonly [token: string, key: string] {
    return [this.config.token, this.config.key];
  }

  /**
   * GET an endpoint with the credentials attached and return its JSON body
   */
  async request(endpoint: string, params: QueryParams = {}): Promise<JsonObject> {
    const query = serializeParams({ ...params, token: this.config.token, key: this.config.key });

    logger.debug({ endpoint, params: Object.keys(params) }, 'Requesting endpoint');

    let status: number;
    let body: string;

    try {
      const response = await this.http.get<string>(endpoint, {
        params: query,
        responseType: 'text',
        transformResponse: (data: string) => data,
        validateStatus: () => true,
      });
      status = response.status;
      body = String(response.data);
    } catch (error) {
      logger.error({ error, endpoint }, 'Request failed');
      throw error;
    }

    if (AUTH_FAILURE_BODIES.has(body)) {
      throw new AuthenticationError('Incorrect key or token', { endpoint, status });
    }

    const payload = parseBody(body);
    if (payload === undefined) {
      throw new SentimentApiError(body, status);
    }

    if (status < 400) {
      if (!isJsonObject(payload)) {
        throw new SentimentApiError(`Unexpected response from ${endpoint}`, status, payload);
      }
      return payload;
    }

    const reported = isJsonObject(payload) ? payload.message : undefined;
    const message = typeof reported === 'string'
      ? reported
      : `Request to ${endpoint} failed with status ${status}`;

    logger.warn({ endpoint, status, message }, 'API returned an error');
    throw new SentimentApiError(message, status, payload);
  }

  /**
   * The four core metrics for a stock: AHI, RHI, SGP and sentiment
   */
  async parsed(symbol: string): Promise<ParsedData> {
    return flattenResult(await this.request('parsed', { symbol }));
  }

  /**
   * Raw mention and sentiment counts for each monitored social platform
   */
  async raw(symbol: string): Promise<RawData> {
    return flattenResult(await this.request('raw', { symbol }));
  }

  /**
   * All realtime data about a stock. Enriched quotes add per-subreddit breakdowns.
   */
  async quote(symbol: string, enrich = false): Promise<QuoteData> {
    return flattenResult(await this.request('quote', { symbol, enrich }));
  }

  /**
   * Stocks ranked by a core metric
   * @param metric - Metric to rank by, e.g. AHI
   * @param limit - Maximum number of stocks to return
   */
  async sort(metric: string, limit: number): Promise<TickerData[]> {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ConfigurationError(`limit must be a positive integer, got ${limit}`);
    }
    return toTickerList(await this.request('sort', { metric, limit }), 'sort');
  }

  /**
   * Historical values of one metric for a stock
   * @param start - Unix timestamp in seconds
   * @param end - Unix timestamp in seconds
   */
  async historical(symbol: string, metric: string, start: number, end: number): Promise<HistoricalSeries> {
    if (start > end) {
      throw new ConfigurationError(`start (${start}) must not be after end (${end})`);
    }
    return toHistoricalSeries(await this.request('historical', { symbol, metric, start, end }));
  }

  /**
   * Quote data for several stocks in one request
   */
  async bulk(symbols: string[], enrich = false): Promise<TickerData[]> {
    if (symbols.length === 0) {
      throw new ConfigurationError('bulk requires at least one symbol');
    }
    return toTickerList(await this.request('bulk', { symbols: symbols.join(','), enrich }), 'bulk');
  }

  /**
   * Data for every stock. This request takes a long time to complete.
   */
  async all(enrich = false): Promise<TickerData[]> {
    return toTickerList(await this.request('all', { enrich }), 'all');
  }

  /**
   * Whether the service has data for a stock
   */
  async supported(symbol: string): Promise<boolean> {
    return toSupported(await this.request('supported', { symbol }));
  }

  /**
   * Every symbol the service gathers data for
   */
  async allStocks(): Promise<Set<string>> {
    return toSymbolSet(await this.request('all-stocks'));
  }

  async getAccountInfo(): Promise<AccountInfo> {
    return toResponse(await this.request('account'));
  }
}
