/**
 * Sentiment Stream
 *
 * Websocket subscription to live stock updates. Authenticates on open,
 * relays every update and reconnects when the server drops the connection.
 */

import { createLogger } from '../logger.js';
import { EventEmitter } from 'eventemitter3';
import WebSocket from 'ws';
import { DEFAULT_WS_URL } from '../config.js';
import { AuthenticationError, ConfigurationError } from '../errors.js';
import { isJsonObject } from '../client/responses.js';
import type {
  JsonObject,
  JsonValue,
  StockUpdate,
  StreamAuthentication,
  StreamConfig,
  StreamState,
  StreamStatus,
} from '../types/index.js';

const logger = createLogger('sentiment-stream');

// ============================================
// Types
// ============================================

export interface SentimentStreamEvents {
  'status': (status: StreamStatus) => void;
  'authenticated': (authentication: StreamAuthentication) => void;
  'update': (update: StockUpdate) => void;
  'error': (error: Error) => void;
}

/**
 * The parts of a websocket the stream relies on
 */
export interface StreamSocket {
  readonly readyState: number;
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: WebSocket.RawData) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'pong', listener: () => void): unknown;
  send(data: string): void;
  ping(data: string): void;
  close(): void;
  terminate(): void;
}

export type SocketFactory = (url: string) => StreamSocket;

export interface SentimentStreamOptions extends Partial<Omit<StreamConfig, 'token' | 'key'>> {
  token: string;
  key: string;
  createSocket?: SocketFactory;
}

interface AuthenticationMessage {
  key: string;
  token: string;
  symbols?: string[];
}

// ============================================
// Default Configuration
// ============================================

const DEFAULT_CONFIG: Omit<StreamConfig, 'token' | 'key'> = {
  channel: 'stocks',
  symbols: [],
  wsUrl: DEFAULT_WS_URL,
  reconnectIntervalMs: 1000,
  maxReconnectAttempts: 10,
  heartbeatIntervalMs: 30000,
  pingTimeoutMs: 10000,
};

const PING_PAYLOAD = 'ping';

const defaultSocketFactory: SocketFactory = (url) => new WebSocket(url);

/**
 * UTC time as YYYY-MM-DD HH:mm:ss
 */
export function formatUtc(date: Date): string {
  if (Number.isNaN(date.getTime())) return 'unknown time';
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

// ============================================
// Sentiment Stream
// ============================================

export class SentimentStream extends EventEmitter<SentimentStreamEvents> {
  private config: StreamConfig;
  private state: StreamState;
  private ws: StreamSocket | null = null;
  private createSocket: SocketFactory;
  private reconnectTimeout: NodeJS.Timeout | null = null;
  private heartbeatInterval: NodeJS.Timeout | null = null;
  private pongTimeout: NodeJS.Timeout | null = null;
  private shouldReconnect = false;

  constructor(options: SentimentStreamOptions) {
    super();

    if (!options.token.trim() || !options.key.trim()) {
      throw new ConfigurationError('Both a developer token and a developer key are required');
    }

    this.config = {
      token: options.token,
      key: options.key,
      channel: options.channel ?? DEFAULT_CONFIG.channel,
      symbols: options.symbols ?? DEFAULT_CONFIG.symbols,
      wsUrl: options.wsUrl ?? DEFAULT_CONFIG.wsUrl,
      reconnectIntervalMs: options.reconnectIntervalMs ?? DEFAULT_CONFIG.reconnectIntervalMs,
      maxReconnectAttempts: options.maxReconnectAttempts ?? DEFAULT_CONFIG.maxReconnectAttempts,
      heartbeatIntervalMs: options.heartbeatIntervalMs ?? DEFAULT_CONFIG.heartbeatIntervalMs,
      pingTimeoutMs: options.pingTimeoutMs ?? DEFAULT_CONFIG.pingTimeoutMs,
    };
    this.createSocket = options.createSocket ?? defaultSocketFactory;
    this.state = {
      status: 'DISCONNECTED',
      connectedAt: null,
      lastMessageAt: null,
      reconnectAttempts: 0,
      authenticated: false,
      error: null,
    };
  }

  get url(): string {
    const base = this.config.wsUrl.endsWith('/') ? this.config.wsUrl : `${this.config.wsUrl}/`;
    return base + this.config.channel;
  }

  // ============================================
  // Connection Management
  // ============================================

  /**
   * Open the websocket. Resolves once the socket is open.
   */
  async connect(): Promise<void> {
    if (this.state.status === 'CONNECTED' || this.state.status === 'CONNECTING') {
      logger.warn('Already connected or connecting');
      return;
    }

    this.shouldReconnect = true;
    this.updateStatus('CONNECTING');

    return new Promise((resolve, reject) => {
      logger.info({ url: this.url }, 'Connecting to Sentiment Investor WebSocket');

      const ws = this.createSocket(this.url);
      this.ws = ws;
      let opened = false;

      ws.on('open', () => {
        opened = true;
        logger.info('WebSocket opened');

        this.state.connectedAt = new Date();
        this.state.reconnectAttempts = 0;
        this.state.error = null;
        this.updateStatus('CONNECTED');

        this.sendAuthentication();
        this.startHeartbeat();
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData) => {
        if (this.ws !== ws) return;
        try {
          this.handleMessage(data.toString());
        } catch (error) {
          logger.error({ error }, 'Failed to handle WebSocket message');
          this.emit('error', error instanceof Error ? error : new Error(String(error)));
        }
      });

      ws.on('pong', () => {
        if (this.ws !== ws) return;
        this.clearPongTimeout();
      });

      ws.on('error', (error: Error) => {
        logger.error({ error: error.message }, 'WebSocket error');

        if (!opened) {
          if (this.ws === ws) {
            this.state.error = error.message;
            this.updateStatus('ERROR');
          }
          reject(error);
          return;
        }

        if (this.ws !== ws) return;

        this.state.error = error.message;
        this.emit('error', error);
      });

      ws.on('close', (code: number, reason: Buffer) => {
        logger.warn({ code, reason: reason.toString() }, 'WebSocket closed');
        if (this.ws !== ws) return;

        this.ws = null;
        this.stopHeartbeat();
        this.state.authenticated = false;

        if (this.shouldReconnect) {
          this.scheduleReconnect();
        } else {
          this.updateStatus('DISCONNECTED');
        }
      });
    });
  }

  /**
   * Close the websocket without reconnecting
   */
  disconnect(): void {
    logger.info('Disconnecting from stream');

    this.shouldReconnect = false;
    this.clearReconnect();
    this.stopHeartbeat();
    this.closeSocket();
    this.state.authenticated = false;

    this.updateStatus('DISCONNECTED');
  }

  /**
   * Drop the current connection and open a new one
   */
  async reconnect(): Promise<void> {
    logger.info('Reconnecting to stream');

    this.clearReconnect();
    this.stopHeartbeat();
    this.closeSocket();
    this.state.authenticated = false;
    this.updateStatus('RECONNECTING');

    await this.connect();
  }

  private closeSocket(): void {
    if (this.ws) {
      const ws = this.ws;
      this.ws = null;
      ws.close();
    }
  }

  /**
   * Send the credentials (and symbols for the stocks channel)
   */
  private sendAuthentication(): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      return;
    }

    const message: AuthenticationMessage = {
      key: this.config.key,
      token: this.config.token,
    };

    if (this.config.channel === 'stocks') {
      message.symbols = [...this.config.symbols];
    }

    this.ws.send(JSON.stringify(message));
    logger.debug({ channel: this.config.channel, symbols: message.symbols }, 'Sent authentication');
  }

  // ============================================
  // Message Handling
  // ============================================

  private handleMessage(data: string): void {
    this.state.lastMessageAt = new Date();
    logger.debug({ data: data.substring(0, 200) }, 'WebSocket message');

    let message: JsonValue;
    try {
      message = JSON.parse(data);
    } catch (error) {
      logger.debug({ error, data: data.substring(0, 200) }, 'Failed to parse WebSocket message');
      return;
    }

    if (!isJsonObject(message)) {
      logger.debug({ data: data.substring(0, 200) }, 'Ignoring non-object WebSocket message');
      return;
    }

    if ('authState' in message) {
      this.handleAuthState(message);
      return;
    }

    this.emit('update', message);
  }

  private handleAuthState(message: JsonObject): void {
    if (!message.authState) {
      const error = new AuthenticationError('Not authenticated or invalid request', message);
      logger.error('WebSocket authentication failed');

      this.state.error = error.message;
      this.shouldReconnect = false;
      this.clearReconnect();
      this.stopHeartbeat();
      this.closeSocket();
      this.updateStatus('ERROR');
      this.emit('error', error);
      return;
    }

    const timestamp = message.timestamp;
    const sentAt = typeof timestamp === 'number' ? new Date(timestamp) : null;
    const authenticatedAt = sentAt && !Number.isNaN(sentAt.getTime()) ? sentAt : new Date();
    const symbols = message.subscribedTo;
    const subscribedTo = Array.isArray(symbols)
      ? symbols.filter((symbol): symbol is string => typeof symbol === 'string')
      : [];

    this.state.authenticated = true;

    logger.info(`WebSocket authentication successful as of ${formatUtc(authenticatedAt)}`);
    logger.info(`Subscribed to the following stocks: ${subscribedTo.join(', ')}`);

    this.emit('authenticated', { authenticatedAt, subscribedTo });
  }

  // ============================================
  // Heartbeat & Reconnect
  // ============================================

  private startHeartbeat(): void {
    this.stopHeartbeat();

    this.heartbeatInterval = setInterval(() => {
      const ws = this.ws;
      if (ws?.readyState !== WebSocket.OPEN) return;

      ws.ping(PING_PAYLOAD);
      if (!this.pongTimeout) {
        this.pongTimeout = setTimeout(() => {
          this.pongTimeout = null;
          if (this.ws !== ws) return;
          logger.warn({ timeoutMs: this.config.pingTimeoutMs }, 'No pong received, dropping connection');
          // the close event that follows schedules the reconnect
          ws.terminate();
        }, this.config.pingTimeoutMs);
      }
    }, this.config.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }
    this.clearPongTimeout();
  }

  private clearPongTimeout(): void {
    if (this.pongTimeout) {
      clearTimeout(this.pongTimeout);
      this.pongTimeout = null;
    }
  }

  private clearReconnect(): void {
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
  }

  /**
   * Schedule reconnection attempt
   */
  private scheduleReconnect(): void {
    if (this.state.reconnectAttempts >= this.config.maxReconnectAttempts) {
      logger.error('Max reconnect attempts reached');
      this.shouldReconnect = false;
      this.updateStatus('ERROR');
      this.emit('error', new Error(`Gave up reconnecting after ${this.state.reconnectAttempts} attempts`));
      return;
    }

    this.state.reconnectAttempts++;
    this.updateStatus('RECONNECTING');

    const delay = this.config.reconnectIntervalMs * Math.pow(1.5, this.state.reconnectAttempts - 1);

    logger.info({ attempt: this.state.reconnectAttempts, delayMs: delay }, 'Scheduling reconnect');

    this.reconnectTimeout = setTimeout(() => {
      this.reconnectTimeout = null;
      // a failed attempt closes its socket, which schedules the next one
      this.connect().catch((error: unknown) => {
        logger.warn({ error }, 'Reconnect attempt failed');
      });
    }, delay);
  }

  // ============================================
  // Data Access
  // ============================================

  getState(): StreamState {
    return { ...this.state };
  }

  isConnected(): boolean {
    return this.state.status === 'CONNECTED';
  }

  private updateStatus(status: StreamStatus): void {
    this.state.status = status;
    this.emit('status', status);
  }
}

export type StocksStreamOptions = Omit<SentimentStreamOptions, 'channel'>;

/**
 * Stream updates for specific stocks
 */
export function createStocksStream(options: StocksStreamOptions): SentimentStream {
  return new SentimentStream({ ...options, channel: 'stocks' });
}

/**
 * Stream updates for every available stock
 */
export function createAllStocksStream(options: Omit<StocksStreamOptions, 'symbols'>): SentimentStream {
  return new SentimentStream({ ...options, channel: 'all', symbols: [] });
}
