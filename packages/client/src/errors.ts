import type { JsonValue } from './types/index.js';

export class SentimentError extends Error {
  constructor(message: string, public readonly code = 'SENTIMENT_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'SentimentError';
  }
}

export class AuthenticationError extends SentimentError {
  constructor(message = 'Incorrect key or token', details?: unknown) {
    super(message, 'AUTHENTICATION_ERROR', details);
    this.name = 'AuthenticationError';
  }
}

export class ConfigurationError extends SentimentError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class SentimentApiError extends SentimentError {
  constructor(message: string, public readonly status: number | null = null, public readonly body?: JsonValue) {
    super(message, 'API_ERROR', { status, body });
    this.name = 'SentimentApiError';
  }
}
