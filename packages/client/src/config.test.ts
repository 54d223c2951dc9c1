import { describe, it, expect } from 'vitest';
import { loadConfig, DEFAULT_API_URL, DEFAULT_WS_URL } from './config.js';
import { ConfigurationError } from './errors.js';

describe('loadConfig', () => {
  const credentials = {
    API_SENTIMENTINVESTOR_TOKEN: 'test-token',
    API_SENTIMENTINVESTOR_KEY: 'test-key',
  };

  it('should read credentials and apply defaults', () => {
    expect(loadConfig(credentials)).toEqual({
      token: 'test-token',
      key: 'test-key',
      apiUrl: DEFAULT_API_URL,
      wsUrl: DEFAULT_WS_URL,
      timeoutMs: 30000,
    });
  });

  it('should read optional settings', () => {
    const config = loadConfig({
      ...credentials,
      SENTIMENT_API_URL: 'http://localhost:8080/v4/',
      SENTIMENT_WS_URL: 'ws://localhost:8081/',
      SENTIMENT_TIMEOUT_MS: '5000',
    });

    expect(config.apiUrl).toBe('http://localhost:8080/v4/');
    expect(config.wsUrl).toBe('ws://localhost:8081/');
    expect(config.timeoutMs).toBe(5000);
  });

  it('should name every missing credential', () => {
    expect(() => loadConfig({})).toThrow(
      'Missing credentials: API_SENTIMENTINVESTOR_TOKEN, API_SENTIMENTINVESTOR_KEY'
    );
  });

  it('should treat blank values as missing', () => {
    expect(() => loadConfig({ ...credentials, API_SENTIMENTINVESTOR_KEY: '  ' })).toThrow(
      'Missing credentials: API_SENTIMENTINVESTOR_KEY'
    );
  });

  it('should let overrides replace the environment', () => {
    const config = loadConfig({}, { token: 'cli-token', key: 'cli-key' });

    expect(config.token).toBe('cli-token');
    expect(config.key).toBe('cli-key');
  });

  it('should reject an invalid timeout', () => {
    expect(() => loadConfig({ ...credentials, SENTIMENT_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ ...credentials, SENTIMENT_TIMEOUT_MS: '-5' })).toThrow(
      'SENTIMENT_TIMEOUT_MS must be a positive integer, got -5'
    );
  });
});
