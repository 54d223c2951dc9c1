/**
 * @sentiment-investor/client
 *
 * REST and websocket client for the Sentiment Investor API.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './config.js';
export * from './client/SentimentClient.js';
export { getMetric, getAccountTier, flattenResult } from './client/responses.js';
export * from './stream/SentimentStream.js';
export { createLogger } from './logger.js';
