import { SentimentApiError } from '../errors.js';
import { AccountTier } from '../types/index.js';
import type {
  AccountInfo,
  AccountTierName,
  HistoricalSeries,
  JsonObject,
  JsonValue,
  TickerData,
} from '../types/index.js';

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy of a response without its `results` envelope
 */
export function toResponse(json: JsonObject): JsonObject {
  const { results: _results, ...fields } = json;
  return fields;
}

/**
 * Top-level fields merged with the fields of the `results` object.
 * Fields inside `results` win on collision.
 */
export function flattenResult(json: JsonObject): TickerData {
  const results = json.results;
  return isJsonObject(results) ? { ...toResponse(json), ...results } : toResponse(json);
}

function requireResultsArray(json: JsonObject, endpoint: string): JsonValue[] {
  const results = json.results;
  if (!Array.isArray(results)) {
    throw new SentimentApiError(`Response from ${endpoint} is missing a results list`, null, json);
  }
  return results;
}

export function toTickerList(json: JsonObject, endpoint: string): TickerData[] {
  return requireResultsArray(json, endpoint).filter(isJsonObject).map(toResponse);
}

/**
 * Map `results[].timestamp` to `results[].data`; points without numeric
 * values are dropped and later duplicates overwrite earlier ones.
 */
export function toHistoricalSeries(json: JsonObject): HistoricalSeries {
  const series: HistoricalSeries = new Map();

  for (const point of requireResultsArray(json, 'historical')) {
    if (!isJsonObject(point)) continue;
    const { timestamp, data } = point;
    if (typeof timestamp === 'number' && typeof data === 'number') {
      series.set(timestamp, data);
    }
  }

  return series;
}

export function toSupported(json: JsonObject): boolean {
  const results = json.results;
  if (typeof results !== 'boolean') {
    throw new SentimentApiError('Response from supported did not contain a boolean result', null, json);
  }
  return results;
}

export function toSymbolSet(json: JsonObject): Set<string> {
  const symbols = new Set<string>();
  for (const entry of requireResultsArray(json, 'all-stocks')) {
    if (typeof entry === 'string') {
      symbols.add(entry);
    }
  }
  return symbols;
}

/**
 * Numeric metric of a ticker, or undefined when absent or not a number
 */
export function getMetric(data: TickerData, name: string): number | undefined {
  const value = data[name];
  return typeof value === 'number' ? value : undefined;
}

const TIER_NAMES: AccountTierName[] = ['SANDBOX', 'STARTER', 'PREMIUM', 'ENTERPRISE'];

export function getAccountTier(info: AccountInfo): AccountTierName | undefined {
  const tier = info.tier;
  if (typeof tier !== 'number') return undefined;

  return TIER_NAMES.find((name) => AccountTier[name] === tier);
}
