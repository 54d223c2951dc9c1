import { InvalidArgumentError } from 'commander';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Epoch seconds, or any date string Date.parse understands, as epoch seconds
 */
export function parseTimestamp(value: string): number {
  if (/^\d+(\.\d+)?$/.test(value)) {
    return Number(value);
  }

  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new InvalidArgumentError(`Not a timestamp or date: ${value}`);
  }
  return Math.floor(ms / 1000);
}

export function normalizeSymbols(symbols: string[]): string[] {
  return symbols
    .flatMap((symbol) => symbol.split(','))
    .map((symbol) => symbol.trim().toUpperCase())
    .filter((symbol) => symbol.length > 0);
}
