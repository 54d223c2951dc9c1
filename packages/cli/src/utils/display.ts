/**
 * CLI Display Utilities
 *
 * Formatting and table helpers for sentiment data.
 */

import Table from 'cli-table3';
import { formatUtc, getMetric } from '@sentiment-investor/client';
import type { HistoricalSeries, JsonValue, StockUpdate, TickerData } from '@sentiment-investor/client';

// ============================================
// Color Helpers (ANSI codes for compatibility)
// ============================================

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

export function red(text: string): string {
  return `${colors.red}${text}${colors.reset}`;
}

export function green(text: string): string {
  return `${colors.green}${text}${colors.reset}`;
}

export function yellow(text: string): string {
  return `${colors.yellow}${text}${colors.reset}`;
}

export function cyan(text: string): string {
  return `${colors.cyan}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return `${colors.bright}${text}${colors.reset}`;
}

export function dim(text: string): string {
  return `${colors.dim}${text}${colors.reset}`;
}

export function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

// ============================================
// Formatting Helpers
// ============================================

/**
 * Integers as-is, other numbers to at most four decimals, objects as JSON
 */
export function formatValue(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return '-';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value.toString() : parseFloat(value.toFixed(4)).toString();
  }
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'yes' : 'no';
  return JSON.stringify(value);
}

export function formatSentiment(value: number | undefined): string {
  if (value === undefined) return '-';
  const text = formatValue(value);
  if (value >= 0.6) return green(text);
  if (value <= 0.4) return red(text);
  return yellow(text);
}

/**
 * One line per stream update: symbol followed by its metrics
 */
export function formatUpdate(update: StockUpdate): string {
  const { symbol, ...metrics } = update;
  const fields = Object.keys(metrics)
    .sort()
    .map((name) => `${name}=${formatValue(metrics[name])}`);
  return [bold(formatValue(symbol)), ...fields].join(' ');
}

export function statusBadge(status: string): string {
  switch (status.toUpperCase()) {
    case 'CONNECTED':
    case 'SUPPORTED':
      return green(`[${status}]`);
    case 'DISCONNECTED':
    case 'ERROR':
    case 'UNSUPPORTED':
      return red(`[${status}]`);
    case 'CONNECTING':
    case 'RECONNECTING':
      return yellow(`[${status}]`);
    default:
      return `[${status}]`;
  }
}

// ============================================
// Table Helpers
// ============================================

function createTable(headers: string[]) {
  return new Table({
    head: headers.map(h => cyan(h)),
    style: { head: [], border: [] },
    chars: {
      'top': '─', 'top-mid': '┬', 'top-left': '┌', 'top-right': '┐',
      'bottom': '─', 'bottom-mid': '┴', 'bottom-left': '└', 'bottom-right': '┘',
      'left': '│', 'left-mid': '├', 'mid': '─', 'mid-mid': '┼',
      'right': '│', 'right-mid': '┤', 'middle': '│',
    },
  });
}

/**
 * Metric/value table for one ticker, metrics sorted by name
 */
export function metricsTable(data: TickerData): string {
  const table = createTable(['Metric', 'Value']);
  for (const name of Object.keys(data).sort()) {
    table.push([name, formatValue(data[name])]);
  }
  return table.toString();
}

export function rankingTable(rows: TickerData[], metric: string): string {
  const table = createTable(['Rank', 'Symbol', metric, 'Sentiment']);
  rows.forEach((row, index) => {
    const rank = getMetric(row, 'rank') ?? index;
    table.push([
      (rank + 1).toString(),
      formatValue(row.symbol),
      formatValue(row[metric]),
      formatSentiment(getMetric(row, 'sentiment')),
    ]);
  });
  return table.toString();
}

export function tickersTable(rows: TickerData[]): string {
  const table = createTable(['Symbol', 'AHI', 'RHI', 'SGP', 'Sentiment']);
  for (const row of rows) {
    table.push([
      formatValue(row.symbol),
      formatValue(row.AHI),
      formatValue(row.RHI),
      formatValue(row.SGP),
      formatSentiment(getMetric(row, 'sentiment')),
    ]);
  }
  return table.toString();
}

export function seriesTable(series: HistoricalSeries, metric: string): string {
  const table = createTable(['Time (UTC)', metric]);
  const timestamps = [...series.keys()].sort((a, b) => a - b);
  for (const timestamp of timestamps) {
    table.push([formatUtc(new Date(timestamp * 1000)), formatValue(series.get(timestamp))]);
  }
  return table.toString();
}
