/**
 * Price History Client
 * Layer: infra
 *
 * Provided ports:
 *   - quotes.fetchDailyHistory
 *
 * Fetches daily OHLCV history from the Yahoo Finance chart endpoint.
 */

import type { PriceRow } from './types';
import { FETCH_TIMEOUT_MS } from './types';
import { isARealObject } from './utils';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

const CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';
const USER_AGENT = 'stock-data-sync';

// -----------------------------------------------------------------------------
// Port: quotes.fetchDailyHistory
// -----------------------------------------------------------------------------

export interface FetchHistoryResult {
  success: true;
  rows: PriceRow[];
}

export interface FetchHistoryError {
  success: false;
  error: string;
}

export type FetchHistoryOutcome = FetchHistoryResult | FetchHistoryError;

/**
 * Builds the chart URL for a symbol between two YYYY-MM-DD dates
 * (start inclusive, end exclusive).
 */
export function buildChartUrl(symbol: string, startDate: string, endDate: string): string {
  const params = new URLSearchParams({
    period1: String(toEpochSeconds(startDate)),
    period2: String(toEpochSeconds(endDate)),
    interval: '1d',
    events: 'history',
  });
  return `${CHART_URL}/${encodeURIComponent(symbol)}?${params.toString()}`;
}

/**
 * Fetches daily price history for a symbol.
 */
export async function fetchDailyHistory(
  symbol: string,
  startDate: string,
  endDate: string,
): Promise<FetchHistoryOutcome> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);

  try {
    const response = await fetch(buildChartUrl(symbol, startDate, endDate), {
      signal: controller.signal,
      method: 'GET',
      headers: {
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      },
    });

    clearTimeout(timeoutId);

    if (!response.ok) {
      const statusText = response.statusText || 'Unknown error';
      return { success: false, error: `HTTP ${response.status}: ${statusText}` };
    }

    const raw: unknown = await response.json();
    const rows = parseChartResponse(raw);
    if (!rows) {
      return { success: false, error: 'Failed to parse chart response' };
    }

    return { success: true, rows };
  } catch (err) {
    clearTimeout(timeoutId);

    const error = err as Error;
    if (error.name === 'AbortError') {
      return {
        success: false,
        error: `Request timeout: price history did not respond within ${FETCH_TIMEOUT_MS}ms`,
      };
    }

    return { success: false, error: `Network error: ${error.message}` };
  }
}

// -----------------------------------------------------------------------------
// Parsing
// -----------------------------------------------------------------------------

function toEpochSeconds(isoDate: string): number {
  return Math.floor(Date.parse(`${isoDate}T00:00:00Z`) / 1000);
}

function numberSeries(value: unknown): Array<number | null> | null {
  if (!Array.isArray(value)) return null;
  return value.map((v: unknown) => (typeof v === 'number' && Number.isFinite(v) ? v : null));
}

function firstObject(value: unknown): Record<string, unknown> | null {
  if (!Array.isArray(value)) return null;
  const first: unknown = value[0];
  return isARealObject(first) ? first : null;
}

/**
 * Parses a raw chart payload into price rows.
 * Days missing any of open/high/low/close are skipped; a missing adjusted
 * close falls back to close and a missing volume to 0. Timestamps are
 * shifted by the exchange's `meta.gmtoffset` so they fall on the local
 * trading day. Returns null if the payload does not have the chart shape.
 */
export function parseChartResponse(raw: unknown): PriceRow[] | null {
  const chart = isARealObject(raw) ? raw['chart'] : undefined;
  if (!isARealObject(chart)) {
    return null;
  }
  const result = firstObject(chart['result']);
  if (!result) {
    return null;
  }

  // A symbol with no trading days in range has no timestamp array
  const timestamps = numberSeries(result['timestamp']);
  if (!timestamps) {
    return [];
  }

  const meta = result['meta'];
  const gmtoffset = isARealObject(meta) ? meta['gmtoffset'] : undefined;
  const offset = typeof gmtoffset === 'number' && Number.isFinite(gmtoffset) ? gmtoffset : 0;

  const indicators = result['indicators'];
  if (!isARealObject(indicators)) {
    return null;
  }
  const quote = firstObject(indicators['quote']);
  if (!quote) {
    return null;
  }

  const open = numberSeries(quote['open']) ?? [];
  const high = numberSeries(quote['high']) ?? [];
  const low = numberSeries(quote['low']) ?? [];
  const close = numberSeries(quote['close']) ?? [];
  const volume = numberSeries(quote['volume']) ?? [];
  const adj = firstObject(indicators['adjclose']);
  const adjClose = (adj && numberSeries(adj['adjclose'])) ?? [];

  const rows: PriceRow[] = [];
  timestamps.forEach((timestamp, i) => {
    const o = open[i];
    const h = high[i];
    const l = low[i];
    const c = close[i];
    if (timestamp === null || o == null || h == null || l == null || c == null) {
      return;
    }
    rows.push({
      timestamp: timestamp + offset,
      open: o,
      high: h,
      low: l,
      close: c,
      adjClose: adjClose[i] ?? c,
      volume: volume[i] ?? 0,
    });
  });

  return rows;
}
