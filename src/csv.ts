/**
 * Price CSV
 * Layer: core
 *
 * Provided ports:
 *   - csv.format
 *   - csv.validate
 *   - csv.merge
 *
 * Reads and writes the Date,Open,High,Low,Close,Adj Close,Volume layout.
 * Dates are dd/mm/yyyy. Values never contain commas or quotes, so cells
 * are split on ',' without quoting rules.
 */

import type { PriceRow } from './types';
import { CSV_COLUMNS } from './types';

const DATE_PATTERN = /^\d{2}\/\d{2}\/\d{4}/;

// -----------------------------------------------------------------------------
// Port: csv.format
// -----------------------------------------------------------------------------

/**
 * Formats epoch seconds as dd/mm/yyyy (UTC).
 */
export function formatDate(epochSeconds: number): string {
  const date = new Date(epochSeconds * 1000);
  const dd = String(date.getUTCDate()).padStart(2, '0');
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${dd}/${mm}/${date.getUTCFullYear()}`;
}

export function toCsv(rows: PriceRow[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(
      [
        formatDate(row.timestamp),
        row.open,
        row.high,
        row.low,
        row.close,
        row.adjClose,
        row.volume,
      ].join(','),
    );
  }
  return lines.join('\n') + '\n';
}

export function parseCsv(text: string): string[][] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line) => (line === '' ? [] : line.split(',')));
}

function serialize(rows: string[][]): string {
  return rows.map((row) => row.join(',')).join('\n') + '\n';
}

// -----------------------------------------------------------------------------
// Port: csv.validate
// -----------------------------------------------------------------------------

export type ValidateCsvOutcome =
  | { success: true; csv: string; rows: number }
  | { success: false; error: string };

function isHeader(row: string[]): boolean {
  return (
    row.length === CSV_COLUMNS.length && row.every((cell, i) => cell.trim() === CSV_COLUMNS[i])
  );
}

/**
 * Locates the header and keeps it plus the contiguous run of valid data
 * rows after it. Anything from the first malformed row on is dropped.
 */
export function validateAndFixCsv(text: string): ValidateCsvOutcome {
  const rows = parseCsv(text);
  const headerIndex = rows.findIndex(isHeader);
  if (headerIndex === -1) {
    return { success: false, error: 'Header not found' };
  }

  const valid: string[][] = [[...CSV_COLUMNS]];
  for (const row of rows.slice(headerIndex + 1)) {
    const first = row[0];
    if (first === undefined || !DATE_PATTERN.test(first) || row.length !== CSV_COLUMNS.length) {
      break;
    }
    valid.push(row);
  }

  if (valid.length < 2) {
    return { success: false, error: 'No valid data rows' };
  }

  return { success: true, csv: serialize(valid), rows: valid.length - 1 };
}

// -----------------------------------------------------------------------------
// Port: csv.merge
// -----------------------------------------------------------------------------

export type MergeCsvOutcome = { success: true; csv: string } | { success: false; error: string };

/**
 * Projects the canonical columns out of a CSV by header name.
 */
function project(text: string, label: string): string[][] | string {
  const [header, ...body] = parseCsv(text);
  if (!header) {
    return `${label} is empty`;
  }
  const names = header.map((cell) => cell.trim());
  const indices = CSV_COLUMNS.map((column) => names.indexOf(column));
  const missing = CSV_COLUMNS.filter((_, i) => indices[i] === -1);
  if (missing.length > 0) {
    return `${label} is missing column(s): ${missing.join(', ')}`;
  }
  return body
    .filter((row) => row.length > 0)
    .map((row) => indices.map((index) => (row[index] ?? '').trim()));
}

/**
 * Concatenates the rows of two price CSVs under one canonical header.
 */
export function mergeCsv(
  first: string,
  second: string,
  labels: [string, string] = ['first', 'second'],
): MergeCsvOutcome {
  const a = project(first, labels[0]);
  if (typeof a === 'string') return { success: false, error: a };
  const b = project(second, labels[1]);
  if (typeof b === 'string') return { success: false, error: b };

  return { success: true, csv: serialize([[...CSV_COLUMNS], ...a, ...b]) };
}
