import { describe, it, expect } from 'vitest';
import { formatDate, toCsv, parseCsv, validateAndFixCsv, mergeCsv } from '../src/csv';
import type { PriceRow } from '../src/types';

const HEADER = 'Date,Open,High,Low,Close,Adj Close,Volume';

function row(overrides: Partial<PriceRow> = {}): PriceRow {
  return {
    timestamp: Date.UTC(2026, 0, 5, 14, 30) / 1000,
    open: 10,
    high: 12.5,
    low: 9.75,
    close: 11,
    adjClose: 10.9,
    volume: 1500,
    ...overrides,
  };
}

describe('formatDate', () => {
  it('formats epoch seconds as dd/mm/yyyy in UTC', () => {
    expect(formatDate(Date.UTC(2026, 0, 5, 14, 30) / 1000)).toBe('05/01/2026');
    expect(formatDate(Date.UTC(2025, 11, 31, 23, 59) / 1000)).toBe('31/12/2025');
  });
});

describe('toCsv', () => {
  it('writes the header and one line per row', () => {
    const csv = toCsv([row(), row({ timestamp: Date.UTC(2026, 0, 6) / 1000, close: 11.5 })]);

    expect(csv).toBe(
      `${HEADER}\n05/01/2026,10,12.5,9.75,11,10.9,1500\n06/01/2026,10,12.5,9.75,11.5,10.9,1500\n`,
    );
  });

  it('writes only the header for no rows', () => {
    expect(toCsv([])).toBe(`${HEADER}\n`);
  });
});

describe('parseCsv', () => {
  it('splits lines and cells, ignoring the final newline', () => {
    expect(parseCsv('a,b\r\nc,d\n')).toEqual([
      ['a', 'b'],
      ['c', 'd'],
    ]);
  });

  it('keeps interior blank lines as empty rows', () => {
    expect(parseCsv('a\n\nb')).toEqual([['a'], [], ['b']]);
  });
});

describe('validateAndFixCsv', () => {
  it('keeps a well-formed file unchanged', () => {
    const text = `${HEADER}\n05/01/2026,1,2,0.5,1.5,1.5,100\n06/01/2026,1,2,0.5,1.5,1.5,200\n`;

    expect(validateAndFixCsv(text)).toEqual({ success: true, csv: text, rows: 2 });
  });

  it('drops lines before the header and normalises padded header cells', () => {
    const text =
      'Ticker,QLD\n Date , Open,High,Low,Close,Adj Close, Volume\n05/01/2026,1,2,0.5,1.5,1.5,100\n';

    expect(validateAndFixCsv(text)).toEqual({
      success: true,
      csv: `${HEADER}\n05/01/2026,1,2,0.5,1.5,1.5,100\n`,
      rows: 1,
    });
  });

  it('truncates at the first malformed row', () => {
    const text = [
      HEADER,
      '05/01/2026,1,2,0.5,1.5,1.5,100',
      '2026-01-06,1,2,0.5,1.5,1.5,100',
      '07/01/2026,1,2,0.5,1.5,1.5,100',
    ].join('\n');

    expect(validateAndFixCsv(text)).toEqual({
      success: true,
      csv: `${HEADER}\n05/01/2026,1,2,0.5,1.5,1.5,100\n`,
      rows: 1,
    });
  });

  it('stops at a row with the wrong number of cells', () => {
    const text = `${HEADER}\n05/01/2026,1,2,0.5,1.5,1.5,100\n06/01/2026,1,2\n`;

    const result = validateAndFixCsv(text);

    expect(result.success && result.rows).toBe(1);
  });

  it('stops at a blank line', () => {
    const text = `${HEADER}\n05/01/2026,1,2,0.5,1.5,1.5,100\n\n06/01/2026,1,2,0.5,1.5,1.5,100\n`;

    const result = validateAndFixCsv(text);

    expect(result.success && result.rows).toBe(1);
  });

  it('fails without a header', () => {
    expect(validateAndFixCsv('05/01/2026,1,2,0.5,1.5,1.5,100\n')).toEqual({
      success: false,
      error: 'Header not found',
    });
  });

  it('fails when no data row follows the header', () => {
    expect(validateAndFixCsv(`${HEADER}\nbad,row\n`)).toEqual({
      success: false,
      error: 'No valid data rows',
    });
  });
});

describe('mergeCsv', () => {
  it('appends the second file after the first under one header', () => {
    const predicted = `${HEADER}\n01/01/2000,1,1,1,1,1,0\n`;
    const real = `${HEADER}\n05/01/2026,2,2,2,2,2,10\n`;

    expect(mergeCsv(predicted, real)).toEqual({
      success: true,
      csv: `${HEADER}\n01/01/2000,1,1,1,1,1,0\n05/01/2026,2,2,2,2,2,10\n`,
    });
  });

  it('projects columns by name, dropping extras', () => {
    const predicted = 'Date,Volume,Close,Open,High,Low,Adj Close,Note\n01/01/2000,0,4,1,2,3,4,est\n';
    const real = `${HEADER}\n`;

    expect(mergeCsv(predicted, real)).toEqual({
      success: true,
      csv: `${HEADER}\n01/01/2000,1,2,3,4,4,0\n`,
    });
  });

  it('names the file that lacks a column', () => {
    const predicted = 'Date,Open,High,Low,Close,Volume\n01/01/2000,1,1,1,1,0\n';

    expect(mergeCsv(predicted, `${HEADER}\n`, ['predictedQLD.csv', 'qld_stock_data.csv'])).toEqual(
      { success: false, error: 'predictedQLD.csv is missing column(s): Adj Close' },
    );
  });

  it('fails on an empty file', () => {
    expect(mergeCsv(`${HEADER}\n`, '')).toEqual({ success: false, error: 'second is empty' });
  });
});
