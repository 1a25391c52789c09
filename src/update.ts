/**
 * Update Operation
 * Layer: action
 *
 * Downloads price history for every tracked symbol, writes one CSV per
 * symbol and uploads it, then publishes the merged predicted/real QLD file.
 *
 * Required ports:
 *   - symbols.read
 *   - quotes.fetchDailyHistory
 *   - csv.validate
 *   - csv.merge
 *   - github.uploadFile
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import * as path from 'path';
import type { RepoTarget, SymbolResult, UpdateReport } from './types';
import { readSymbols } from './symbols';
import { fetchDailyHistory } from './quotes';
import { toCsv, validateAndFixCsv, mergeCsv } from './csv';
import { uploadFile } from './github';
import { dataFileName, getMergePaths, resolveInWorkDir } from './paths';
import { toIsoDate } from './utils';

export interface UpdateOptions {
  /** Absolute path of the symbols file */
  symbols_path: string;
  /** First day of history (YYYY-MM-DD) */
  start_date: string;
  /** Day after the last day of history (YYYY-MM-DD); defaults to today */
  end_date?: string;
  /** Upload target; null skips uploads */
  target: RepoTarget | null;
}

// -----------------------------------------------------------------------------
// Operation entry
// -----------------------------------------------------------------------------

/**
 * Runs the update over every symbol in the symbols file.
 * Per-symbol failures are recorded in the report and do not stop the run.
 *
 * @throws Error if the symbols file cannot be read
 */
export async function runUpdate(options: UpdateOptions): Promise<UpdateReport> {
  const startedAt = new Date().toISOString();
  const endDate = options.end_date ?? toIsoDate(new Date());
  const warnings: string[] = [];

  const readResult = readSymbols(options.symbols_path);
  if (!readResult.success) {
    throw new Error(readResult.error);
  }
  if (readResult.symbols.length === 0) {
    warnings.push(`No symbols listed in ${path.basename(options.symbols_path)}`);
  }

  const symbols: SymbolResult[] = [];
  for (const symbol of readResult.symbols) {
    const result = await updateSymbol(symbol, options, endDate);
    if (result.status === 'skipped' && result.file === null && result.error) {
      warnings.push(result.error);
    }
    symbols.push(result);
  }

  const merged = await updateMergedQld(options.target);
  if (merged === null) {
    const { predicted, real } = getMergePaths();
    const inputs = `${path.basename(predicted)} or ${path.basename(real)}`;
    core.info(`Cannot merge QLD data: ${inputs} missing.`);
  }

  return {
    started_at_ts: startedAt,
    finished_at_ts: new Date().toISOString(),
    dry_run: options.target === null,
    symbols,
    merged,
    warnings,
  };
}

/**
 * Lists the symbols (and merged file) that failed during an update.
 */
export function failedItems(report: UpdateReport): string[] {
  const failed = report.symbols.filter((r) => r.status === 'failed').map((r) => r.symbol);
  if (report.merged?.status === 'failed') {
    failed.push(report.merged.symbol);
  }
  return failed;
}

// -----------------------------------------------------------------------------
// Per-symbol update
// -----------------------------------------------------------------------------

async function updateSymbol(
  symbol: string,
  options: UpdateOptions,
  endDate: string,
): Promise<SymbolResult> {
  core.info(`Fetching data for symbol: ${symbol}`);

  const history = await fetchDailyHistory(symbol, options.start_date, endDate);
  if (!history.success) {
    core.warning(`Error processing ${symbol}: ${history.error}`);
    return { symbol, file: null, rows: 0, status: 'failed', error: history.error };
  }
  if (history.rows.length === 0) {
    const message = `No data fetched for symbol: ${symbol}`;
    core.warning(message);
    return { symbol, file: null, rows: 0, status: 'skipped', error: message };
  }

  const fileName = dataFileName(symbol);
  const message = `Update ${symbol} stock data`;
  return publishCsv(symbol, fileName, toCsv(history.rows), options.target, message);
}

// -----------------------------------------------------------------------------
// Merged QLD file
// -----------------------------------------------------------------------------

async function updateMergedQld(target: RepoTarget | null): Promise<SymbolResult | null> {
  const { predicted, real, merged } = getMergePaths();
  if (!fs.existsSync(predicted) || !fs.existsSync(real)) {
    return null;
  }

  const label = path.basename(merged);
  let csv: string;
  try {
    const result = mergeCsv(fs.readFileSync(predicted, 'utf-8'), fs.readFileSync(real, 'utf-8'), [
      path.basename(predicted),
      path.basename(real),
    ]);
    if (!result.success) {
      core.warning(`Cannot merge QLD data: ${result.error}`);
      return { symbol: label, file: null, rows: 0, status: 'failed', error: result.error };
    }
    csv = result.csv;
  } catch (err) {
    const error = err as Error;
    core.warning(`Cannot merge QLD data: ${error.message}`);
    return { symbol: label, file: null, rows: 0, status: 'failed', error: error.message };
  }

  core.info(`Merged ${path.basename(predicted)} + ${path.basename(real)} into ${label}`);
  return publishCsv(label, label, csv, target, 'Update merged QLD data');
}

// -----------------------------------------------------------------------------
// Shared write/validate/upload
// -----------------------------------------------------------------------------

async function publishCsv(
  name: string,
  fileName: string,
  csv: string,
  target: RepoTarget | null,
  message: string,
): Promise<SymbolResult> {
  const filePath = resolveInWorkDir(fileName);

  const validated = validateAndFixCsv(csv);
  if (!validated.success) {
    const error = `${validated.error} in ${fileName}`;
    core.warning(`Skipping upload for ${fileName}: ${validated.error}`);
    return { symbol: name, file: null, rows: 0, status: 'failed', error };
  }

  try {
    fs.writeFileSync(filePath, validated.csv, 'utf-8');
  } catch (err) {
    const error = err as Error;
    const detail = `Failed to write ${fileName}: ${error.message}`;
    core.warning(detail);
    return { symbol: name, file: null, rows: 0, status: 'failed', error: detail };
  }
  core.info(`CSV ${fileName} saved.`);

  const base = { symbol: name, file: fileName, rows: validated.rows };
  if (target === null) {
    core.info(`Dry run: not uploading ${fileName}`);
    return { ...base, status: 'skipped', error: null };
  }

  const upload = await uploadFile(target, fileName, validated.csv, message);
  if (!upload.success) {
    core.warning(upload.error);
    return { ...base, status: 'failed', error: upload.error };
  }

  core.info(`Successfully pushed ${fileName}`);
  return { ...base, status: upload.created ? 'created' : 'updated', error: null };
}
