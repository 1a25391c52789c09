/**
 * Boundary types for stock-data-sync
 *
 * These types define the contracts between modules.
 */

// -----------------------------------------------------------------------------
// Invocation
// One run of the controller, as delivered by the workflow trigger
// -----------------------------------------------------------------------------

export type TriggerKind = 'scheduled' | 'manual';

export interface Invocation {
  /** Which trigger started this run */
  trigger_kind: TriggerKind;
  /** Symbol supplied with a manual trigger ('' when none) */
  optional_symbol: string;
  /** Opaque API token; undefined when the secret is not configured */
  credential: string | undefined;
}

// -----------------------------------------------------------------------------
// Operation
// The single downstream operation selected for an invocation
// -----------------------------------------------------------------------------

export type Operation = { kind: 'add'; symbol: string } | { kind: 'update' };

export interface OperationHandlers {
  add(symbol: string): Promise<void>;
  update(): Promise<void>;
}

export type DispatchPhase = 'checking_credential' | 'dispatching' | 'succeeded' | 'failed';

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export interface Config {
  /** Token for the GitHub contents API */
  token: string | undefined;
  /** Symbol input ('' when not supplied) */
  symbol: string;
  /** owner/name of the repository receiving the CSV files */
  repository: string | undefined;
  /** Branch the CSV files are committed to */
  branch: string;
  /** Symbols file, relative to the workspace */
  symbols_file: string;
  /** First day of price history to download (YYYY-MM-DD) */
  start_date: string;
  /** Write files locally but skip uploads */
  dry_run: boolean;
  trigger_kind: TriggerKind;
}

export interface RepoTarget {
  token: string;
  /** owner/name */
  repository: string;
  branch: string;
}

// -----------------------------------------------------------------------------
// PriceRow
// One trading day of price history
// -----------------------------------------------------------------------------

export interface PriceRow {
  /** Session open in epoch seconds, shifted to the exchange's UTC offset */
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  adjClose: number;
  volume: number;
}

// -----------------------------------------------------------------------------
// UpdateReport
// Per-run results of the update operation, rendered to the step summary
// -----------------------------------------------------------------------------

export type UploadStatus = 'created' | 'updated' | 'skipped' | 'failed';

export interface SymbolResult {
  symbol: string;
  /** Data file name, null if nothing was written */
  file: string | null;
  /** Data rows kept after validation */
  rows: number;
  status: UploadStatus;
  error: string | null;
}

export interface UpdateReport {
  started_at_ts: string;
  finished_at_ts: string;
  dry_run: boolean;
  symbols: SymbolResult[];
  /** Result for the merged QLD file, null when the merge inputs are missing */
  merged: SymbolResult | null;
  warnings: string[];
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const DEFAULT_SYMBOLS_FILE = 'symbols.csv';
export const DEFAULT_BRANCH = 'main';
export const DEFAULT_START_DATE = '2006-06-21';

export const DATA_FILE_SUFFIX = '_stock_data.csv';
export const PREDICTED_QLD_FILE = 'predictedQLD.csv';
export const REAL_QLD_FILE = 'qld_stock_data.csv';
export const MERGED_QLD_FILE = 'qld2_stock_data.csv';

export const CSV_COLUMNS = ['Date', 'Open', 'High', 'Low', 'Close', 'Adj Close', 'Volume'] as const;

/** Timeout for outbound fetch requests (milliseconds) */
export const FETCH_TIMEOUT_MS = 10000;
