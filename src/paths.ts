/**
 * Path Resolver
 * Layer: infra
 *
 * Provided ports:
 *   - paths.workDir
 *   - paths.dataFile
 *
 * Resolves file locations within $GITHUB_WORKSPACE (or the current
 * directory for local runs).
 */

import * as path from 'path';
import { DATA_FILE_SUFFIX, MERGED_QLD_FILE, PREDICTED_QLD_FILE, REAL_QLD_FILE } from './types';

// -----------------------------------------------------------------------------
// Port: paths.workDir
// -----------------------------------------------------------------------------

/**
 * Returns the directory that data files are read from and written to.
 */
export function getWorkDir(): string {
  const workspace = process.env['GITHUB_WORKSPACE'];
  return workspace ? path.resolve(workspace) : process.cwd();
}

/**
 * Resolves a workspace-relative file name to an absolute path.
 */
export function resolveInWorkDir(fileName: string): string {
  return path.resolve(getWorkDir(), fileName);
}

// -----------------------------------------------------------------------------
// Port: paths.dataFile
// -----------------------------------------------------------------------------

/**
 * Returns the CSV file name for a symbol: index carets stripped, lowercased.
 *
 * @example dataFileName('^GSPC') // 'gspc_stock_data.csv'
 */
export function dataFileName(symbol: string): string {
  return `${symbol.replace(/\^/g, '').toLowerCase()}${DATA_FILE_SUFFIX}`;
}

export interface MergePaths {
  predicted: string;
  real: string;
  merged: string;
}

export function getMergePaths(): MergePaths {
  return {
    predicted: resolveInWorkDir(PREDICTED_QLD_FILE),
    real: resolveInWorkDir(REAL_QLD_FILE),
    merged: resolveInWorkDir(MERGED_QLD_FILE),
  };
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/**
 * Returns the path for atomic write temporary file
 */
export function getTmpPath(filePath: string): string {
  return `${filePath}.tmp`;
}
