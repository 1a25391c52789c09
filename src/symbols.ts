/**
 * Symbols File
 * Layer: core
 *
 * Provided ports:
 *   - symbols.read
 *   - symbols.add
 *
 * Manages the list of tracked ticker symbols, one per line.
 * Uses atomic rename for safe writes.
 */

import * as fs from 'fs';
import { getTmpPath } from './paths';

// -----------------------------------------------------------------------------
// Port: symbols.read
// -----------------------------------------------------------------------------

export interface ReadSymbolsResult {
  success: true;
  symbols: string[];
}

export interface ReadSymbolsError {
  success: false;
  error: string;
  /** True if file doesn't exist */
  notFound: boolean;
}

export type ReadSymbolsOutcome = ReadSymbolsResult | ReadSymbolsError;

export function normalizeSymbol(raw: string): string {
  return raw.trim().toUpperCase();
}

/**
 * Parses symbols file content. Blank lines are skipped.
 */
export function parseSymbols(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(normalizeSymbol)
    .filter((symbol) => symbol.length > 0);
}

/**
 * Reads the symbols file from disk.
 */
export function readSymbols(filePath: string): ReadSymbolsOutcome {
  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    return { success: true, symbols: parseSymbols(content) };
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'ENOENT') {
      return {
        success: false,
        error: `Symbols file not found: ${filePath}`,
        notFound: true,
      };
    }
    return {
      success: false,
      error: `Failed to read symbols: ${error.message}`,
      notFound: false,
    };
  }
}

// -----------------------------------------------------------------------------
// Port: symbols.add
// -----------------------------------------------------------------------------

export type AddSymbolOutcome =
  | { added: true; symbol: string; symbols: string[] }
  | { added: false; symbol: string; reason: 'empty' | 'exists' };

/**
 * Adds a symbol to the symbols file, keeping it sorted and unique.
 * A missing file is treated as an empty list.
 *
 * @throws Error if the file exists but cannot be read, or cannot be written
 */
export function addSymbol(raw: string, filePath: string): AddSymbolOutcome {
  const symbol = normalizeSymbol(raw);
  if (!symbol) {
    return { added: false, symbol, reason: 'empty' };
  }

  const readResult = readSymbols(filePath);
  if (!readResult.success && !readResult.notFound) {
    throw new Error(readResult.error);
  }
  const existing = readResult.success ? readResult.symbols : [];

  if (existing.includes(symbol)) {
    return { added: false, symbol, reason: 'exists' };
  }

  const symbols = [...new Set([...existing, symbol])].sort();
  writeSymbols(filePath, symbols);
  return { added: true, symbol, symbols };
}

/**
 * Writes symbols atomically, one per line with a trailing newline.
 * Cleans up temp file on failure to prevent orphaned files.
 */
export function writeSymbols(filePath: string, symbols: string[]): void {
  const tmpPath = getTmpPath(filePath);
  try {
    fs.writeFileSync(tmpPath, symbols.map((s) => `${s}\n`).join(''), 'utf-8');
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    try {
      fs.unlinkSync(tmpPath);
    } catch {
      // Ignore cleanup errors - file may not exist
    }
    const error = err as Error;
    throw new Error(`Failed to write symbols: ${error.message}`);
  }
}
