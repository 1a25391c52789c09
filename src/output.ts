/**
 * Output Renderer
 * Layer: infra
 *
 * Provided ports:
 *   - output.render
 *
 * Generates the update summary for GitHub step summary and console.
 */

import * as fs from 'fs';
import type { SymbolResult, UpdateReport, UploadStatus } from './types';

// -----------------------------------------------------------------------------
// Port: output.render
// -----------------------------------------------------------------------------

export interface RenderResult {
  /** Markdown for step summary */
  markdown: string;
  /** Plain text for console */
  console: string;
}

/**
 * Renders the update report to markdown and console formats.
 */
export function render(report: UpdateReport): RenderResult {
  return { markdown: renderMarkdown(report), console: renderConsole(report) };
}

// -----------------------------------------------------------------------------
// Markdown rendering
// -----------------------------------------------------------------------------

/**
 * Renders full markdown summary for $GITHUB_STEP_SUMMARY.
 */
export function renderMarkdown(report: UpdateReport): string {
  const lines: string[] = [];

  lines.push('## Stock Data Update — Job Summary');
  lines.push('');

  const results = allResults(report);
  const counts = countByStatus(results);
  const mode = report.dry_run ? ' | **Dry run**' : '';
  lines.push(
    `**Symbols:** ${report.symbols.length} | **Uploaded:** ${counts.created + counts.updated} | ` +
      `**Failed:** ${counts.failed}${mode}`,
  );
  lines.push('');

  if (results.length > 0) {
    lines.push('| Symbol | File | Rows | Status |');
    lines.push('|--------|------|-----:|--------|');
    for (const result of results) {
      lines.push(
        `| ${result.symbol} | ${result.file ?? '-'} | ${result.rows} | ${formatStatus(result)} |`,
      );
    }
    lines.push('');
  } else {
    lines.push('*No symbols were processed.*');
    lines.push('');
  }

  if (report.warnings.length > 0) {
    lines.push('### Warnings');
    lines.push('');
    for (const warning of report.warnings) {
      lines.push(`- ${warning}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

// -----------------------------------------------------------------------------
// Console rendering
// -----------------------------------------------------------------------------

/**
 * Renders concise console output.
 */
export function renderConsole(report: UpdateReport): string {
  const results = allResults(report);
  const counts = countByStatus(results);
  const lines = [
    `Stock data: ${counts.created} created, ${counts.updated} updated, ` +
      `${counts.skipped} skipped, ${counts.failed} failed`,
  ];

  const failed = results.filter((r) => r.status === 'failed');
  for (const result of failed) {
    lines.push(`  - ${result.symbol}: ${result.error ?? 'unknown error'}`);
  }

  return lines.join('\n');
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function allResults(report: UpdateReport): SymbolResult[] {
  return report.merged ? [...report.symbols, report.merged] : report.symbols;
}

function countByStatus(results: SymbolResult[]): Record<UploadStatus, number> {
  const counts: Record<UploadStatus, number> = { created: 0, updated: 0, skipped: 0, failed: 0 };
  for (const result of results) {
    counts[result.status] += 1;
  }
  return counts;
}

function formatStatus(result: SymbolResult): string {
  if (result.status === 'failed' && result.error) {
    return `failed: ${result.error}`;
  }
  return result.status;
}

// -----------------------------------------------------------------------------
// GitHub Step Summary
// -----------------------------------------------------------------------------

/**
 * Writes markdown to GitHub step summary.
 */
export function writeStepSummary(markdown: string): void {
  const summaryPath = process.env['GITHUB_STEP_SUMMARY'];
  if (summaryPath) {
    fs.appendFileSync(summaryPath, markdown + '\n');
  }
}
