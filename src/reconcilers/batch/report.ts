/**
 * Batch Sync Report Generation
 *
 * Human-readable console output with colors, or JSON for automation.
 *
 * @module reconcilers/batch/report
 */

import chalk from 'chalk';
import type { SyncStatus } from '../../state/types.js';
import { getOneLinerSummary, type BatchScopeResult, type BatchSyncResult } from './batch-sync.js';

// =============================================================================
// Types
// =============================================================================

export type ReportFormat = 'human' | 'json';

export interface ReportOptions {
  format: ReportFormat;
  /** Show only failures */
  failuresOnly?: boolean;
  /** Include timing information */
  includeTiming?: boolean;
}

export interface FormattedReport {
  output: string;
  /** Summary line for quick display */
  summary: string;
  /** 0 = all fine, 1 = some failures, 2 = everything failed */
  suggestedExitCode: number;
}

// =============================================================================
// Formatting Utilities
// =============================================================================

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

function getStatusIcon(status: SyncStatus): string {
  switch (status) {
    case 'success':
      return chalk.green('✓');
    case 'uptodate':
      return chalk.cyan('=');
    case 'failed':
      return chalk.red('✗');
  }
}

function getStatusLabel(status: SyncStatus): string {
  switch (status) {
    case 'success':
      return chalk.green('SYNC');
    case 'uptodate':
      return chalk.cyan('OK');
    case 'failed':
      return chalk.red('FAIL');
  }
}

function formatScopeResult(result: BatchScopeResult, includeTiming: boolean): string {
  const lines: string[] = [];
  let mainLine = `  ${getStatusIcon(result.status)} ${getStatusLabel(result.status).padEnd(6)} ${result.scope}`;
  if (includeTiming) {
    mainLine += chalk.gray(` (${formatDuration(result.durationMs)})`);
  }
  lines.push(mainLine);
  lines.push(chalk.gray(`           ${result.summary}`));
  if (result.error) {
    lines.push(chalk.red(`           Error: ${result.error}`));
  }
  return lines.join('\n');
}

// =============================================================================
// Reports
// =============================================================================

export function formatHumanReport(
  result: BatchSyncResult,
  options: Omit<ReportOptions, 'format'> = {}
): string {
  const { failuresOnly = false, includeTiming = true } = options;
  const lines: string[] = [];

  lines.push('');
  lines.push(chalk.bold('='.repeat(60)));
  lines.push(chalk.bold.cyan('  Course Sync Report'));
  lines.push(chalk.bold('='.repeat(60)));
  lines.push(chalk.gray(`Batch ID: ${result.batchId}`));
  lines.push('');

  const shown = failuresOnly
    ? result.results.filter((r) => r.status === 'failed')
    : result.results;
  if (shown.length === 0) {
    lines.push(failuresOnly ? chalk.green('  No failures!') : chalk.gray('  No courses processed'));
  } else {
    for (const scopeResult of shown) {
      lines.push(formatScopeResult(scopeResult, includeTiming));
    }
  }
  lines.push('');

  if (includeTiming) {
    lines.push(chalk.gray(`Duration: ${formatDuration(result.stats.totalDurationMs)}`));
  }
  const summary = getOneLinerSummary(result);
  lines.push(result.success ? chalk.green.bold(summary) : chalk.red.bold(summary));
  lines.push('');

  return lines.join('\n');
}

export function formatJsonReport(result: BatchSyncResult): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Generate formatted report based on options
 */
export function generateReport(result: BatchSyncResult, options: ReportOptions): FormattedReport {
  const output =
    options.format === 'json' ? formatJsonReport(result) : formatHumanReport(result, options);

  let suggestedExitCode = 0;
  if (!result.success) {
    suggestedExitCode = result.stats.failed === result.stats.total ? 2 : 1;
  }

  return { output, summary: getOneLinerSummary(result), suggestedExitCode };
}
