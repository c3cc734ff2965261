/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print a key/value status table
 */
export function printStatus(
  title: string,
  status: Record<string, unknown>
): void {
  console.log(chalk.bold(`\n${title}:\n`));
  for (const [key, value] of Object.entries(status)) {
    const label = formatLabel(key);
    console.log(`  ${chalk.gray(label + ':')} ${formatValue(value)}`);
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

// Helper functions

export function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'string') {
    return value.length > 50 ? value.slice(0, 50) + '...' : value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * camelCase to Title Case with spaces
 */
export function formatLabel(key: string): string {
  return key
    .replace(/([A-Z])/g, ' $1')
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}

/**
 * Format ISO timestamp for display
 */
export function formatTimestamp(isoTimestamp: string | null): string {
  if (!isoTimestamp) {
    return 'never';
  }
  const date = new Date(isoTimestamp);
  return isNaN(date.getTime()) ? isoTimestamp : date.toLocaleString();
}
