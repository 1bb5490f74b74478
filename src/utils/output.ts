/**
 * Output formatting utilities for consistent CLI output
 *
 * Human-readable output goes to stdout, or to stderr when --json is set so
 * that stdout carries nothing but the JSON result.
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';

let humanToStderr = false;

/**
 * Route human-readable output for the given result format
 */
export function configureOutput(format: OutputFormat): void {
  humanToStderr = format === 'json';
}

function emit(...parts: string[]): void {
  if (humanToStderr) {
    console.error(...parts);
  } else {
    console.log(...parts);
  }
}

/**
 * Print a command result as JSON on stdout (--json)
 */
export function printResult<T>(result: CommandResult<T>): void {
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Print a line as-is (already formatted)
 */
export function line(message: string): void {
  emit(message);
}

/**
 * Print informational message
 */
export function info(message: string): void {
  emit(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  emit(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  emit(chalk.red('✗'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Never on stdout, so JSON output stays clean
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  emit(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  emit(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

/**
 * Print a table with a bold header row
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((row) => (row[i] ?? '').length)));
  const format = (cells: string[]): string =>
    cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();

  emit(chalk.bold(format(headers)));
  for (const row of rows) {
    emit(format(row));
  }
}
