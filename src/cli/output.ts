/**
 * CLI output utilities
 * Handles formatted output, spinners, and progress display
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import {
  ERROR_CATEGORIES,
  MATCH_KINDS,
  type ClassificationResult,
  type ProgressState,
  type RecoveryOutcome,
  type RecoveryReport,
} from '../types/recovery.js';
import { getLevelIcon, type LogEntry } from '../recovery/recovery-logger.js';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/**
 * Start a spinner with a message
 *
 * @param message - Initial message
 * @returns Spinner instance
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

/**
 * Update spinner message
 *
 * @param message - New message
 */
export function updateSpinner(message: string): void {
  if (spinner) {
    spinner.text = message;
  }
}

/**
 * Stop spinner with success
 *
 * @param message - Success message
 */
export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

/**
 * Stop spinner with failure
 *
 * @param message - Failure message
 */
export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

/**
 * Stop spinner with a warning
 */
export function warnSpinner(message?: string): void {
  if (spinner) {
    spinner.warn(message);
    spinner = null;
  }
}

/**
 * Print above a running spinner without garbling its line
 */
function printAboveSpinner(line: string): void {
  if (spinner?.isSpinning) {
    spinner.clear();
    console.log(line);
    spinner.render();
  } else {
    console.log(line);
  }
}

/**
 * Print a header
 *
 * @param title - Header title
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

/**
 * Print a section header
 *
 * @param title - Section title
 */
export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

/**
 * Print a success message
 */
export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

/**
 * Print a warning message
 */
export function printWarning(message: string): void {
  console.log(theme.warning(`[WARN] ${message}`));
}

/**
 * Print an error message
 */
export function printError(message: string): void {
  console.log(theme.error(`[ERROR] ${message}`));
}

/**
 * Print an info message
 */
export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

/**
 * Print a key-value pair
 *
 * @param key - Key
 * @param value - Value
 */
export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

/**
 * Print a list item
 *
 * @param item - List item
 * @param indent - Indentation level
 */
export function printListItem(item: string, indent: number = 0): void {
  const prefix = '  '.repeat(indent) + '- ';
  console.log(theme.secondary(prefix) + item);
}

/**
 * One-line progress summary, used as spinner text
 */
export function formatProgress(state: ProgressState): string {
  const matches = MATCH_KINDS.reduce((sum, kind) => sum + state.matchesByKind[kind], 0);
  const errors = ERROR_CATEGORIES.reduce((sum, category) => sum + state.errorsByCategory[category], 0);

  if (state.phase === 'copying') {
    const copied = state.copiesSucceeded + state.copiesFailed;
    return `Copying ${copied}/${matches} files (${state.copiesFailed} failed)`;
  }
  return `Scanning: ${state.filesExamined} files examined, ${matches} matches, ${errors} errors`;
}

/**
 * Print a log entry forwarded from the recovery logger
 */
export function printLogEntry(entry: LogEntry): void {
  const icon = getLevelIcon(entry.level);
  const color = entry.level === 'error' ? theme.error
    : entry.level === 'warn' ? theme.warning
    : entry.level === 'success' ? theme.success
    : entry.level === 'debug' ? theme.dim
    : theme.info;
  printAboveSpinner(color(`${icon} [${entry.stage}] ${entry.message}`));
}

/**
 * Print a classification for the inspect command
 */
export function printClassification(result: ClassificationResult): void {
  if (result.kind === 'None') {
    console.log(`  ${theme.dim('[ ]')} ${result.path} ${theme.dim('no match')}`);
    return;
  }
  const detail = result.keyword ? `${result.basis}: "${result.keyword}"` : result.basis;
  console.log(`  ${theme.success('[OK]')} ${result.path} ${theme.highlight(result.kind)} ${theme.secondary(`(${detail})`)}`);
}

function outcomeLabel(outcome: RecoveryOutcome): string {
  switch (outcome) {
    case 'success':
      return theme.success('SUCCESS');
    case 'partial-failure':
      return theme.warning('SUCCESS (with errors)');
    case 'cancelled':
      return theme.warning('CANCELLED');
    default:
      return theme.error('FAILED');
  }
}

/**
 * Print the final summary of a recovery run
 *
 * @param report - Recovery report
 * @param maxErrors - How many individual errors to list
 */
export function printRecoveryReport(report: RecoveryReport, maxErrors: number = 10): void {
  const { progress } = report;

  printHeader('Recovery Summary');
  printKeyValue('Outcome', outcomeLabel(report.outcome));
  printKeyValue('Files examined', progress.filesExamined);
  printKeyValue('Project folders', progress.projectFoldersFound);
  printKeyValue('Duration', `${(report.durationMs / 1000).toFixed(1)}s`);

  if (report.fatalError) {
    printSection('Fatal Error');
    printError(`${report.fatalError.code}: ${report.fatalError.message}`);
    return;
  }

  printSection('Matches');
  for (const kind of MATCH_KINDS) {
    printKeyValue(kind, progress.matchesByKind[kind]);
  }

  printSection('Copies');
  printKeyValue('Saved', progress.copiesSucceeded);
  printKeyValue('Failed', progress.copiesFailed);
  if (report.outcomes.length === 0 && report.plans.length > 0) {
    printKeyValue('Planned (not copied)', report.plans.length);
  }

  printSection('Errors');
  for (const category of ERROR_CATEGORIES) {
    printKeyValue(category, progress.errorsByCategory[category]);
  }

  if (report.errors.length > 0) {
    console.log();
    for (const event of report.errors.slice(0, maxErrors)) {
      printListItem(`${theme.warning(event.category)} ${event.path}: ${event.message}`, 1);
    }
    if (report.errors.length > maxErrors) {
      printListItem(theme.dim(`... ${report.errors.length - maxErrors} more`), 1);
    }
  }
}

/**
 * Print a table
 *
 * @param headers - Table headers
 * @param rows - Table rows
 */
export function printTable(headers: string[], rows: string[][]): void {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const maxRow = Math.max(0, ...rows.map((r) => (r[i] || '').length));
    return Math.max(h.length, maxRow);
  });

  // Print header
  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  console.log(theme.highlight(headerLine));
  console.log(theme.dim('-'.repeat(headerLine.length)));

  // Print rows
  for (const row of rows) {
    const rowLine = row.map((cell, i) => (cell || '').padEnd(widths[i])).join('  ');
    console.log(rowLine);
  }
}
