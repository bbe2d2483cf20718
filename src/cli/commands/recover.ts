/**
 * Recover command
 * Scans a directory tree and copies recovered Live sets, packs and keyword matches
 */

import { Command, InvalidArgumentError } from 'commander';
import path from 'node:path';
import { MAX_WORKERS, loadConfig, parseWorkerCount, resolveRecoveryOptions, type RecoveryInput, type WorkerCount } from '../../config/index.js';
import { runRecovery } from '../../recovery/pipeline.js';
import { RecoveryLogger } from '../../recovery/recovery-logger.js';
import type { RecoveryOutcome, RecoveryReport } from '../../types/recovery.js';
import { EXIT_CODES, type ExitCode, type RecoverCommandOptions } from '../../types/cli.js';
import {
  failSpinner,
  formatProgress,
  printError,
  printInfo,
  printLogEntry,
  printRecoveryReport,
  printSection,
  printTable,
  printWarning,
  startSpinner,
  succeedSpinner,
  updateSpinner,
  warnSpinner,
} from '../output.js';

/**
 * Commander argument parser for --workers
 */
export function parseWorkersOption(value: string): WorkerCount {
  const parsed = parseWorkerCount(value);
  if (parsed === undefined) {
    throw new InvalidArgumentError(`Expected an integer from 1 to ${MAX_WORKERS}, or "auto".`);
  }
  return parsed;
}

export function toRecoveryInput(scanDir: string, outputDir: string, options: RecoverCommandOptions): RecoveryInput {
  return {
    scanDir,
    outputDir,
    keywords: options.keywords,
    workers: options.workers,
    parallel: options.parallel,
    verifyHeaders: options.verifyHeaders,
    dryRun: options.dryRun,
  };
}

/**
 * Process exit code for a run outcome
 */
export function exitCodeFor(outcome: RecoveryOutcome): ExitCode {
  switch (outcome) {
    case 'success':
    case 'partial-failure':
      return EXIT_CODES.SUCCESS;
    case 'cancelled':
      return EXIT_CODES.INTERRUPTED;
    default:
      return EXIT_CODES.ERROR;
  }
}

/**
 * SIGINT handler that aborts the run. JSON mode keeps stdout for the report.
 */
export function createInterruptHandler(controller: AbortController, json: boolean): () => void {
  return () => {
    if (!json) {
      printWarning('Interrupt received, finishing in-flight files...');
    }
    controller.abort();
  };
}

function finishSpinner(report: RecoveryReport): void {
  const saved = report.progress.copiesSucceeded;
  switch (report.outcome) {
    case 'success':
      succeedSpinner(`Recovery complete: ${saved} files saved`);
      break;
    case 'partial-failure':
      warnSpinner(`Recovery complete with ${report.errors.length} errors: ${saved} files saved`);
      break;
    case 'cancelled':
      warnSpinner('Recovery cancelled');
      break;
    default:
      failSpinner('Recovery failed');
  }
}

function printPlannedCopies(report: RecoveryReport): void {
  printSection('Planned Copies');
  printTable(
    ['Kind', 'Source', 'Destination'],
    report.plans.map((plan) => [plan.kind, plan.sourcePath, plan.destinationPath])
  );
}

/**
 * Create the recover command
 */
export function createRecoverCommand(): Command {
  return new Command('recover')
    .description('Scan a directory and copy recovered Live sets, packs and keyword matches')
    .argument('<scan-dir>', 'Directory (or single file) to scan')
    .argument('<output-dir>', 'Directory recovered files are copied into')
    .option('-k, --keywords <keywords...>', 'Filename keywords to match (case-insensitive)')
    .option('-p, --workers <count>', 'Number of concurrent workers, or "auto"', parseWorkersOption)
    .option('--no-parallel', 'Run with a single sequential worker')
    .option('--verify-headers', 'Read file headers even when the extension is conclusive')
    .option('--dry-run', 'Classify and plan without copying anything')
    .option('--json', 'Output the final report as JSON')
    .option('--log-file <path>', 'Write a markdown log of the run')
    .option('-v, --verbose', 'Log every match and saved file')
    .action(async (scanDir: string, outputDir: string, options: RecoverCommandOptions) => {
      const config = await loadConfig({ cwd: process.cwd() });
      const recoveryOptions = resolveRecoveryOptions(toRecoveryInput(scanDir, outputDir, options), config);
      const json = options.json ?? config.output.format === 'json';
      const logFile = options.logFile ?? config.output.log_file;

      const logger = new RecoveryLogger({
        verbose: options.verbose ?? config.output.verbose,
        logFile: logFile ? path.resolve(logFile) : undefined,
        sink: json ? undefined : printLogEntry,
      });

      const controller = new AbortController();
      const onInterrupt = createInterruptHandler(controller, json);
      process.once('SIGINT', onInterrupt);

      if (!json) {
        printInfo(`Source: ${recoveryOptions.scanRoot}`);
        printInfo(`Destination: ${recoveryOptions.outputRoot}`);
        printInfo(`Keywords: ${recoveryOptions.keywords.length > 0 ? recoveryOptions.keywords.join(', ') : 'None'}`);
        printInfo(`Workers: ${recoveryOptions.workerCount}`);
        startSpinner('Starting scan...');
      }

      let report: RecoveryReport;
      try {
        report = await runRecovery(recoveryOptions, {
          signal: controller.signal,
          logger,
          onProgress: json ? undefined : (state) => updateSpinner(formatProgress(state)),
        });
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }

      try {
        await logger.flush();
      } catch (error) {
        printError(`Failed to write log file: ${error instanceof Error ? error.message : String(error)}`);
      }

      if (json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        finishSpinner(report);
        if (recoveryOptions.dryRun && report.plans.length > 0) {
          printPlannedCopies(report);
        }
        printRecoveryReport(report);
      }

      process.exitCode = exitCodeFor(report.outcome);
    });
}
