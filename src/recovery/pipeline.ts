/**
 * Recovery pipeline
 *
 * enumerate -> classify (worker pool) -> aggregate -> plan -> copy
 *
 * Fatal conditions (unusable scan root or output root) end the run with a
 * `fatal-failure` report. Every other failure is attributed to a path,
 * counted, and the run continues.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import pLimit from 'p-limit';
import { ResultAggregator, type ProgressListener } from './aggregator.js';
import { DEFAULT_HEADER_BYTES, classify, needsHeader } from './classifier.js';
import { copyPlannedFile } from './copier.js';
import { entryPath, enumerateFiles, inspectScanRoot, type EnumerationEntry } from './enumerator.js';
import { RecoveryError, errorMessage, toRecoveryEvent } from './errors.js';
import { nodeFileSystem, type RecoveryFileSystem } from './file-system.js';
import { planOutput, scanExclusions } from './output-planner.js';
import { RecoveryLogger } from './recovery-logger.js';
import { WorkScheduler, clampWorkerCount } from './scheduler.js';
import type {
  ClassificationResult,
  CopyOutcome,
  OutputPlan,
  RecoveryOptions,
  RecoveryOutcome,
  RecoveryReport,
} from '../types/recovery.js';

export interface RecoveryRuntime {
  /** Cooperative cancellation; in-flight file work finishes, no new work starts */
  signal?: AbortSignal;
  logger?: RecoveryLogger;
  onProgress?: ProgressListener;
  fileSystem?: RecoveryFileSystem;
}

/**
 * Read the header of a candidate and classify it.
 * An unreadable header is reported and classification falls back to the name.
 */
export async function classifyCandidate(
  filePath: string,
  options: Pick<RecoveryOptions, 'keywords' | 'verifyHeaders' | 'headerBytes'>,
  fileSystem: RecoveryFileSystem = nodeFileSystem,
  onHeaderError?: (error: unknown) => void
): Promise<ClassificationResult> {
  let header: Buffer | undefined;

  if (options.verifyHeaders || needsHeader(filePath)) {
    try {
      header = await fileSystem.readHeader(filePath, options.headerBytes ?? DEFAULT_HEADER_BYTES);
    } catch (error) {
      onHeaderError?.(error);
    }
  }

  return classify(filePath, header, options.keywords);
}

async function prepareOutputRoot(outputRoot: string): Promise<void> {
  try {
    await fs.mkdir(outputRoot, { recursive: true });
    const stat = await fs.stat(outputRoot);
    if (!stat.isDirectory()) {
      throw new Error('not a directory');
    }
  } catch (error) {
    throw new RecoveryError(`Output root cannot be created: ${outputRoot} (${errorMessage(error)})`, 'OUTPUT_ROOT_UNAVAILABLE', {
      path: outputRoot,
      cause: error,
    });
  }
}

/**
 * Run a full recovery: scan, classify, plan and copy.
 * Fatal problems come back as a `fatal-failure` report rather than a rejection.
 */
export async function runRecovery(options: RecoveryOptions, runtime: RecoveryRuntime = {}): Promise<RecoveryReport> {
  const startedAt = Date.now();
  const logger = runtime.logger ?? new RecoveryLogger();
  const fileSystem = runtime.fileSystem ?? nodeFileSystem;
  const aggregator = new ResultAggregator();
  const unsubscribe = runtime.onProgress ? aggregator.onProgress(runtime.onProgress) : undefined;

  const scanRoot = path.resolve(options.scanRoot);
  const outputRoot = path.resolve(options.outputRoot);
  const workerCount = clampWorkerCount(options.workerCount);
  const plans: OutputPlan[] = [];

  const report = (outcome: RecoveryOutcome, fatal?: RecoveryError): RecoveryReport => {
    aggregator.setPhase('done');
    return {
      outcome,
      succeeded: outcome === 'success' || outcome === 'partial-failure',
      progress: aggregator.snapshot(),
      matches: aggregator.getMatches(),
      projectFolders: aggregator.getProjectFolders(),
      plans,
      outcomes: aggregator.getOutcomes(),
      errors: aggregator.getErrors(),
      durationMs: Date.now() - startedAt,
      ...(fatal ? { fatalError: { code: fatal.code, message: fatal.message, path: fatal.path } } : {}),
    };
  };

  try {
    logger.stageStart('init', 'recovery run', {
      scanRoot,
      outputRoot,
      keywords: [...options.keywords],
      workerCount,
      dryRun: options.dryRun ?? false,
    });

    await inspectScanRoot(scanRoot);
    if (!options.dryRun) {
      await prepareOutputRoot(outputRoot);
    }

    // Scan phase
    const scheduler = new WorkScheduler({ workerCount, signal: runtime.signal });
    const exclude = options.excludeOutputRoot !== false ? scanExclusions(scanRoot, outputRoot) : [];
    logger.stageStart('scan', `scanning ${scanRoot}`, { workers: scheduler.size, exclude });

    const scanStats = await scheduler.run<EnumerationEntry>(
      enumerateFiles(scanRoot, { fileSystem, exclude }),
      async (entry) => {
        if (entry.type === 'error') {
          aggregator.recordError(entry.event);
          logger.warn('scan', 'directory_unreadable', `Cannot read directory: ${entry.event.path}`, { ...entry.event });
          return;
        }
        if (entry.type === 'project-folder') {
          if (aggregator.recordProjectFolder(entry.folder)) {
            logger.info('scan', 'project_folder', `Likely Live project folder: ${entry.folder.path}`, {
              markers: entry.folder.markers,
            });
          }
          return;
        }

        const filePath = entry.path;
        const result = await classifyCandidate(filePath, options, fileSystem, (error) => {
          const event = toRecoveryEvent('header', filePath, error);
          aggregator.recordError(event);
          logger.warn('classify', 'header_unreadable', `Cannot read header: ${filePath}`, { ...event });
        });

        const match = aggregator.recordClassification(result);
        if (match) {
          logger.debug('classify', 'match', `${match.kind} (${match.basis}): ${match.path}`);
        }
      },
      (entry, error) => {
        const filePath = entryPath(entry);
        const event = toRecoveryEvent('classify', filePath, error);
        aggregator.recordError(event);
        logger.warn('classify', 'classify_failed', `Failed to classify: ${filePath}`, { ...event });
      }
    );

    const matches = aggregator.getMatches();
    const progress = aggregator.snapshot();
    logger.stageComplete('scan', `scanned ${progress.filesExamined} files`, {
      matches: progress.matchesByKind,
      projectFolders: progress.projectFoldersFound,
      errors: progress.errorsByCategory,
    });

    if (scanStats.aborted) {
      logger.warn('scan', 'cancelled', 'Scan cancelled before completion');
      return report('cancelled');
    }

    // Plan phase
    for (const match of matches) {
      try {
        plans.push(planOutput(match, scanRoot, outputRoot));
      } catch (error) {
        const event = toRecoveryEvent('plan', match.path, error);
        aggregator.recordError(event);
        logger.warn('plan', 'plan_failed', event.message, { ...event });
      }
    }

    if (options.dryRun) {
      logger.info('plan', 'dry_run', `Dry run: ${plans.length} files would be copied`);
      return report(aggregator.errorCount > 0 ? 'partial-failure' : 'success');
    }

    // Copy phase
    aggregator.setPhase('copying');
    logger.stageStart('copy', `copying ${plans.length} files`);

    const limit = pLimit(workerCount);
    let cancelled = false;
    await Promise.all(
      plans.map((plan) =>
        limit(async () => {
          if (runtime.signal?.aborted) {
            cancelled = true;
            return;
          }
          const outcome: CopyOutcome = await copyPlannedFile(plan);
          aggregator.recordCopy(outcome);
          if (outcome.succeeded) {
            logger.debug('copy', 'saved', `Saved: ${plan.destinationPath}`);
          } else {
            aggregator.recordError({
              category: 'copy',
              path: plan.sourcePath,
              message: outcome.errorDetail ?? 'copy failed',
            });
            logger.warn('copy', 'copy_failed', `Failed to save ${plan.sourcePath} to ${plan.destinationPath}`, {
              error: outcome.errorDetail,
            });
          }
        })
      )
    );

    const finalProgress = aggregator.snapshot();
    logger.stageComplete('copy', `saved ${finalProgress.copiesSucceeded} files`, {
      succeeded: finalProgress.copiesSucceeded,
      failed: finalProgress.copiesFailed,
    });

    if (cancelled) {
      logger.warn('copy', 'cancelled', 'Copy cancelled before completion');
      return report('cancelled');
    }

    return report(aggregator.errorCount > 0 ? 'partial-failure' : 'success');
  } catch (error) {
    if (error instanceof RecoveryError) {
      logger.stageFailed('init', 'recovery run', error.message, { code: error.code, path: error.path });
      return report('fatal-failure', error);
    }
    throw error;
  } finally {
    unsubscribe?.();
  }
}
