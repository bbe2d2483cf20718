/**
 * Resolve CLI input and loaded configuration into the options the recovery pipeline consumes
 */

import { availableParallelism } from 'node:os';
import path from 'node:path';
import type { RecoveryOptions } from '../types/recovery.js';
import type { Config, WorkerCount } from './schema.js';

export interface RecoveryInput {
  scanDir: string;
  outputDir: string;
  /** Replaces the configured keywords when given */
  keywords?: readonly string[];
  workers?: WorkerCount;
  /** False forces a single sequential worker */
  parallel?: boolean;
  verifyHeaders?: boolean;
  dryRun?: boolean;
}

/**
 * Trim keywords, drop empty ones and case-insensitive duplicates, keeping first-seen order
 */
export function normalizeKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const raw of keywords) {
    const keyword = raw.trim();
    const key = keyword.toLowerCase();
    if (keyword.length === 0 || seen.has(key)) continue;
    seen.add(key);
    result.push(keyword);
  }

  return result;
}

export function resolveWorkerCount(workers: WorkerCount, parallelism: () => number = availableParallelism): number {
  return workers === 'auto' ? Math.max(1, parallelism()) : workers;
}

export function resolveRecoveryOptions(
  input: RecoveryInput,
  config: Config,
  cwd: string = process.cwd()
): RecoveryOptions {
  const keywords = input.keywords && input.keywords.length > 0 ? input.keywords : config.recovery.keywords;
  const workerCount = input.parallel === false
    ? 1
    : resolveWorkerCount(input.workers ?? config.recovery.workers);

  return {
    scanRoot: path.resolve(cwd, input.scanDir),
    outputRoot: path.resolve(cwd, input.outputDir),
    keywords: normalizeKeywords(keywords),
    workerCount,
    verifyHeaders: input.verifyHeaders ?? config.recovery.verify_headers,
    headerBytes: config.recovery.header_bytes,
    excludeOutputRoot: config.recovery.exclude_output_root,
    dryRun: input.dryRun ?? false,
  };
}
