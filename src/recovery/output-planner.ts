/**
 * Output planner
 *
 * Maps a match to `<outputRoot>/<kind subdirectory>/<path relative to scanRoot>`.
 * Distinct sources under one scan root always differ in relative path or kind,
 * so two plans never share a destination.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { RecoveryError } from './errors.js';
import type { MatchKind, MatchResult, OutputPlan } from '../types/recovery.js';

export const KIND_SUBDIRECTORIES: Record<MatchKind, string> = {
  ProjectFile: 'ProjectFiles',
  ProjectArchive: 'ProjectArchives',
  KeywordMatch: 'KeywordMatches',
};

export function kindSubdirFor(kind: MatchKind): string {
  return KIND_SUBDIRECTORIES[kind];
}

/**
 * Whether `child` lies strictly below `parent`
 */
export function containsPath(parent: string, child: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(child));
  return relative !== '' && relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/**
 * Directories the enumerator must skip so a run never rescans its own copies.
 * A nested output root is skipped whole; an output root that is (or encloses)
 * the scan root only has its kind subdirectories skipped.
 */
export function scanExclusions(scanRoot: string, outputRoot: string): string[] {
  const scan = path.resolve(scanRoot);
  const output = path.resolve(outputRoot);

  if (containsPath(scan, output)) {
    return [output];
  }
  if (scan === output || containsPath(output, scan)) {
    return Object.values(KIND_SUBDIRECTORIES).map((subdir) => path.join(output, subdir));
  }
  return [];
}

/**
 * Path of `sourcePath` relative to `scanRoot`.
 * When the scan root is the file itself, the file name is used.
 *
 * @throws RecoveryError PATH_OUTSIDE_SCAN_ROOT
 */
export function relativeToScanRoot(sourcePath: string, scanRoot: string): string {
  const source = path.resolve(sourcePath);
  const root = path.resolve(scanRoot);

  if (source === root) {
    return path.basename(source);
  }

  if (!containsPath(root, source)) {
    throw new RecoveryError(`Path is outside the scan root: ${sourcePath}`, 'PATH_OUTSIDE_SCAN_ROOT', {
      path: sourcePath,
    });
  }
  return path.relative(root, source);
}

export function planOutput(result: MatchResult, scanRoot: string, outputRoot: string): OutputPlan {
  const relative = relativeToScanRoot(result.path, scanRoot);
  return {
    sourcePath: result.path,
    destinationPath: path.join(path.resolve(outputRoot), kindSubdirFor(result.kind), relative),
    kind: result.kind,
  };
}

/**
 * Create the destination's parent directories. Safe to call concurrently.
 */
export async function ensureDestinationDir(plan: OutputPlan): Promise<void> {
  await fs.mkdir(path.dirname(plan.destinationPath), { recursive: true });
}
