/**
 * File copier
 *
 * Copies into a temporary sibling of the destination, applies the source's
 * timestamps and permission bits, then renames over the destination. A copy
 * therefore either lands whole or leaves nothing behind, and repeating it
 * overwrites the earlier result.
 */

import { randomBytes } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { errorMessage } from './errors.js';
import { ensureDestinationDir } from './output-planner.js';
import type { CopyOutcome, OutputPlan } from '../types/recovery.js';

const PARTIAL_SUFFIX = '.salvage-partial';

function partialPathFor(destination: string): string {
  const token = randomBytes(4).toString('hex');
  return path.join(path.dirname(destination), `.${path.basename(destination)}.${token}${PARTIAL_SUFFIX}`);
}

/**
 * Copy one planned file. Never throws; failures come back as a failed outcome.
 */
export async function copyPlannedFile(plan: OutputPlan): Promise<CopyOutcome> {
  let partial: string | undefined;

  try {
    await ensureDestinationDir(plan);

    partial = partialPathFor(plan.destinationPath);
    await fs.copyFile(plan.sourcePath, partial);

    const stat = await fs.stat(plan.sourcePath);
    await fs.chmod(partial, stat.mode & 0o7777);
    await fs.utimes(partial, stat.atime, stat.mtime);
    await fs.rename(partial, plan.destinationPath);
    partial = undefined;

    return { plan, succeeded: true };
  } catch (error) {
    let detail = errorMessage(error);
    if (partial !== undefined) {
      try {
        await fs.rm(partial, { force: true });
      } catch (cleanupError) {
        detail += ` (temporary file ${partial} could not be removed: ${errorMessage(cleanupError)})`;
      }
    }
    return { plan, succeeded: false, errorDetail: detail };
  }
}
