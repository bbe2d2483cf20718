/**
 * Directory enumerator
 *
 * Lazily walks a scan root breadth-first, yielding every regular file, an
 * error event for each directory that cannot be listed, and a project-folder
 * entry for each directory that holds Live's project subfolders. Symbolic links are
 * never followed. Entries within a directory are visited in name order so a
 * fresh walk over an unchanged tree yields the same sequence.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { PROJECT_FOLDER_MARKERS } from './classifier.js';
import { RecoveryError, toRecoveryEvent } from './errors.js';
import { nodeFileSystem, type RecoveryFileSystem } from './file-system.js';
import type { ProjectFolder, RecoveryEvent } from '../types/recovery.js';

export type EnumerationEntry =
  | { type: 'file'; path: string }
  | { type: 'error'; event: RecoveryEvent }
  | { type: 'project-folder'; folder: ProjectFolder };

/**
 * The path an entry is about
 */
export function entryPath(entry: EnumerationEntry): string {
  switch (entry.type) {
    case 'file':
      return entry.path;
    case 'error':
      return entry.event.path;
    default:
      return entry.folder.path;
  }
}

export interface EnumerateOptions {
  fileSystem?: RecoveryFileSystem;
  /** Absolute directory paths that are skipped entirely */
  exclude?: readonly string[];
}

export type ScanRootKind = 'directory' | 'file';

/**
 * Check that the scan root exists and is a directory or regular file.
 *
 * @throws RecoveryError ROOT_INACCESSIBLE
 */
export async function inspectScanRoot(scanRoot: string): Promise<ScanRootKind> {
  let stat;
  try {
    stat = await fs.stat(scanRoot);
  } catch (error) {
    throw new RecoveryError(`Scan root is not accessible: ${scanRoot}`, 'ROOT_INACCESSIBLE', {
      path: scanRoot,
      cause: error,
    });
  }

  if (stat.isDirectory()) return 'directory';
  if (stat.isFile()) return 'file';

  throw new RecoveryError(`Scan root is neither a directory nor a file: ${scanRoot}`, 'ROOT_INACCESSIBLE', {
    path: scanRoot,
  });
}

/**
 * Enumerate every file under a root.
 *
 * Failing to list the root itself throws ROOT_INACCESSIBLE; failing to list any
 * other directory yields an `enumeration` error entry and the walk moves on.
 */
export async function* enumerateFiles(
  scanRoot: string,
  options: EnumerateOptions = {}
): AsyncGenerator<EnumerationEntry, void, undefined> {
  const fileSystem = options.fileSystem ?? nodeFileSystem;
  const excluded = new Set((options.exclude ?? []).map((p) => path.resolve(p)));
  const root = path.resolve(scanRoot);

  if ((await inspectScanRoot(root)) === 'file') {
    yield { type: 'file', path: root };
    return;
  }

  const queue: string[] = [root];
  while (queue.length > 0) {
    const dir = queue.shift();
    if (dir === undefined) break;

    let entries;
    try {
      entries = await fileSystem.readdir(dir);
    } catch (error) {
      if (dir === root) {
        throw new RecoveryError(`Scan root cannot be read: ${root}`, 'ROOT_INACCESSIBLE', {
          path: root,
          cause: error,
        });
      }
      yield { type: 'error', event: toRecoveryEvent('enumeration', dir, error) };
      continue;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const markers = entries
      .filter((entry) => entry.isDirectory() && PROJECT_FOLDER_MARKERS.includes(entry.name))
      .map((entry) => entry.name);
    if (markers.length > 0) {
      yield { type: 'project-folder', folder: { path: dir, markers } };
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isSymbolicLink()) continue;

      if (entry.isDirectory()) {
        if (!excluded.has(fullPath)) {
          queue.push(fullPath);
        }
      } else if (entry.isFile()) {
        yield { type: 'file', path: fullPath };
      }
    }
  }
}
