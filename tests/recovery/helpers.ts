/**
 * Shared fixtures for recovery tests
 */

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { nodeFileSystem, type RecoveryFileSystem } from '../../src/recovery/file-system.js';

export const XML_SET = '<?xml version="1.0" encoding="UTF-8"?>\n<Ableton Live Set MajorVersion="5" MinorVersion="11.0">\n</Ableton Live Set>\n';
export const ZIP_BYTES = Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x14, 0x00, 0x00, 0x00, 0x08, 0x00, 0x61, 0x62, 0x63]);

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Create a file under `root`, including intermediate directories
 */
export async function createFile(root: string, relativePath: string, content: string | Buffer = ''): Promise<string> {
  const abs = path.join(root, relativePath);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, content);
  return abs;
}

function permissionDenied(target: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`EACCES: permission denied, scandir '${target}'`);
  error.code = 'EACCES';
  return error;
}

/**
 * A Node filesystem that refuses to list or read the given absolute paths
 */
export function deniedFileSystem(denied: { dirs?: string[]; files?: string[] }): RecoveryFileSystem {
  const dirs = new Set(denied.dirs ?? []);
  const files = new Set(denied.files ?? []);
  return {
    readdir: async (dir) => {
      if (dirs.has(dir)) throw permissionDenied(dir);
      return nodeFileSystem.readdir(dir);
    },
    readHeader: async (file, length) => {
      if (files.has(file)) throw permissionDenied(file);
      return nodeFileSystem.readHeader(file, length);
    },
  };
}

/**
 * List every file under `root` as sorted relative paths
 */
export async function listTree(root: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(dir: string): Promise<void> {
    for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
      const abs = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(abs);
      } else if (entry.isFile()) {
        files.push(path.relative(root, abs));
      }
    }
  }

  await walk(root);
  return files.sort();
}
