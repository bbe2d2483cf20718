/**
 * Filesystem access used while scanning
 * The enumerator and classifier go through this seam so failures can be injected
 */

import { promises as fs, type Dirent } from 'node:fs';

export interface RecoveryFileSystem {
  /** List a directory's entries without following symbolic links */
  readdir(dir: string): Promise<Dirent[]>;
  /** Read up to `length` bytes from the start of a file */
  readHeader(file: string, length: number): Promise<Buffer>;
}

async function readHeader(file: string, length: number): Promise<Buffer> {
  const handle = await fs.open(file, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

export const nodeFileSystem: RecoveryFileSystem = {
  readdir: (dir) => fs.readdir(dir, { withFileTypes: true }),
  readHeader,
};
