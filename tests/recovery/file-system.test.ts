/**
 * Tests for the Node filesystem seam and error helpers
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { nodeFileSystem } from '../../src/recovery/file-system.js';
import { RecoveryError, errorCode, toRecoveryEvent } from '../../src/recovery/errors.js';
import { createFile, makeTempDir } from './helpers.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await makeTempDir('salvage-fs-');
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('nodeFileSystem.readHeader', () => {
  it('should read at most the requested number of bytes', async () => {
    const file = await createFile(tmpDir, 'long.bin', 'abcdefghij');
    const header = await nodeFileSystem.readHeader(file, 4);
    expect(header.toString('latin1')).toBe('abcd');
  });

  it('should return the whole file when it is shorter', async () => {
    const file = await createFile(tmpDir, 'short.bin', 'PK');
    const header = await nodeFileSystem.readHeader(file, 256);
    expect(header.length).toBe(2);
  });

  it('should reject for a missing file', async () => {
    await expect(nodeFileSystem.readHeader(path.join(tmpDir, 'nope'), 16)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});

describe('nodeFileSystem.readdir', () => {
  it('should list entries with their types', async () => {
    await createFile(tmpDir, 'sub/a.als');
    const entries = await nodeFileSystem.readdir(tmpDir);
    expect(entries.map((e) => [e.name, e.isDirectory()])).toEqual([['sub', true]]);
  });
});

describe('error helpers', () => {
  it('should prefer a RecoveryError code', () => {
    expect(errorCode(new RecoveryError('gone', 'ROOT_INACCESSIBLE'))).toBe('ROOT_INACCESSIBLE');
  });

  it('should read Node error codes', () => {
    const error: NodeJS.ErrnoException = new Error('denied');
    error.code = 'EACCES';
    expect(toRecoveryEvent('copy', '/a.als', error)).toEqual({
      category: 'copy',
      path: '/a.als',
      message: 'denied',
      code: 'EACCES',
    });
  });

  it('should handle non-error values', () => {
    expect(toRecoveryEvent('classify', '/a.als', 'weird')).toEqual({
      category: 'classify',
      path: '/a.als',
      message: 'weird',
    });
  });
});
