/**
 * Tests for the directory enumerator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { entryPath, enumerateFiles, inspectScanRoot, type EnumerationEntry } from '../../src/recovery/enumerator.js';
import { RecoveryError } from '../../src/recovery/errors.js';
import { createFile, deniedFileSystem, makeTempDir } from './helpers.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await makeTempDir('salvage-enum-');
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

async function collect(source: AsyncIterable<EnumerationEntry>): Promise<EnumerationEntry[]> {
  const entries: EnumerationEntry[] = [];
  for await (const entry of source) {
    entries.push(entry);
  }
  return entries;
}

function filePaths(entries: EnumerationEntry[]): string[] {
  return entries.flatMap((entry) => (entry.type === 'file' ? [path.relative(tmpDir, entry.path)] : []));
}

describe('inspectScanRoot', () => {
  it('should report directories and files', async () => {
    const file = await createFile(tmpDir, 'one.als');
    expect(await inspectScanRoot(tmpDir)).toBe('directory');
    expect(await inspectScanRoot(file)).toBe('file');
  });

  it('should throw ROOT_INACCESSIBLE for a missing root', async () => {
    const missing = path.join(tmpDir, 'missing');
    await expect(inspectScanRoot(missing)).rejects.toMatchObject({ code: 'ROOT_INACCESSIBLE', path: missing });
  });
});

describe('enumerateFiles', () => {
  it('should yield files breadth-first in name order', async () => {
    await createFile(tmpDir, 'b/deep/z.als');
    await createFile(tmpDir, 'a/x.txt');
    await createFile(tmpDir, 'root.als');
    await createFile(tmpDir, 'b/y.alp');

    const entries = await collect(enumerateFiles(tmpDir));

    expect(filePaths(entries)).toEqual([
      'root.als',
      path.join('a', 'x.txt'),
      path.join('b', 'y.alp'),
      path.join('b', 'deep', 'z.als'),
    ]);
  });

  it('should yield nothing for an empty directory tree', async () => {
    await fs.mkdir(path.join(tmpDir, 'empty', 'nested'), { recursive: true });
    expect(await collect(enumerateFiles(tmpDir))).toEqual([]);
  });

  it('should yield the root itself when it is a file', async () => {
    const file = await createFile(tmpDir, 'Song.als', 'x');
    expect(await collect(enumerateFiles(file))).toEqual([{ type: 'file', path: file }]);
  });

  it('should not follow symbolic links', async () => {
    await createFile(tmpDir, 'real/Song.als');
    await fs.symlink(path.join(tmpDir, 'real'), path.join(tmpDir, 'link-dir'));
    await fs.symlink(path.join(tmpDir, 'real', 'Song.als'), path.join(tmpDir, 'link.als'));

    const entries = await collect(enumerateFiles(tmpDir));
    expect(filePaths(entries)).toEqual([path.join('real', 'Song.als')]);
  });

  it('should report an unreadable directory and continue with its siblings', async () => {
    await createFile(tmpDir, 'locked/secret.als');
    await createFile(tmpDir, 'open/visible.als');
    const locked = path.join(tmpDir, 'locked');

    const entries = await collect(enumerateFiles(tmpDir, { fileSystem: deniedFileSystem({ dirs: [locked] }) }));

    expect(filePaths(entries)).toEqual([path.join('open', 'visible.als')]);
    const errors = entries.filter((entry) => entry.type === 'error');
    expect(errors).toEqual([
      {
        type: 'error',
        event: {
          category: 'enumeration',
          path: locked,
          message: `EACCES: permission denied, scandir '${locked}'`,
          code: 'EACCES',
        },
      },
    ]);
  });

  it('should fail with ROOT_INACCESSIBLE when the root cannot be listed', async () => {
    await createFile(tmpDir, 'a.als');
    const source = enumerateFiles(tmpDir, { fileSystem: deniedFileSystem({ dirs: [tmpDir] }) });

    const error = await collect(source).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RecoveryError);
    expect(error).toMatchObject({ code: 'ROOT_INACCESSIBLE' });
  });

  it('should skip excluded directories', async () => {
    await createFile(tmpDir, 'music/Song.als');
    await createFile(tmpDir, 'recovered/ProjectFiles/music/Song.als');

    const entries = await collect(enumerateFiles(tmpDir, { exclude: [path.join(tmpDir, 'recovered')] }));
    expect(filePaths(entries)).toEqual([path.join('music', 'Song.als')]);
  });

  it('should report directories laid out like Live project folders', async () => {
    await createFile(tmpDir, 'Song Project/Song.als');
    await createFile(tmpDir, 'Song Project/Samples/Recorded/take1.wav');
    await createFile(tmpDir, 'Song Project/Ableton Project Info/Project8_1.cfg');
    await createFile(tmpDir, 'plain/samples/kick.wav');

    const entries = await collect(enumerateFiles(tmpDir));
    const folders = entries.filter((entry) => entry.type === 'project-folder');

    expect(folders).toEqual([
      {
        type: 'project-folder',
        folder: { path: path.join(tmpDir, 'Song Project'), markers: ['Ableton Project Info', 'Samples'] },
      },
    ]);
    expect(entries.map(entryPath)).toContain(path.join(tmpDir, 'Song Project'));
  });

  it('should yield the same sequence on a fresh walk', async () => {
    await createFile(tmpDir, 'c/1.als');
    await createFile(tmpDir, 'a/2.als');
    await createFile(tmpDir, 'b/3.txt');

    const first = await collect(enumerateFiles(tmpDir));
    const second = await collect(enumerateFiles(tmpDir));
    expect(second).toEqual(first);
  });
});
