import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getFileSizeBytes, removeFile, safeReadFile, safeWriteFile } from './file.js';

describe('file helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cutline-utils-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes into missing directories and reads back', async () => {
    const target = join(dir, 'nested', 'deeper', 'note.txt');
    await safeWriteFile(target, 'hello');
    expect(await safeReadFile(target)).toBe('hello');
    expect(await getFileSizeBytes(target)).toBe(5);
  });

  it('returns null for missing files', async () => {
    expect(await safeReadFile(join(dir, 'missing.txt'))).toBeNull();
    expect(await getFileSizeBytes(join(dir, 'missing.txt'))).toBeNull();
  });

  it('reports whether removeFile deleted anything', async () => {
    const target = join(dir, 'partial.mp4');
    await writeFile(target, 'x');
    expect(await removeFile(target)).toBe(true);
    expect(await removeFile(target)).toBe(false);
    expect(await getFileSizeBytes(target)).toBeNull();
  });
});
