import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { findFileSizeBytes, safeReadFile, safeWriteFile } from './file.js';

describe('file operations', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vidshrink-utils-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports the size of an existing file', async () => {
    const file = join(dir, 'out.mp4');
    await writeFile(file, Buffer.alloc(2048));
    expect(await findFileSizeBytes(file)).toBe(2048);
  });

  it('returns undefined for a missing file', async () => {
    expect(await findFileSizeBytes(join(dir, 'missing.mp4'))).toBeUndefined();
  });

  it('writes into directories that do not exist yet', async () => {
    const file = join(dir, 'nested', 'config.json');
    await safeWriteFile(file, '{"a":1}');
    expect(await safeReadFile(file)).toBe('{"a":1}');
  });

  it('reads a missing file as null', async () => {
    expect(await safeReadFile(join(dir, 'nope.json'))).toBeNull();
  });
});
