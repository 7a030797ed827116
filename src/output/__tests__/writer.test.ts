import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, readdir, mkdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { writeOutputFile } from '../writer.js';

// ---------------------------------------------------------------------------
// Setup / Teardown
// ---------------------------------------------------------------------------

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'writer-test-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// writeOutputFile
// ---------------------------------------------------------------------------

describe('writeOutputFile', () => {
  it('writes the content verbatim', async () => {
    const filePath = join(tempDir, 'rules.csv');

    const result = await writeOutputFile(filePath, 'id,name\n1,Web\n');
    expect(result).toEqual({ success: true, filePath });
    expect(await readFile(filePath, 'utf-8')).toBe('id,name\n1,Web\n');
  });

  it('creates parent directories if needed', async () => {
    const filePath = join(tempDir, 'a', 'b', 'rules.txt');

    const result = await writeOutputFile(filePath, 'Web\n');
    expect(result.success).toBe(true);
    expect(await readFile(filePath, 'utf-8')).toBe('Web\n');
  });

  it('overwrites an existing file', async () => {
    const filePath = join(tempDir, 'rules.txt');
    await writeOutputFile(filePath, 'old\n');
    await writeOutputFile(filePath, 'new\n');

    expect(await readFile(filePath, 'utf-8')).toBe('new\n');
  });

  it('leaves no temp files behind', async () => {
    await writeOutputFile(join(tempDir, 'rules.txt'), 'Web\n');

    expect(await readdir(tempDir)).toEqual(['rules.txt']);
  });

  it('returns an error when the target is a directory', async () => {
    const dirPath = join(tempDir, 'out');
    await mkdir(dirPath);

    const result = await writeOutputFile(dirPath, 'Web\n');
    expect(result.success).toBe(false);
    expect(result.filePath).toBe(dirPath);
    expect(result.error).toMatch(/^Cannot write /);
    expect(await readdir(tempDir)).toEqual(['out']);
  });

  it('returns an error when the parent path is a regular file', async () => {
    const plainFile = join(tempDir, 'plain.txt');
    await writeFile(plainFile, 'not a directory\n', 'utf-8');
    const filePath = join(plainFile, 'out.csv');

    const result = await writeOutputFile(filePath, 'id,name\n');
    expect(result.success).toBe(false);
    expect(result.filePath).toBe(filePath);
    expect(result.error).toMatch(/^Cannot write .*plain\.txt\/out\.csv: /);
    expect(await readFile(plainFile, 'utf-8')).toBe('not a directory\n');
  });
});
