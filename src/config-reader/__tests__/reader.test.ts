import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { readConfigFile } from '../reader.js';
import { parseConfig } from '../parser.js';

// ---------------------------------------------------------------------------
// Setup / Teardown
// ---------------------------------------------------------------------------

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'reader-test-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

const CONFIG = `\
config firewall policy
    edit 1
        set name "File-Test-Rule"
        set action accept
    next
end
`;

// ---------------------------------------------------------------------------
// readConfigFile
// ---------------------------------------------------------------------------

describe('readConfigFile', () => {
  it('reads the file content and size', async () => {
    const filePath = join(tempDir, 'fw.conf');
    await writeFile(filePath, CONFIG, 'utf-8');

    const result = await readConfigFile(filePath);
    expect(result).toEqual({
      success: true,
      path: filePath,
      content: CONFIG,
      sizeBytes: Buffer.byteLength(CONFIG),
    });
  });

  it('feeds the parser', async () => {
    const filePath = join(tempDir, 'fw.conf');
    await writeFile(filePath, CONFIG, 'utf-8');

    const result = await readConfigFile(filePath);
    if (!result.success) throw new Error(result.error);
    expect(parseConfig(result.content)).toEqual([{ id: 1, name: 'File-Test-Rule' }]);
  });

  it('strips a UTF-8 byte order mark', async () => {
    const filePath = join(tempDir, 'bom.conf');
    await writeFile(filePath, '\uFEFF' + CONFIG, 'utf-8');

    const result = await readConfigFile(filePath);
    expect(result.success && result.content).toBe(CONFIG);
  });

  it('reports a missing file as not_found', async () => {
    const filePath = join(tempDir, 'missing.conf');

    const result = await readConfigFile(filePath);
    expect(result).toEqual({
      success: false,
      path: filePath,
      reason: 'not_found',
      error: `Configuration file not found: ${filePath}`,
    });
  });

  it('reports a missing parent directory as not_found', async () => {
    const result = await readConfigFile(join(tempDir, 'nope', 'fw.conf'));
    expect(result.success).toBe(false);
    expect(!result.success && result.reason).toBe('not_found');
  });

  it('reports a directory as not_a_file', async () => {
    const dirPath = join(tempDir, 'configs');
    await mkdir(dirPath);

    const result = await readConfigFile(dirPath);
    expect(result).toEqual({
      success: false,
      path: dirPath,
      reason: 'not_a_file',
      error: `Path is not a file: ${dirPath}`,
    });
  });

  it('reads an empty file as empty content', async () => {
    const filePath = join(tempDir, 'empty.conf');
    await writeFile(filePath, '', 'utf-8');

    const result = await readConfigFile(filePath);
    expect(result).toEqual({ success: true, path: filePath, content: '', sizeBytes: 0 });
  });
});
