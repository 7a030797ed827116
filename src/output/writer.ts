import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { printVerbose } from '../utils/logger.js';

export interface WriteResult {
  success: boolean;
  filePath: string;
  error?: string;
}

/**
 * Atomically write rendered output using temp-file + rename.
 * Creates parent directories if they don't exist. Never throws.
 */
export async function writeOutputFile(filePath: string, content: string): Promise<WriteResult> {
  const targetPath = resolve(filePath);
  const dir = dirname(targetPath);
  const tempPath = join(dir, `.tmp-${uuidv4()}`);
  let tempStarted = false;

  try {
    await mkdir(dir, { recursive: true });
    tempStarted = true;
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, targetPath);
    return { success: true, filePath: targetPath };
  } catch (err: unknown) {
    // The temp file can only exist once its directory does
    if (tempStarted) {
      await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        printVerbose(`Could not remove ${tempPath}: ${cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr)}`);
      });
    }
    return {
      success: false,
      filePath: targetPath,
      error: `Cannot write ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
}
