import { readFile, stat } from 'node:fs/promises';
import type { InputErrorReason, ReadResult } from './types.js';

/**
 * Load a configuration export from disk. Never throws: a missing, non-file or
 * unreadable path comes back as a failed result with a reason.
 */
export async function readConfigFile(path: string): Promise<ReadResult> {
  let sizeBytes: number;
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      return failure(path, 'not_a_file', `Path is not a file: ${path}`);
    }
    sizeBytes = info.size;
  } catch (err: unknown) {
    if (errorCode(err) === 'ENOENT' || errorCode(err) === 'ENOTDIR') {
      return failure(path, 'not_found', `Configuration file not found: ${path}`);
    }
    return failure(path, 'unreadable', `Cannot access ${path}: ${errorMessage(err)}`);
  }

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    return failure(path, 'unreadable', `Cannot read ${path}: ${errorMessage(err)}`);
  }

  // Strip UTF-8 BOM
  if (content.charCodeAt(0) === 0xfeff) {
    content = content.slice(1);
  }

  return { success: true, path, content, sizeBytes };
}

function failure(path: string, reason: InputErrorReason, error: string): ReadResult {
  return { success: false, path, reason, error };
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
