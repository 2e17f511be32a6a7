/**
 * Atomic file write operations using write-file-atomic.
 * Ensures writes are crash-safe: temp file -> rename.
 */

import writeFileAtomic from 'write-file-atomic';
import { readFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { MirrorError, errnoCode } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Write data to a file atomically.
 * Creates parent directories if they don't exist.
 * Uses write-file-atomic for crash-safe writes (temp file -> rename).
 */
export async function atomicWrite(
  filePath: string,
  data: string | Buffer,
  options?: { mode?: number; encoding?: BufferEncoding },
): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data, {
      encoding: options?.encoding ?? 'utf8',
      mode: options?.mode,
    });
  } catch (err) {
    throw new MirrorError(
      ExitCode.FILE_ERROR,
      `Atomic write failed: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read a file as raw bytes.
 * Returns null if the file does not exist.
 */
export async function safeReadBytes(filePath: string): Promise<Buffer | null> {
  try {
    return await readFile(filePath);
  } catch (err: unknown) {
    if (errnoCode(err) === 'ENOENT') {
      return null;
    }
    throw new MirrorError(
      ExitCode.FILE_ERROR,
      `Failed to read: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read a file and return its contents.
 * Returns null if the file does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  const bytes = await safeReadBytes(filePath);
  return bytes === null ? null : bytes.toString('utf8');
}

/**
 * Write JSON data atomically with consistent formatting.
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options?: { indent?: number },
): Promise<void> {
  const json = JSON.stringify(data, null, options?.indent ?? 2) + '\n';
  await atomicWrite(filePath, json);
}
