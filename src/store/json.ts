/**
 * JSON read and locked update for imirror config files.
 */

import { atomicWriteJson, safeReadFile } from './atomic.js';
import { withLock } from './lock.js';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { MirrorError, errnoCode } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  try {
    return JSON.parse(content);
  } catch (err) {
    throw new MirrorError(
      ExitCode.VALIDATION_ERROR,
      `Invalid JSON in: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read a JSON file that must hold an object.
 * Returns null if the file does not exist.
 */
export async function readJsonObject(filePath: string): Promise<Record<string, unknown> | null> {
  const data = await readJson(filePath);
  if (data === null) return null;
  if (!isPlainObject(data)) {
    throw new MirrorError(
      ExitCode.VALIDATION_ERROR,
      `Expected a JSON object in: ${filePath}`,
    );
  }
  return data;
}

/**
 * Read-modify-write a JSON object file under an exclusive lock.
 *   1. Create the file as `{}` if absent (proper-lockfile locks existing paths only)
 *   2. Acquire lock
 *   3. Re-read, apply update, atomic write (temp file -> rename)
 *   4. Release lock
 *
 * An update that throws leaves the file as it was.
 */
export async function updateJsonObject(
  filePath: string,
  update: (current: Record<string, unknown>) => Record<string, unknown>,
): Promise<Record<string, unknown>> {
  await ensureJsonFile(filePath);
  return withLock(filePath, async () => {
    const next = update((await readJsonObject(filePath)) ?? {});
    await atomicWriteJson(filePath, next);
    return next;
  });
}

async function ensureJsonFile(filePath: string): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, '{}\n', { encoding: 'utf-8', flag: 'wx' });
  } catch (err) {
    if (errnoCode(err) === 'EEXIST') return;
    throw new MirrorError(
      ExitCode.FILE_ERROR,
      `Failed to create: ${filePath}`,
      { cause: err },
    );
  }
}

/** Type guard for non-array objects. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
