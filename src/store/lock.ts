/**
 * File locking using proper-lockfile.
 * Serialises read-modify-write cycles on imirror config files.
 */

import lockfile from 'proper-lockfile';
import { MirrorError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

const LOCK_OPTIONS = {
  retries: {
    retries: 5,
    minTimeout: 50,
    maxTimeout: 1000,
    factor: 2,
  },
  stale: 10_000,
  realpath: false,
};

/**
 * Run fn while holding an exclusive lock on filePath.
 * The file must exist. The lock is released whether fn resolves or throws.
 */
export async function withLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(filePath, LOCK_OPTIONS);
  } catch (err) {
    throw new MirrorError(
      ExitCode.LOCK_TIMEOUT,
      `Failed to acquire lock: ${filePath}`,
      { fix: 'Another imirror process may be writing this file. Wait and retry.', cause: err },
    );
  }
  try {
    return await fn();
  } finally {
    await release();
  }
}
