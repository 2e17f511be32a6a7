/**
 * Canonical instructions sync.
 *
 * Mirrors one canonical Markdown file byte-for-byte to the per-assistant
 * locations listed in config (Copilot, Claude, Cursor, .github/).
 *
 * Handles:
 *   1. Copying the canonical file to every target, overwriting unconditionally
 *   2. Dry runs that report what would be written
 *   3. Read-only drift checks for CI and pre-commit hooks
 */

import { createHash } from 'node:crypto';
import { stat } from 'node:fs/promises';
import { relative } from 'node:path';
import { atomicWrite, safeReadBytes } from '../store/atomic.js';
import { MirrorError, errnoCode } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { getLogger } from './logger.js';
import { resolveProjectPath } from './paths.js';

// ── Types ────────────────────────────────────────────────────────────

export type SyncAction = 'created' | 'updated' | 'unchanged' | 'planned';

export interface SyncTargetResult {
  path: string;
  relativePath: string;
  action: SyncAction;
}

export interface SyncResult {
  projectRoot: string;
  source: string;
  bytes: number;
  checksum: string;
  dryRun: boolean;
  targets: SyncTargetResult[];
}

export type DriftStatus = 'in-sync' | 'drifted' | 'missing';

export interface DriftEntry {
  path: string;
  relativePath: string;
  status: DriftStatus;
}

export interface DriftReport {
  projectRoot: string;
  source: string;
  checksum: string;
  inSync: boolean;
  entries: DriftEntry[];
}

export interface SyncOptions {
  /** Canonical file, relative to the project root. */
  canonical: string;
  /** Mirror destinations, relative to the project root. */
  targets: readonly string[];
  dryRun?: boolean;
}

// ── Helpers ──────────────────────────────────────────────────────────

/** Truncated SHA-256 of file bytes (16 hex chars). */
export function checksumBytes(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex').substring(0, 16);
}

/**
 * Read the canonical file, failing with NOT_FOUND when it is absent or not a file.
 */
async function readCanonical(sourcePath: string): Promise<Buffer> {
  let isFile = false;
  try {
    isFile = (await stat(sourcePath)).isFile();
  } catch (err) {
    if (errnoCode(err) !== 'ENOENT' && errnoCode(err) !== 'ENOTDIR') {
      throw new MirrorError(ExitCode.FILE_ERROR, `Failed to read: ${sourcePath}`, { cause: err });
    }
  }

  const data = isFile ? await safeReadBytes(sourcePath) : null;
  if (data === null) {
    throw new MirrorError(
      ExitCode.NOT_FOUND,
      `Canonical instructions not found: ${sourcePath}`,
      { fix: 'Create the file or point `canonical` at it with `imirror config set canonical <path>`' },
    );
  }
  return data;
}

/**
 * Resolve target paths against the project root, dropping duplicates and
 * rejecting a target that is the canonical file itself.
 */
function resolveTargets(projectRoot: string, sourcePath: string, targets: readonly string[]): string[] {
  const resolved: string[] = [];
  for (const target of targets) {
    const abs = resolveProjectPath(target, projectRoot);
    if (abs === sourcePath) {
      throw new MirrorError(
        ExitCode.INVALID_INPUT,
        `Target is the canonical file itself: ${target}`,
        { fix: 'Remove it from `targets`' },
      );
    }
    if (!resolved.includes(abs)) {
      resolved.push(abs);
    }
  }
  return resolved;
}

// ── syncInstructions ─────────────────────────────────────────────────

/**
 * Copy the canonical instructions file to every configured target.
 *
 * The source is verified before anything is touched: when it is missing no
 * target is written or created. Each target is written atomically, with its
 * parent directory created on demand. A failed write aborts the run; targets
 * written before it keep the new content.
 */
export async function syncInstructions(
  projectRoot: string,
  opts: SyncOptions,
): Promise<SyncResult> {
  const log = getLogger('sync');
  const sourcePath = resolveProjectPath(opts.canonical, projectRoot);
  const data = await readCanonical(sourcePath);
  const targets = resolveTargets(projectRoot, sourcePath, opts.targets);
  const dryRun = opts.dryRun ?? false;

  const results: SyncTargetResult[] = [];
  for (const targetPath of targets) {
    const existing = await safeReadBytes(targetPath);
    let action: SyncAction;
    if (dryRun) {
      action = 'planned';
    } else if (existing === null) {
      action = 'created';
    } else if (existing.equals(data)) {
      action = 'unchanged';
    } else {
      action = 'updated';
    }

    if (!dryRun) {
      await atomicWrite(targetPath, data);
    }

    log.debug({ target: targetPath, action }, 'target synced');
    results.push({ path: targetPath, relativePath: relative(projectRoot, targetPath), action });
  }

  const result: SyncResult = {
    projectRoot,
    source: sourcePath,
    bytes: data.length,
    checksum: checksumBytes(data),
    dryRun,
    targets: results,
  };
  log.info({ source: sourcePath, targets: results.length, dryRun }, 'canonical instructions synced');
  return result;
}

// ── checkInstructions ────────────────────────────────────────────────

/**
 * Compare every target against the canonical file without writing anything.
 */
export async function checkInstructions(
  projectRoot: string,
  opts: Omit<SyncOptions, 'dryRun'>,
): Promise<DriftReport> {
  const sourcePath = resolveProjectPath(opts.canonical, projectRoot);
  const data = await readCanonical(sourcePath);
  const targets = resolveTargets(projectRoot, sourcePath, opts.targets);

  const entries: DriftEntry[] = [];
  for (const targetPath of targets) {
    const existing = await safeReadBytes(targetPath);
    let status: DriftStatus;
    if (existing === null) {
      status = 'missing';
    } else if (existing.equals(data)) {
      status = 'in-sync';
    } else {
      status = 'drifted';
    }
    entries.push({ path: targetPath, relativePath: relative(projectRoot, targetPath), status });
  }

  const inSync = entries.every((e) => e.status === 'in-sync');
  if (!inSync) {
    getLogger('sync').warn(
      { drifted: entries.filter((e) => e.status !== 'in-sync').map((e) => e.relativePath) },
      'mirrored instructions out of sync',
    );
  }

  return {
    projectRoot,
    source: sourcePath,
    checksum: checksumBytes(data),
    inSync,
    entries,
  };
}
