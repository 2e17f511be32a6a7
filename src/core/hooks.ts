/**
 * Git hooks path management.
 *
 * Points git at the repository's versioned hooks directory through the
 * local `core.hooksPath` setting, and reports on the current state.
 */

import { readdir, stat } from 'node:fs/promises';
import { getGitConfig, setGitConfig } from './git.js';
import { MirrorError, errnoCode } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { getLogger } from './logger.js';
import { resolveProjectPath } from './paths.js';

// ── Types ────────────────────────────────────────────────────────────

export interface HooksInstallResult {
  projectRoot: string;
  key: typeof HOOKS_PATH_KEY;
  hooksPath: string;
  previous: string | null;
  action: 'set' | 'unchanged';
}

export interface HooksStatus {
  projectRoot: string;
  key: typeof HOOKS_PATH_KEY;
  expected: string;
  current: string | null;
  configured: boolean;
  directoryExists: boolean;
  hooks: string[];
}

export interface InstallHooksPathOptions {
  /** Value to store in core.hooksPath. */
  hooksPath: string;
}

// ── Constants ────────────────────────────────────────────────────────

/** Git config key holding the hooks directory. */
export const HOOKS_PATH_KEY = 'core.hooksPath';

// ── installHooksPath ─────────────────────────────────────────────────

/**
 * Set core.hooksPath for the repository at projectRoot.
 *
 * The directory is not required to exist. Running twice is a no-op the
 * second time. Git failures propagate as MirrorError.
 */
export async function installHooksPath(
  projectRoot: string,
  opts: InstallHooksPathOptions,
): Promise<HooksInstallResult> {
  const previous = await getGitConfig(HOOKS_PATH_KEY, projectRoot);

  if (previous === opts.hooksPath) {
    return {
      projectRoot,
      key: HOOKS_PATH_KEY,
      hooksPath: opts.hooksPath,
      previous,
      action: 'unchanged',
    };
  }

  await setGitConfig(HOOKS_PATH_KEY, opts.hooksPath, projectRoot);
  getLogger('hooks').info({ previous, hooksPath: opts.hooksPath }, 'git hooks path set');

  return {
    projectRoot,
    key: HOOKS_PATH_KEY,
    hooksPath: opts.hooksPath,
    previous,
    action: 'set',
  };
}

// ── getHooksStatus ───────────────────────────────────────────────────

/**
 * Report the configured hooks path and what the expected directory holds.
 */
export async function getHooksStatus(
  projectRoot: string,
  opts: InstallHooksPathOptions,
): Promise<HooksStatus> {
  const current = await getGitConfig(HOOKS_PATH_KEY, projectRoot);
  const dir = resolveProjectPath(opts.hooksPath, projectRoot);

  let directoryExists = false;
  try {
    directoryExists = (await stat(dir)).isDirectory();
  } catch (err) {
    const code = errnoCode(err);
    if (code !== 'ENOENT' && code !== 'ENOTDIR') {
      throw new MirrorError(ExitCode.FILE_ERROR, `Failed to inspect hooks directory: ${dir}`, { cause: err });
    }
  }

  let hooks: string[] = [];
  if (directoryExists) {
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      hooks = entries.filter((e) => e.isFile()).map((e) => e.name).sort();
    } catch (err) {
      throw new MirrorError(ExitCode.FILE_ERROR, `Failed to list hooks directory: ${dir}`, { cause: err });
    }
  }

  return {
    projectRoot,
    key: HOOKS_PATH_KEY,
    expected: opts.hooksPath,
    current,
    configured: current === opts.hooksPath,
    directoryExists,
    hooks,
  };
}
