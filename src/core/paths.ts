/**
 * Path resolution for imirror.
 *
 * Environment variables:
 *   IMIRROR_HOME - Global directory (default: ~/.imirror)
 *   IMIRROR_ROOT - Project root override (default: nearest repository root)
 */

import { resolve, dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { existsSync } from 'node:fs';

/** Project-local state directory name. */
export const STATE_DIR_NAME = '.imirror';

/**
 * Get the global imirror home directory.
 * Respects IMIRROR_HOME env var, defaults to ~/.imirror.
 */
export function getMirrorHome(): string {
  return process.env['IMIRROR_HOME'] ?? join(homedir(), STATE_DIR_NAME);
}

/**
 * Find the project root for a working directory.
 *
 * Walks up from `cwd` to the nearest directory holding `.git` or `.imirror`.
 * Falls back to `cwd` itself when neither is found.
 */
export function findProjectRoot(cwd: string = process.cwd()): string {
  const start = resolve(cwd);
  let current = start;
  for (;;) {
    if (existsSync(join(current, '.git')) || existsSync(join(current, STATE_DIR_NAME))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) return start;
    current = parent;
  }
}

/**
 * Resolve the project root, honouring an explicit --root flag, then IMIRROR_ROOT.
 */
export function resolveProjectRoot(explicit?: string, cwd: string = process.cwd()): string {
  if (explicit) return resolve(cwd, explicit);
  const fromEnv = process.env['IMIRROR_ROOT'];
  if (fromEnv) return resolve(cwd, fromEnv);
  return findProjectRoot(cwd);
}

/**
 * Get the absolute path to the project state directory.
 */
export function getStateDir(projectRoot: string): string {
  return join(projectRoot, STATE_DIR_NAME);
}

/**
 * Get the path to the project's config.json file.
 */
export function getConfigPath(projectRoot: string): string {
  return join(getStateDir(projectRoot), 'config.json');
}

/**
 * Get the global config file path.
 */
export function getGlobalConfigPath(): string {
  return join(getMirrorHome(), 'config.json');
}

/**
 * Resolve a project-relative path to an absolute path.
 */
export function resolveProjectPath(relativePath: string, projectRoot: string): string {
  if (isAbsolutePath(relativePath)) {
    return resolve(relativePath);
  }
  // Expand leading tilde
  if (relativePath.startsWith('~/') || relativePath === '~') {
    return resolve(homedir(), relativePath.slice(2));
  }
  return resolve(projectRoot, relativePath);
}

/**
 * Check if a path is absolute (POSIX or Windows).
 */
export function isAbsolutePath(path: string): boolean {
  // POSIX absolute
  if (path.startsWith('/')) return true;
  // Windows drive letter (C:\, D:/)
  if (/^[A-Za-z]:[\\/]/.test(path)) return true;
  // UNC path
  if (path.startsWith('\\\\')) return true;
  return false;
}
