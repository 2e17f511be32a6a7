/**
 * Thin wrapper around the git binary.
 *
 * Every call goes through runGit so failures surface as MirrorError with
 * git's own stderr attached.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { MirrorError, errnoCode } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

const execFileAsync = promisify(execFile);

export interface GitResult {
  stdout: string;
  stderr: string;
}

/** Exit status of a failed child process, if it exited normally. */
function exitStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return undefined;
}

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err && typeof err.stderr === 'string') {
    return err.stderr.trim();
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run a git command in `cwd`.
 *
 * @param okExitCodes - Non-zero exit statuses to treat as a normal result
 */
export async function runGit(
  args: string[],
  cwd: string,
  okExitCodes: readonly number[] = [],
): Promise<GitResult & { exitCode: number }> {
  try {
    const { stdout, stderr } = await execFileAsync('git', args, { cwd, encoding: 'utf8' });
    return { stdout, stderr, exitCode: 0 };
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new MirrorError(
        ExitCode.DEPENDENCY_ERROR,
        'git executable not found on PATH',
        { fix: 'Install git and retry', cause: err },
      );
    }
    const status = exitStatus(err);
    if (status !== undefined && okExitCodes.includes(status)) {
      return { stdout: '', stderr: stderrOf(err), exitCode: status };
    }
    throw new MirrorError(
      ExitCode.GIT_ERROR,
      `git ${args.join(' ')} failed: ${stderrOf(err)}`,
      { cause: err },
    );
  }
}

/**
 * Read a local git config value. Returns null when the key is unset.
 */
export async function getGitConfig(key: string, cwd: string): Promise<string | null> {
  // `git config --get` exits 1 when the key is missing
  const result = await runGit(['config', '--local', '--get', key], cwd, [1]);
  if (result.exitCode !== 0) return null;
  return result.stdout.trim();
}

/**
 * Write a local git config value.
 */
export async function setGitConfig(key: string, value: string, cwd: string): Promise<void> {
  await runGit(['config', '--local', key, value], cwd);
}
