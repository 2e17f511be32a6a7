/**
 * imirror exit codes.
 * Ranges: 0 = success, 1-9 = general errors, 10-19 = sync, 20-29 = git.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  DEPENDENCY_ERROR = 5,
  VALIDATION_ERROR = 6,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,

  // === SYNC (10-19) ===
  DRIFT_DETECTED = 10,

  // === GIT (20-29) ===
  GIT_ERROR = 20,
}

/** Check if an exit code represents an error. */
export function isErrorCode(code: ExitCode): boolean {
  return code !== ExitCode.SUCCESS;
}

/** Check if an exit code is recoverable (retry may succeed). */
export function isRecoverableCode(code: ExitCode): boolean {
  const nonRecoverable = new Set<ExitCode>([
    ExitCode.INVALID_INPUT,
    ExitCode.DEPENDENCY_ERROR,
    ExitCode.VALIDATION_ERROR,
    ExitCode.CONFIG_ERROR,
  ]);

  if (!isErrorCode(code)) return false;
  return !nonRecoverable.has(code);
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
