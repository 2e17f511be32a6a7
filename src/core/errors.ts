/**
 * imirror error type with exit code integration.
 */

import { ExitCode, getExitCodeName, isRecoverableCode } from '../types/exit-codes.js';

/** Structured error shape emitted in JSON output. */
export interface MirrorErrorShape {
  code: ExitCode;
  name: string;
  message: string;
  retryable: boolean;
  fix?: string;
}

/**
 * Structured error class for imirror operations.
 * Carries an exit code, human-readable message, and an optional fix suggestion.
 */
export class MirrorError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'MirrorError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Error body without the envelope. */
  toShape(): MirrorErrorShape {
    return {
      code: this.code,
      name: getExitCodeName(this.code),
      message: this.message,
      retryable: isRecoverableCode(this.code),
      ...(this.fix && { fix: this.fix }),
    };
  }

  /** Structured JSON representation. */
  toJSON(): { success: false; error: MirrorErrorShape } {
    return {
      success: false,
      error: this.toShape(),
    };
  }
}

/** Narrow an unknown thrown value to a Node.js errno code, if it carries one. */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
