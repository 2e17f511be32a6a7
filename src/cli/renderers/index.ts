/**
 * Central output dispatch for CLI commands.
 *
 * Provides cliOutput() which checks the resolved format (JSON/human/quiet)
 * and dispatches to either the JSON envelope (formatSuccess) or a
 * human-readable renderer.
 *
 * Commands call:
 *   cliOutput(data, { command: 'sync', render: renderSync })
 */

import { getFormatContext } from '../format-context.js';
import { formatError, formatSuccess } from '../../core/output.js';
import { MirrorError } from '../../core/errors.js';
import { renderGeneric } from './mirror.js';

/** A human renderer for one command's result. */
export type HumanRenderer<T> = (data: T, quiet: boolean) => string;

export interface CliOutputOptions<T> {
  /** Command name (used as the envelope operation when none is given). */
  command: string;
  /** Human renderer; falls back to key-value rendering. */
  render?: HumanRenderer<T>;
  /** Optional success message for the JSON envelope. */
  message?: string;
  /** Operation name for the envelope _meta. */
  operation?: string;
}

/**
 * Output data to stdout in the resolved format (JSON or human-readable).
 */
export function cliOutput<T>(data: T, opts: CliOutputOptions<T>): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    const text = opts.render ? opts.render(data, ctx.quiet) : renderGeneric(data, ctx.quiet);
    if (text) {
      console.log(text);
    }
    return;
  }

  console.log(formatSuccess(data, opts.message, opts.operation ?? opts.command));
}

/**
 * Report a MirrorError in the resolved format and exit with its code.
 * Anything that is not a MirrorError is rethrown.
 */
export function handleCliError(err: unknown, command: string): never {
  if (!(err instanceof MirrorError)) {
    throw err;
  }
  if (getFormatContext().format === 'human') {
    console.error(`Error: ${err.message}`);
    if (err.fix) console.error(`  Fix: ${err.fix}`);
  } else {
    console.error(formatError(err, command));
  }
  process.exit(err.code);
}
