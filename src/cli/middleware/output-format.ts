/**
 * Shared CLI middleware for resolving output format from --human/--json/--quiet flags.
 *
 * Precedence: explicit flag > project default (config) > TTY detection.
 */

import type { OutputFormat } from '../../types/config.js';
import { MirrorError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';

/** Resolved output format with its provenance. */
export interface FlagResolution {
  format: OutputFormat;
  source: 'flag' | 'project' | 'default';
  quiet: boolean;
}

/**
 * Resolve output format from Commander.js option values.
 *
 * @param opts - Commander.js parsed options object
 * @param defaults - Optional project default from config
 * @param isTTY - Whether stdout is a terminal (used when nothing else decides)
 */
export function resolveFormat(
  opts: Record<string, unknown>,
  defaults?: { projectDefault?: OutputFormat },
  isTTY: boolean = process.stdout.isTTY === true,
): FlagResolution {
  const jsonFlag = opts['json'] === true;
  const humanFlag = opts['human'] === true;
  const quiet = opts['quiet'] === true;

  if (jsonFlag && humanFlag) {
    throw new MirrorError(
      ExitCode.INVALID_INPUT,
      'Options --json and --human are mutually exclusive',
    );
  }
  if (jsonFlag) return { format: 'json', source: 'flag', quiet };
  if (humanFlag) return { format: 'human', source: 'flag', quiet };
  if (defaults?.projectDefault) {
    return { format: defaults.projectDefault, source: 'project', quiet };
  }
  return { format: isTTY ? 'human' : 'json', source: 'default', quiet };
}
