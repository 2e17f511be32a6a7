/**
 * Per-invocation command context: resolved project root and config.
 *
 * Populated once by the preAction hook in program.ts; commands read it
 * instead of resolving paths themselves.
 */

import type { MirrorConfig } from '../types/config.js';
import { MirrorError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

export interface CommandContext {
  projectRoot: string;
  config: MirrorConfig;
}

let currentContext: CommandContext | null = null;

export function setCommandContext(ctx: CommandContext | null): void {
  currentContext = ctx;
}

export function getCommandContext(): CommandContext {
  if (!currentContext) {
    throw new MirrorError(ExitCode.GENERAL_ERROR, 'Command context used before initialisation');
  }
  return currentContext;
}
