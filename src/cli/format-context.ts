/**
 * CLI output format resolution context.
 *
 * Singleton that holds the resolved output format for the current CLI invocation.
 * Set once in the Commander.js preAction hook; read by cliOutput() and renderers.
 */

import type { FlagResolution } from './middleware/output-format.js';

/**
 * Current resolved format for this CLI invocation.
 * Defaults to human until resolved by the preAction hook.
 */
let currentResolution: FlagResolution = {
  format: 'human',
  source: 'default',
  quiet: false,
};

/**
 * Set the resolved format for this CLI invocation.
 */
export function setFormatContext(resolution: FlagResolution): void {
  currentResolution = resolution;
}

/**
 * Get the current resolved format.
 */
export function getFormatContext(): FlagResolution {
  return currentResolution;
}
