#!/usr/bin/env node
/**
 * imirror CLI entry point.
 */

import { createProgram } from './program.js';
import { closeLogger } from '../core/logger.js';
import { getNodeVersionInfo, getNodeUpgradeInstructions, MINIMUM_NODE_MAJOR } from '../core/platform.js';

// Startup guard: fail fast if Node.js version is below minimum
const nodeInfo = getNodeVersionInfo();
if (!nodeInfo.meetsMinimum) {
  process.stderr.write(
    `\nError: imirror requires Node.js v${MINIMUM_NODE_MAJOR}+ but found v${nodeInfo.version}\n`
    + `\nUpgrade options:\n`
    + getNodeUpgradeInstructions().map(i => `  - ${i}`).join('\n')
    + `\n\n`,
  );
  process.exit(1);
}

createProgram()
  .parseAsync()
  .then(() => closeLogger())
  .catch((err: unknown) => {
    closeLogger();
    process.stderr.write(`imirror: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exit(1);
  });
