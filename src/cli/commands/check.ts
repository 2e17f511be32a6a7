/**
 * CLI check command - report mirrors that drifted from the canonical file.
 */

import { Command } from 'commander';
import { checkInstructions } from '../../core/sync.js';
import { cliOutput, handleCliError } from '../renderers/index.js';
import { renderCheck } from '../renderers/mirror.js';
import { getCommandContext } from '../command-context.js';
import { ExitCode } from '../../types/exit-codes.js';

/**
 * Register the check command.
 * Exits with DRIFT_DETECTED when any mirror is missing or differs.
 */
export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Verify every mirror target matches the canonical instructions file')
    .action(async () => {
      try {
        const { projectRoot, config } = getCommandContext();
        const report = await checkInstructions(projectRoot, {
          canonical: config.canonical,
          targets: config.targets,
        });
        cliOutput(report, { command: 'check', render: renderCheck });
        if (!report.inSync) {
          process.exit(ExitCode.DRIFT_DETECTED);
        }
      } catch (err) {
        handleCliError(err, 'check');
      }
    });
}
