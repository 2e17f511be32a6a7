/**
 * CLI sync command - mirror the canonical instructions file.
 */

import { Command } from 'commander';
import { syncInstructions } from '../../core/sync.js';
import { cliOutput, handleCliError } from '../renderers/index.js';
import { renderSync } from '../renderers/mirror.js';
import { getCommandContext } from '../command-context.js';

/**
 * Register the sync command.
 */
export function registerSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Copy the canonical instructions file to every mirror target')
    .option('--dry-run', 'Show what would be written without writing')
    .action(async (opts: { dryRun?: boolean }) => {
      try {
        const { projectRoot, config } = getCommandContext();
        const result = await syncInstructions(projectRoot, {
          canonical: config.canonical,
          targets: config.targets,
          dryRun: opts.dryRun ?? false,
        });
        cliOutput(result, {
          command: 'sync',
          render: renderSync,
          message: `${result.dryRun ? 'Would sync' : 'Synced'} ${result.targets.length} target(s)`,
        });
      } catch (err) {
        handleCliError(err, 'sync');
      }
    });
}
