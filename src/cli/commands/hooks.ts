/**
 * CLI hooks command - manage core.hooksPath.
 */

import { Command } from 'commander';
import { installHooksPath, getHooksStatus } from '../../core/hooks.js';
import { cliOutput, handleCliError } from '../renderers/index.js';
import { renderHooksInstall, renderHooksStatus } from '../renderers/mirror.js';
import { getCommandContext } from '../command-context.js';

/**
 * Register the hooks command group.
 */
export function registerHooksCommand(program: Command): void {
  const hooks = program
    .command('hooks')
    .description('Manage the git hooks path (core.hooksPath)');

  hooks
    .command('install')
    .description('Point core.hooksPath at the versioned hooks directory')
    .option('--path <dir>', 'Hooks directory to use instead of hooks.path from config')
    .action(async (opts: { path?: string }) => {
      try {
        const { projectRoot, config } = getCommandContext();
        const result = await installHooksPath(projectRoot, {
          hooksPath: opts.path ?? config.hooks.path,
        });
        cliOutput(result, { command: 'hooks install', render: renderHooksInstall });
      } catch (err) {
        handleCliError(err, 'hooks install');
      }
    });

  hooks
    .command('status')
    .description('Show core.hooksPath and the hooks directory contents')
    .action(async () => {
      try {
        const { projectRoot, config } = getCommandContext();
        const status = await getHooksStatus(projectRoot, { hooksPath: config.hooks.path });
        cliOutput(status, { command: 'hooks status', render: renderHooksStatus });
      } catch (err) {
        handleCliError(err, 'hooks status');
      }
    });
}
