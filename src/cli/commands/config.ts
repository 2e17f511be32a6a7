/**
 * CLI config command - read and write imirror configuration.
 */

import { Command } from 'commander';
import { getConfigValue, loadConfigDocument, setConfigValue } from '../../core/config.js';
import { cliOutput, handleCliError } from '../renderers/index.js';
import { renderConfigValue } from '../renderers/mirror.js';
import { getCommandContext } from '../command-context.js';

/**
 * Register the config command group.
 */
export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Read and write configuration');

  config
    .command('get <key>')
    .description('Show a config value and where it came from')
    .action(async (key: string) => {
      try {
        const { projectRoot } = getCommandContext();
        const resolved = await getConfigValue(key, projectRoot);
        cliOutput({ key, ...resolved }, { command: 'config get', render: renderConfigValue });
      } catch (err) {
        handleCliError(err, 'config get');
      }
    });

  config
    .command('set <key> <value>')
    .description('Set a config value in the project (or global) config file')
    .option('--global', 'Write to the global config instead of the project config')
    .action(async (key: string, value: string, opts: { global?: boolean }) => {
      try {
        const { projectRoot } = getCommandContext();
        const result = await setConfigValue(key, value, projectRoot, { global: opts.global });
        cliOutput(result, { command: 'config set', message: `Set ${key} in ${result.scope} config` });
      } catch (err) {
        handleCliError(err, 'config set');
      }
    });

  config
    .command('list')
    .description('Show the merged configuration, valid or not')
    .action(async () => {
      try {
        const { projectRoot } = getCommandContext();
        cliOutput(await loadConfigDocument(projectRoot), { command: 'config list' });
      } catch (err) {
        handleCliError(err, 'config list');
      }
    });
}
