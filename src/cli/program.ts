/**
 * Commander program for the imirror CLI.
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { registerSyncCommand } from './commands/sync.js';
import { registerCheckCommand } from './commands/check.js';
import { registerHooksCommand } from './commands/hooks.js';
import { registerConfigCommand } from './commands/config.js';
import { resolveFormat } from './middleware/output-format.js';
import { setFormatContext } from './format-context.js';
import { setCommandContext } from './command-context.js';
import { cliOutput, handleCliError } from './renderers/index.js';
import { renderVersion } from './renderers/mirror.js';
import { initLogger, getLogger } from '../core/logger.js';
import { getDefaultConfig, loadConfig } from '../core/config.js';
import { MirrorError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import type { MirrorConfig } from '../types/config.js';
import { getStateDir, resolveProjectRoot } from '../core/paths.js';

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  try {
    // src/cli/program.ts and dist/cli/program.js both sit two levels below the package root
    const moduleRoot = join(dirname(fileURLToPath(import.meta.url)), '..', '..');
    const pkg: unknown = JSON.parse(readFileSync(join(moduleRoot, 'package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch (err) {
    getLogger('cli').debug({ err }, 'package.json not readable');
    return '0.0.0';
  }
}

/**
 * Load the validated config. The config commands get null instead of a
 * CONFIG_ERROR so that an invalid file can still be inspected and repaired.
 */
async function loadProjectConfig(projectRoot: string, actionCommand: Command): Promise<MirrorConfig | null> {
  try {
    return await loadConfig(projectRoot);
  } catch (err) {
    if (err instanceof MirrorError && err.code === ExitCode.CONFIG_ERROR && actionCommand.parent?.name() === 'config') {
      return null;
    }
    throw err;
  }
}

/** Global options shared by every command. */
type GlobalOptions = {
  root?: string;
  json?: boolean;
  human?: boolean;
  quiet?: boolean;
};

/**
 * Build the imirror program with every command registered.
 */
export function createProgram(): Command {
  const version = getPackageVersion();
  const program = new Command();

  program
    .name('imirror')
    .description('Mirror a canonical AI-assistant instructions file and manage the git hooks path')
    .version(version)
    .option('--root <dir>', 'Project root (default: nearest directory holding .git or .imirror)')
    .option('--json', 'Output in JSON format')
    .option('--human', 'Output in human-readable format')
    .option('--quiet', 'Suppress non-essential output for scripting');

  program
    .command('version')
    .description('Display imirror version')
    .action(() => {
      cliOutput({ version }, { command: 'version', render: renderVersion });
    });

  registerSyncCommand(program);
  registerCheckCommand(program);
  registerHooksCommand(program);
  registerConfigCommand(program);

  // Resolve root, config, output format and logger before any command runs.
  program.hook('preAction', async (_thisCommand, actionCommand) => {
    const opts: GlobalOptions = actionCommand.optsWithGlobals();
    const flags = { json: opts.json, human: opts.human, quiet: opts.quiet };
    try {
      // Flags alone first, so a config error is still reported in the requested format
      setFormatContext(resolveFormat(flags));
      const projectRoot = resolveProjectRoot(opts.root);
      const loaded = await loadProjectConfig(projectRoot, actionCommand);
      const config = loaded ?? getDefaultConfig();
      setFormatContext(resolveFormat(flags, { projectDefault: config.output.defaultFormat }));
      setCommandContext({ projectRoot, config });

      const stateDir = getStateDir(projectRoot);
      if (loaded && existsSync(stateDir) && loaded.logging.level !== 'silent') {
        initLogger(stateDir, loaded.logging);
      }
      getLogger('cli').debug({ command: actionCommand.name(), projectRoot }, 'command start');
    } catch (err) {
      handleCliError(err, actionCommand.name());
    }
  });

  return program;
}
