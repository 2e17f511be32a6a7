/**
 * instruction-mirror public API.
 */

export { syncInstructions, checkInstructions, checksumBytes } from './core/sync.js';
export type {
  SyncAction,
  SyncOptions,
  SyncResult,
  SyncTargetResult,
  DriftStatus,
  DriftEntry,
  DriftReport,
} from './core/sync.js';
export { installHooksPath, getHooksStatus, HOOKS_PATH_KEY } from './core/hooks.js';
export type { HooksInstallResult, HooksStatus, InstallHooksPathOptions } from './core/hooks.js';
export { loadConfig, getConfigValue, setConfigValue, getDefaultConfig, validateConfig } from './core/config.js';
export { findProjectRoot, resolveProjectRoot } from './core/paths.js';
export { MirrorError } from './core/errors.js';
export { formatSuccess, formatError, formatOutput } from './core/output.js';
export { ExitCode } from './types/exit-codes.js';
export type { MirrorConfig, ConfigSource, ResolvedValue, OutputFormat, LogLevel } from './types/config.js';
