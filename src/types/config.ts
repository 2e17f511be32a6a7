/**
 * Configuration type definitions for imirror.
 * Covers project and global config with cascade resolution.
 */

import { z } from 'zod';

/** Output format options. */
export const OutputFormatSchema = z.enum(['json', 'human']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/** Pino log levels. */
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const OutputConfigSchema = z.object({
  defaultFormat: OutputFormatSchema,
});
export type OutputConfig = z.infer<typeof OutputConfigSchema>;

export const HooksConfigSchema = z.object({
  /** Value written to core.hooksPath, relative to the project root. */
  path: z.string().min(1),
});
export type HooksConfig = z.infer<typeof HooksConfigSchema>;

export const LoggingConfigSchema = z.object({
  /** Minimum log level to record (default: 'info') */
  level: LogLevelSchema,
  /** Log file path relative to .imirror/ (default: 'logs/imirror.log') */
  filePath: z.string().min(1),
  /** Maximum size of a single log file in bytes before rotation */
  maxFileSize: z.number().int().positive(),
  /** Number of rotated log files to keep */
  maxFiles: z.number().int().positive(),
});
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const MirrorConfigSchema = z.object({
  /** Canonical instructions file, relative to the project root. */
  canonical: z.string().min(1),
  /** Mirror destinations, relative to the project root. */
  targets: z.array(z.string().min(1)).min(1),
  hooks: HooksConfigSchema,
  output: OutputConfigSchema,
  logging: LoggingConfigSchema,
});
export type MirrorConfig = z.infer<typeof MirrorConfigSchema>;

/** Where a resolved config value came from. */
export type ConfigSource = 'default' | 'global' | 'project' | 'env';

/** A config value together with its source. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
