/**
 * Centralized pino logger factory for imirror.
 *
 * Singleton pattern. Uses pino-roll for automatic file rotation and retention.
 * Custom formatters for uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 *
 * stdout carries command output, so diagnostics go to the log file, or to
 * stderr before initLogger has run.
 */

import pino from 'pino';
import { join, dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import type { LoggingConfig } from '../types/config.js';
import { MirrorError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

let rootLogger: pino.Logger | null = null;
let currentLogDir: string | null = null;

/**
 * Convert bytes to a human-readable size string for pino-roll.
 * pino-roll accepts '10m', '1g', '500k', etc.
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param stateDir - Absolute path to the project's .imirror directory
 * @param config   - Logging section of the resolved config
 * @returns The root pino logger instance
 */
export function initLogger(stateDir: string, config: LoggingConfig): pino.Logger {
  const dest = join(stateDir, config.filePath);
  currentLogDir = dirname(dest);

  try {
    mkdirSync(currentLogDir, { recursive: true });
  } catch (err) {
    throw new MirrorError(ExitCode.FILE_ERROR, `Cannot create log directory: ${currentLogDir}`, { cause: err });
  }

  // pino.transport() runs in a worker thread; sync keeps the last lines of
  // a short-lived CLI run from being dropped on exit.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      sync: true,
      limit: {
        count: config.maxFiles,
      },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );

  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr fallback logger
 * so early startup code and tests never crash.
 *
 * @param subsystem - Logical subsystem name (e.g. 'sync', 'hooks', 'config')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    return pino(
      {
        level: 'warn',
        formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
      },
      pino.destination(2),
    ).child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/**
 * Get the current log directory path, or null when logging to stderr.
 */
export function getLogDir(): string | null {
  return currentLogDir;
}

/**
 * Flush and close the logger. Call during shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
  currentLogDir = null;
}
