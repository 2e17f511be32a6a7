/**
 * Configuration engine for imirror.
 *
 * Resolution priority: CLI flags > Environment vars > Project config > Global config > Defaults
 */

import {
  MirrorConfigSchema,
  type ConfigSource,
  type MirrorConfig,
  type ResolvedValue,
} from '../types/config.js';
import { isPlainObject, readJsonObject, updateJsonObject } from '../store/json.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';
import { MirrorError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default configuration values. */
const DEFAULTS: MirrorConfig = {
  canonical: 'prompts/vibe-coding-instructions.md',
  targets: [
    'copilot-instructions.md',
    'claude-instructions.md',
    'cursor-rules.md',
    '.github/copilot-instructions.md',
  ],
  hooks: {
    path: '.githooks',
  },
  output: {
    defaultFormat: 'human',
  },
  logging: {
    level: 'info',
    filePath: 'logs/imirror.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

/** Environment variable to config path mapping. Every mapped key holds a string. */
const ENV_MAP: Record<string, string> = {
  'IMIRROR_CANONICAL': 'canonical',
  'IMIRROR_HOOKS_PATH': 'hooks.path',
  'IMIRROR_FORMAT': 'output.defaultFormat',
  'IMIRROR_LOG_LEVEL': 'logging.level',
  'IMIRROR_LOG_FILE': 'logging.filePath',
};

/** A fresh copy of the built-in defaults. */
export function getDefaultConfig(): MirrorConfig {
  return structuredClone(DEFAULTS);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  const parts = path.split('.');
  let current: unknown = obj;
  for (const part of parts) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (!last) return;
  let current: Record<string, unknown> = obj;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Validate a merged config document.
 * Throws CONFIG_ERROR listing every offending key.
 */
export function validateConfig(candidate: unknown): MirrorConfig {
  const parsed = MirrorConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MirrorError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration: ${problems}`,
      { fix: 'Correct the listed keys with `imirror config set <key> <value>`' },
    );
  }
  return parsed.data;
}

/**
 * Merge configuration from all sources without validating it.
 * Priority: defaults < global config < project config < environment vars
 */
export async function loadConfigDocument(projectRoot: string): Promise<Record<string, unknown>> {
  // Start with defaults
  let merged: Record<string, unknown> = { ...getDefaultConfig() };

  // Layer 1: Global config
  const globalConfig = await readJsonObject(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  // Layer 2: Project config
  const projectConfig = await readJsonObject(getConfigPath(projectRoot));
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  // Layer 3: Environment variables
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, envValue);
    }
  }

  return merged;
}

/**
 * Load, merge and validate configuration from all sources.
 */
export async function loadConfig(projectRoot: string): Promise<MirrorConfig> {
  return validateConfig(await loadConfigDocument(projectRoot));
}

/**
 * Get a single config value with source tracking.
 * Returns the value and which source it came from.
 */
export async function getConfigValue(
  path: string,
  projectRoot: string,
): Promise<ResolvedValue<unknown>> {
  // Check environment variables first
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: envValue, source: 'env' };
    }
  }

  const layers: Array<[ConfigSource, string]> = [
    ['project', getConfigPath(projectRoot)],
    ['global', getGlobalConfigPath()],
  ];
  for (const [source, filePath] of layers) {
    const config = await readJsonObject(filePath);
    if (config) {
      const val = getNestedValue(config, path);
      if (val !== undefined) {
        return { value: val, source };
      }
    }
  }

  // Fall back to defaults
  const defaults: Record<string, unknown> = { ...getDefaultConfig() };
  const defaultVal = getNestedValue(defaults, path);
  if (defaultVal === undefined) {
    throw new MirrorError(
      ExitCode.NOT_FOUND,
      `Unknown config key: ${path}`,
      { fix: 'Run `imirror config list` to see available keys' },
    );
  }
  return { value: defaultVal, source: 'default' };
}

/**
 * Parse a string value into its appropriate JS type.
 * Handles booleans, null, integers, floats, and JSON.
 */
export function parseConfigValue(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === 'null') return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/**
 * Set a config value in the project or global config file (dot-notation supported).
 * Creates intermediate objects as needed. The resulting file, layered over the
 * defaults, must still validate; nothing is written otherwise.
 */
export async function setConfigValue(
  key: string,
  value: unknown,
  projectRoot: string,
  opts?: { global?: boolean },
): Promise<{ key: string; value: unknown; scope: 'project' | 'global' }> {
  const configPath = opts?.global ? getGlobalConfigPath() : getConfigPath(projectRoot);
  const parsedValue = parseConfigValue(value);

  const apply = (current: Record<string, unknown>): Record<string, unknown> => {
    setNestedValue(current, key, parsedValue);
    validateConfig(deepMerge({ ...getDefaultConfig() }, current));
    return current;
  };

  // Fail before the file is created; the locked pass re-checks against fresh contents
  apply((await readJsonObject(configPath)) ?? {});
  await updateJsonObject(configPath, apply);

  return { key, value: parsedValue, scope: opts?.global ? 'global' : 'project' };
}
