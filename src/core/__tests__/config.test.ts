/**
 * Tests for config engine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile, readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, loadConfigDocument, getConfigValue, setConfigValue, parseConfigValue } from '../config.js';
import { ExitCode } from '../../types/exit-codes.js';

const ENV_KEYS = ['IMIRROR_HOME', 'IMIRROR_CANONICAL', 'IMIRROR_HOOKS_PATH', 'IMIRROR_FORMAT', 'IMIRROR_LOG_LEVEL', 'IMIRROR_LOG_FILE'];

describe('config', () => {
  let tempDir: string;
  let projectRoot: string;
  let globalDir: string;
  const saved: Record<string, string | undefined> = {};

  async function writeProjectConfig(data: unknown): Promise<void> {
    await mkdir(join(projectRoot, '.imirror'), { recursive: true });
    await writeFile(join(projectRoot, '.imirror', 'config.json'), JSON.stringify(data));
  }

  async function writeGlobalConfig(data: unknown): Promise<void> {
    await mkdir(globalDir, { recursive: true });
    await writeFile(join(globalDir, 'config.json'), JSON.stringify(data));
  }

  beforeEach(async () => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    tempDir = await mkdtemp(join(tmpdir(), 'imirror-config-test-'));
    projectRoot = join(tempDir, 'project');
    globalDir = join(tempDir, 'global');
    await mkdir(projectRoot, { recursive: true });
    // Point to a non-existent global config
    process.env['IMIRROR_HOME'] = globalDir;
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value !== undefined) process.env[key] = value;
      else delete process.env[key];
    }
  });

  describe('loadConfig', () => {
    it('returns defaults when no config files exist', async () => {
      const config = await loadConfig(projectRoot);
      expect(config.canonical).toBe('prompts/vibe-coding-instructions.md');
      expect(config.targets).toHaveLength(4);
      expect(config.hooks.path).toBe('.githooks');
      expect(config.output.defaultFormat).toBe('human');
      expect(config.logging.maxFiles).toBe(5);
    });

    it('merges project config over defaults, replacing arrays', async () => {
      await writeProjectConfig({ targets: ['AGENTS.md'], hooks: { path: '.husky' } });
      const config = await loadConfig(projectRoot);
      expect(config.targets).toEqual(['AGENTS.md']);
      expect(config.hooks.path).toBe('.husky');
      // Other defaults preserved
      expect(config.canonical).toBe('prompts/vibe-coding-instructions.md');
    });

    it('merges global config under project config', async () => {
      await writeGlobalConfig({ canonical: 'global.md', output: { defaultFormat: 'json' } });
      await writeProjectConfig({ canonical: 'project.md' });
      const config = await loadConfig(projectRoot);
      expect(config.canonical).toBe('project.md');
      expect(config.output.defaultFormat).toBe('json');
    });

    it('environment variables override config files', async () => {
      await writeProjectConfig({ canonical: 'project.md' });
      process.env['IMIRROR_CANONICAL'] = 'docs/from-env.md';
      process.env['IMIRROR_LOG_LEVEL'] = 'debug';
      const config = await loadConfig(projectRoot);
      expect(config.canonical).toBe('docs/from-env.md');
      expect(config.logging.level).toBe('debug');
    });

    it('keeps numeric-looking path values from the environment as strings', async () => {
      process.env['IMIRROR_CANONICAL'] = '2024';
      process.env['IMIRROR_HOOKS_PATH'] = 'true';
      process.env['IMIRROR_LOG_FILE'] = '42';
      const config = await loadConfig(projectRoot);
      expect(config.canonical).toBe('2024');
      expect(config.hooks.path).toBe('true');
      expect(config.logging.filePath).toBe('42');
      expect(await getConfigValue('canonical', projectRoot)).toEqual({ value: '2024', source: 'env' });
    });

    it('rejects an invalid merged config with CONFIG_ERROR', async () => {
      await writeProjectConfig({ targets: [] });
      const err = await loadConfig(projectRoot).catch((e: unknown) => e);
      expect(err).toHaveProperty('code', ExitCode.CONFIG_ERROR);
      expect(err).toHaveProperty('message', expect.stringContaining('targets:'));
    });

    it('rejects an unknown output format from the environment', async () => {
      process.env['IMIRROR_FORMAT'] = 'yaml';
      const err = await loadConfig(projectRoot).catch((e: unknown) => e);
      expect(err).toHaveProperty('code', ExitCode.CONFIG_ERROR);
      expect(err).toHaveProperty('message', expect.stringContaining('output.defaultFormat:'));
    });

    it('rejects malformed JSON with VALIDATION_ERROR', async () => {
      await mkdir(join(projectRoot, '.imirror'), { recursive: true });
      await writeFile(join(projectRoot, '.imirror', 'config.json'), '{ not json');
      const err = await loadConfig(projectRoot).catch((e: unknown) => e);
      expect(err).toHaveProperty('code', ExitCode.VALIDATION_ERROR);
    });

    it('rejects a config file that is not an object', async () => {
      await writeProjectConfig(['a', 'b']);
      const err = await loadConfig(projectRoot).catch((e: unknown) => e);
      expect(err).toHaveProperty('code', ExitCode.VALIDATION_ERROR);
    });
  });

  describe('loadConfigDocument', () => {
    it('returns the merged document even when it does not validate', async () => {
      await writeProjectConfig({ targets: [] });
      const doc = await loadConfigDocument(projectRoot);
      expect(doc['targets']).toEqual([]);
      expect(doc['canonical']).toBe('prompts/vibe-coding-instructions.md');
    });
  });

  describe('getConfigValue', () => {
    it('reports defaults with source default', async () => {
      const resolved = await getConfigValue('hooks.path', projectRoot);
      expect(resolved).toEqual({ value: '.githooks', source: 'default' });
    });

    it('tracks project, global and env sources', async () => {
      await writeGlobalConfig({ hooks: { path: '.global-hooks' } });
      expect(await getConfigValue('hooks.path', projectRoot)).toEqual({ value: '.global-hooks', source: 'global' });

      await writeProjectConfig({ hooks: { path: '.project-hooks' } });
      expect(await getConfigValue('hooks.path', projectRoot)).toEqual({ value: '.project-hooks', source: 'project' });

      process.env['IMIRROR_HOOKS_PATH'] = '.env-hooks';
      expect(await getConfigValue('hooks.path', projectRoot)).toEqual({ value: '.env-hooks', source: 'env' });
    });

    it('throws NOT_FOUND for an unknown key', async () => {
      const err = await getConfigValue('nope.nothing', projectRoot).catch((e: unknown) => e);
      expect(err).toHaveProperty('code', ExitCode.NOT_FOUND);
    });
  });

  describe('setConfigValue', () => {
    it('creates the project config file and parses values', async () => {
      const result = await setConfigValue('logging.maxFiles', '3', projectRoot);

      expect(result).toEqual({ key: 'logging.maxFiles', value: 3, scope: 'project' });
      const written: unknown = JSON.parse(await readFile(join(projectRoot, '.imirror', 'config.json'), 'utf-8'));
      expect(written).toEqual({ logging: { maxFiles: 3 } });
    });

    it('keeps existing keys when setting another', async () => {
      await writeProjectConfig({ canonical: 'docs/rules.md' });

      await setConfigValue('hooks.path', '.husky', projectRoot);

      const written: unknown = JSON.parse(await readFile(join(projectRoot, '.imirror', 'config.json'), 'utf-8'));
      expect(written).toEqual({ canonical: 'docs/rules.md', hooks: { path: '.husky' } });
    });

    it('accepts JSON arrays for targets', async () => {
      await setConfigValue('targets', '["AGENTS.md","CLAUDE.md"]', projectRoot);
      const config = await loadConfig(projectRoot);
      expect(config.targets).toEqual(['AGENTS.md', 'CLAUDE.md']);
    });

    it('writes to the global config with the global flag', async () => {
      const result = await setConfigValue('output.defaultFormat', 'json', projectRoot, { global: true });

      expect(result.scope).toBe('global');
      expect(existsSync(join(globalDir, 'config.json'))).toBe(true);
      expect(existsSync(join(projectRoot, '.imirror', 'config.json'))).toBe(false);
    });

    it('repairs an invalid project config', async () => {
      await writeProjectConfig({ targets: [] });

      await setConfigValue('targets', '["a.md"]', projectRoot);

      const config = await loadConfig(projectRoot);
      expect(config.targets).toEqual(['a.md']);
    });

    it('keeps both keys when two sets run concurrently', async () => {
      await Promise.all([
        setConfigValue('hooks.path', '.husky', projectRoot),
        setConfigValue('canonical', 'docs/rules.md', projectRoot),
      ]);

      const written: unknown = JSON.parse(await readFile(join(projectRoot, '.imirror', 'config.json'), 'utf-8'));
      expect(written).toEqual({ hooks: { path: '.husky' }, canonical: 'docs/rules.md' });
    });

    it('refuses a value that fails validation and writes nothing', async () => {
      const err = await setConfigValue('logging.level', 'loud', projectRoot).catch((e: unknown) => e);

      expect(err).toHaveProperty('code', ExitCode.CONFIG_ERROR);
      expect(existsSync(join(projectRoot, '.imirror', 'config.json'))).toBe(false);
    });
  });
});

describe('parseConfigValue', () => {
  it('parses booleans, null, numbers and JSON', () => {
    expect(parseConfigValue('true')).toBe(true);
    expect(parseConfigValue('false')).toBe(false);
    expect(parseConfigValue('null')).toBeNull();
    expect(parseConfigValue('42')).toBe(42);
    expect(parseConfigValue('-1.5')).toBe(-1.5);
    expect(parseConfigValue('{"a":1}')).toEqual({ a: 1 });
  });

  it('keeps plain strings', () => {
    expect(parseConfigValue('.githooks')).toBe('.githooks');
    expect(parseConfigValue(7)).toBe(7);
  });
});
