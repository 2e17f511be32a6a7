/**
 * Tests for the logger factory. No transport is started.
 */

import { describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { bytesToSizeString, initLogger, getLogger, getLogDir, closeLogger } from '../logger.js';
import { getDefaultConfig } from '../config.js';
import { MirrorError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('bytesToSizeString', () => {
  it('converts to pino-roll size strings', () => {
    expect(bytesToSizeString(10 * 1024 * 1024)).toBe('10m');
    expect(bytesToSizeString(2 * 1024 * 1024 * 1024)).toBe('2g');
    expect(bytesToSizeString(1536)).toBe('1k');
    expect(bytesToSizeString(512)).toBe('512');
  });
});

describe('getLogger', () => {
  it('falls back to a warn-level logger before initialisation', () => {
    closeLogger();
    const log = getLogger('sync');

    expect(log.level).toBe('warn');
    expect(log.bindings()).toEqual({ subsystem: 'sync' });
    expect(getLogDir()).toBeNull();
  });
});

describe('initLogger', () => {
  it('raises FILE_ERROR when the state directory is a regular file', async () => {
    const tempDir = await mkdtemp(join(tmpdir(), 'imirror-logger-test-'));
    const stateDir = join(tempDir, '.imirror');
    await writeFile(stateDir, '');

    try {
      const err = (() => {
        try {
          initLogger(stateDir, getDefaultConfig().logging);
          return null;
        } catch (e) {
          return e;
        }
      })();

      expect(err).toBeInstanceOf(MirrorError);
      expect(err).toHaveProperty('code', ExitCode.FILE_ERROR);
      expect(err).toHaveProperty('message', `Cannot create log directory: ${join(stateDir, 'logs')}`);
    } finally {
      closeLogger();
      await rm(tempDir, { recursive: true, force: true });
    }
  });
});
