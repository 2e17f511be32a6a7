/**
 * Tests for errors and the JSON envelope formatter.
 */

import { describe, it, expect } from 'vitest';
import { MirrorError, errnoCode } from '../errors.js';
import { formatSuccess, formatError, formatOutput } from '../output.js';
import { ExitCode, getExitCodeName, isRecoverableCode } from '../../types/exit-codes.js';

describe('MirrorError', () => {
  it('carries code, fix and cause', () => {
    const cause = new Error('ENOENT');
    const err = new MirrorError(ExitCode.NOT_FOUND, 'missing', { fix: 'create it', cause });

    expect(err.name).toBe('MirrorError');
    expect(err.code).toBe(4);
    expect(err.fix).toBe('create it');
    expect(err.cause).toBe(cause);
  });

  it('serializes to a structured error', () => {
    const err = new MirrorError(ExitCode.GIT_ERROR, 'git failed');

    expect(err.toJSON()).toEqual({
      success: false,
      error: { code: 20, name: 'GIT_ERROR', message: 'git failed', retryable: true },
    });
  });

  it('marks config problems as not retryable', () => {
    expect(isRecoverableCode(ExitCode.CONFIG_ERROR)).toBe(false);
    expect(isRecoverableCode(ExitCode.LOCK_TIMEOUT)).toBe(true);
    expect(isRecoverableCode(ExitCode.SUCCESS)).toBe(false);
    expect(getExitCodeName(ExitCode.DRIFT_DETECTED)).toBe('DRIFT_DETECTED');
  });
});

describe('errnoCode', () => {
  it('reads string codes only', () => {
    expect(errnoCode(Object.assign(new Error('x'), { code: 'EISDIR' }))).toBe('EISDIR');
    expect(errnoCode(Object.assign(new Error('x'), { code: 128 }))).toBeUndefined();
    expect(errnoCode('boom')).toBeUndefined();
  });
});

describe('formatSuccess', () => {
  it('wraps the result with _meta', () => {
    const parsed: unknown = JSON.parse(formatSuccess({ n: 1 }, 'done', 'sync'));

    expect(parsed).toMatchObject({
      success: true,
      result: { n: 1 },
      message: 'done',
      _meta: { operation: 'sync' },
    });
    expect(parsed).toHaveProperty('_meta.requestId', expect.stringMatching(/^[0-9a-f-]{36}$/));
  });

  it('omits the message when none is given and defaults the operation', () => {
    const parsed: unknown = JSON.parse(formatSuccess([1, 2]));

    expect(parsed).not.toHaveProperty('message');
    expect(parsed).toHaveProperty('_meta.operation', 'cli.output');
  });
});

describe('formatError', () => {
  it('produces a failed envelope with the error body', () => {
    const err = new MirrorError(ExitCode.NOT_FOUND, 'Canonical instructions not found: /r/p.md', { fix: 'create it' });
    const parsed: unknown = JSON.parse(formatError(err, 'sync'));

    expect(parsed).toMatchObject({
      success: false,
      result: null,
      error: { code: 4, name: 'NOT_FOUND', message: 'Canonical instructions not found: /r/p.md', fix: 'create it' },
      _meta: { operation: 'sync' },
    });
  });

  it('formatOutput dispatches on MirrorError', () => {
    const parsed: unknown = JSON.parse(formatOutput(new MirrorError(ExitCode.FILE_ERROR, 'x')));
    expect(parsed).toHaveProperty('success', false);
  });
});
