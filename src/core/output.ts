/**
 * JSON envelope formatter for imirror.
 *
 * Every `--json` response is a single line:
 *   { success, result, message?, error?, _meta }
 */

import { randomUUID } from 'node:crypto';
import { MirrorError, type MirrorErrorShape } from './errors.js';

/** Metadata attached to every envelope. */
export interface EnvelopeMeta {
  operation: string;
  timestamp: string;
  requestId: string;
}

export interface SuccessEnvelope<T> {
  success: true;
  result: T;
  message?: string;
  _meta: EnvelopeMeta;
}

export interface ErrorEnvelope {
  success: false;
  result: null;
  error: MirrorErrorShape;
  _meta: EnvelopeMeta;
}

export type Envelope<T> = SuccessEnvelope<T> | ErrorEnvelope;

function createMeta(operation: string): EnvelopeMeta {
  return {
    operation,
    timestamp: new Date().toISOString(),
    requestId: randomUUID(),
  };
}

/**
 * Format a successful result as an envelope.
 * When operation is omitted, defaults to 'cli.output'.
 */
export function formatSuccess<T>(data: T, message?: string, operation?: string): string {
  const envelope: SuccessEnvelope<T> = {
    success: true,
    result: data,
    ...(message && { message }),
    _meta: createMeta(operation ?? 'cli.output'),
  };
  return JSON.stringify(envelope);
}

/**
 * Format an error as an envelope.
 */
export function formatError(error: MirrorError, operation?: string): string {
  const envelope: ErrorEnvelope = {
    success: false,
    result: null,
    error: error.toShape(),
    _meta: createMeta(operation ?? 'cli.output'),
  };
  return JSON.stringify(envelope);
}

/** Format any result (success or error) as JSON. */
export function formatOutput<T>(result: T | MirrorError): string {
  if (result instanceof MirrorError) {
    return formatError(result);
  }
  return formatSuccess(result);
}
