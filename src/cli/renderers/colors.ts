/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain ASCII when color is not supported.
 */

/** Whether ANSI color escape codes should be used. */
const colorsEnabled: boolean = (() => {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
})();

/** Whether Unicode symbols are supported. */
const unicodeEnabled: boolean = (() => {
  const lang = process.env['LANG'] ?? '';
  if (lang === 'C' || lang === 'POSIX') return false;
  return lang.includes('UTF') || process.platform === 'darwin';
})();

function ansi(code: string): string {
  return colorsEnabled ? code : '';
}

export const BOLD = ansi('\x1b[1m');
export const DIM = ansi('\x1b[2m');
export const NC = ansi('\x1b[0m');  // reset
export const RED = ansi('\x1b[0;31m');
export const GREEN = ansi('\x1b[0;32m');
export const YELLOW = ansi('\x1b[1;33m');

export const SYMBOLS = unicodeEnabled
  ? { ok: '✓', warn: '⚠', fail: '✗' }
  : { ok: 'ok', warn: '!', fail: 'x' };

/** Map a per-target status (sync action or drift status) to a color escape. */
export function statusColor(status: string): string {
  switch (status) {
    case 'created':
    case 'updated':
      return GREEN;
    case 'in-sync':
    case 'unchanged':
    case 'planned':
      return DIM;
    case 'drifted':
      return YELLOW;
    case 'missing':
      return RED;
    default:
      return '';
  }
}

/** Turn a camelCase key into a label ("hooksPath" -> "Hooks Path"). */
export function formatLabel(key: string): string {
  const spaced = key.replace(/([a-z])([A-Z])/g, '$1 $2');
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}
