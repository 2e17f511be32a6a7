/**
 * Human-readable renderers for imirror commands.
 * Each renderer returns the full text to print; '' prints nothing.
 */

import type { SyncResult, DriftReport } from '../../core/sync.js';
import type { HooksInstallResult, HooksStatus } from '../../core/hooks.js';
import type { ResolvedValue } from '../../types/config.js';
import { BOLD, DIM, NC, GREEN, RED, YELLOW, SYMBOLS, statusColor, formatLabel } from './colors.js';

export function renderSync(data: SyncResult, quiet: boolean): string {
  if (quiet) return '';
  const lines: string[] = [
    data.dryRun ? 'Would sync canonical instructions to:' : 'Synced canonical instructions to:',
  ];
  for (const target of data.targets) {
    lines.push(` - ${target.path}`);
  }
  return lines.join('\n');
}

export function renderCheck(data: DriftReport, quiet: boolean): string {
  if (quiet) return data.inSync ? 'in-sync' : 'drift';

  const lines: string[] = [];
  lines.push(data.inSync
    ? `${GREEN}${BOLD}IN SYNC${NC} ${DIM}${data.source}${NC}`
    : `${RED}${BOLD}DRIFT DETECTED${NC} ${DIM}${data.source}${NC}`);
  for (const entry of data.entries) {
    const icon = entry.status === 'in-sync'
      ? `${GREEN}${SYMBOLS.ok}${NC}`
      : entry.status === 'drifted' ? `${YELLOW}${SYMBOLS.warn}${NC}` : `${RED}${SYMBOLS.fail}${NC}`;
    lines.push(`  ${icon} ${entry.relativePath} ${statusColor(entry.status)}(${entry.status})${NC}`);
  }
  if (!data.inSync) {
    lines.push('');
    lines.push(`Run ${BOLD}imirror sync${NC} to update the mirrors.`);
  }
  return lines.join('\n');
}

export function renderHooksInstall(data: HooksInstallResult, quiet: boolean): string {
  if (quiet) return '';
  if (data.action === 'unchanged') {
    return `Git hooks path already set to ${data.hooksPath}`;
  }
  return `Git hooks path set to ${data.hooksPath}`;
}

export function renderHooksStatus(data: HooksStatus, quiet: boolean): string {
  if (quiet) return data.configured ? 'configured' : 'not-configured';

  const lines: string[] = [];
  const configured = data.configured
    ? `${GREEN}${SYMBOLS.ok}${NC}`
    : `${RED}${SYMBOLS.fail}${NC}`;
  lines.push(`  ${configured} ${data.key} = ${data.current ?? `${DIM}(unset)${NC}`} ${DIM}(expected ${data.expected})${NC}`);
  const dir = data.directoryExists
    ? `${GREEN}${SYMBOLS.ok}${NC}`
    : `${YELLOW}${SYMBOLS.warn}${NC}`;
  lines.push(`  ${dir} ${data.expected}/ ${data.directoryExists ? `holds ${data.hooks.length} hook(s)` : 'does not exist'}`);
  for (const hook of data.hooks) {
    lines.push(`      ${hook}`);
  }
  return lines.join('\n');
}

export function renderConfigValue(data: { key: string } & ResolvedValue<unknown>, quiet: boolean): string {
  const value = typeof data.value === 'string' ? data.value : JSON.stringify(data.value);
  if (quiet) return value;
  return `${data.key} = ${value} ${DIM}(${data.source})${NC}`;
}

export function renderVersion(data: { version: string }, quiet: boolean): string {
  if (quiet) return data.version;
  return `imirror v${data.version}`;
}

/**
 * Generic human renderer for commands without a dedicated one.
 * Renders data as indented key-value pairs.
 */
export function renderGeneric(data: unknown, quiet: boolean): string {
  if (quiet) return '';
  if (data === null || typeof data !== 'object') return String(data);

  const lines: string[] = [];
  for (const [key, val] of Object.entries(data)) {
    if (val === null || val === undefined) continue;

    if (Array.isArray(val)) {
      lines.push(`${BOLD}${formatLabel(key)}:${NC} (${val.length})`);
      for (const item of val) {
        lines.push(`  ${typeof item === 'object' && item !== null ? JSON.stringify(item) : String(item)}`);
      }
    } else if (typeof val === 'object') {
      lines.push(`${BOLD}${formatLabel(key)}:${NC}`);
      for (const [subKey, subVal] of Object.entries(val)) {
        lines.push(`  ${DIM}${formatLabel(subKey)}:${NC} ${typeof subVal === 'object' ? JSON.stringify(subVal) : String(subVal)}`);
      }
    } else {
      lines.push(`${BOLD}${formatLabel(key)}:${NC} ${String(val)}`);
    }
  }
  return lines.join('\n');
}
