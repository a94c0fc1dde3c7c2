/**
 * @ledgerwork/cli formatting utilities.
 *
 * Pure ANSI-code based terminal formatting with zero external dependencies.
 *
 * @packageDocumentation
 */

import type { ChainValidity } from '@ledgerwork/chain';

// ─── ANSI color codes ─────────────────────────────────────────────────────────

export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  underline: '\x1b[4m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  gray: '\x1b[90m',
} as const;

// ─── Global color toggle ──────────────────────────────────────────────────────

let colorsEnabled = true;

/** Enable or disable ANSI color output globally. */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

export function getColorsEnabled(): boolean {
  return colorsEnabled;
}

// ─── Low-level colorizers ─────────────────────────────────────────────────────

function c(code: string, text: string): string {
  if (!colorsEnabled) return text;
  return `${code}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return c(colors.bold, text);
}

export function red(text: string): string {
  return c(colors.red, text);
}

export function green(text: string): string {
  return c(colors.green, text);
}

// ─── Semantic formatters ──────────────────────────────────────────────────────

/** Green checkmark + message. */
export function success(msg: string): string {
  if (!colorsEnabled) return `[OK] ${msg}`;
  return `${colors.green}✔${colors.reset} ${msg}`;
}

/** Red X + message. */
export function error(msg: string): string {
  if (!colorsEnabled) return `[ERROR] ${msg}`;
  return `${colors.red}✘${colors.reset} ${msg}`;
}

/** Yellow exclamation + message. */
export function warning(msg: string): string {
  if (!colorsEnabled) return `[WARN] ${msg}`;
  return `${colors.yellow}!${colors.reset} ${msg}`;
}

/** Bold + underlined header text. */
export function header(msg: string): string {
  if (!colorsEnabled) return msg;
  return `${colors.bold}${colors.underline}${msg}${colors.reset}`;
}

export function dim(msg: string): string {
  if (!colorsEnabled) return msg;
  return `${colors.gray}${msg}${colors.reset}`;
}

// ─── Ledger values ────────────────────────────────────────────────────────────

/** First `length` characters of a digest followed by an ellipsis. */
export function shortDigest(digest: string, length = 16): string {
  return digest.length <= length ? digest : `${digest.slice(0, length)}...`;
}

/** Green ACCEPTED or red REJECTED. */
export function verdict(accepted: boolean): string {
  return accepted ? green('ACCEPTED') : red('REJECTED');
}

/** "yes", or "no (<reason> at block <n>)" in red. */
export function validityLabel(validity: ChainValidity): string {
  if (validity.valid) return 'yes';
  return red(`no (${validity.reason} at block ${validity.brokenAt})`);
}

// ─── Strip ANSI codes ─────────────────────────────────────────────────────────

/** Strip all ANSI escape sequences from a string. */
export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

// ─── Table formatting ─────────────────────────────────────────────────────────

/**
 * Render a simple aligned table from headers and rows.
 * All cells are left-aligned with 2-space gutter between columns.
 */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, col) =>
    rows.reduce((max, row) => Math.max(max, stripAnsi(row[col] ?? '').length), stripAnsi(h).length),
  );

  function padCell(text: string, width: number): string {
    const pad = width - stripAnsi(text).length;
    return pad > 0 ? text + ' '.repeat(pad) : text;
  }

  const gutter = '  ';
  const lines: string[] = [];

  lines.push(headers.map((h, i) => bold(padCell(h, widths[i]!))).join(gutter).trimEnd());
  lines.push(dim(widths.map((w) => '─'.repeat(w)).join(gutter)));
  for (const row of rows) {
    lines.push(row.map((cell, i) => padCell(cell, widths[i]!)).join(gutter).trimEnd());
  }

  return lines.join('\n');
}

// ─── Key-value display ────────────────────────────────────────────────────────

/**
 * Render key-value pairs with aligned values.
 * Keys are displayed in bold, values are plain.
 */
export function keyValue(pairs: [string, string][]): string {
  if (pairs.length === 0) return '';

  const maxKeyLen = Math.max(...pairs.map(([k]) => k.length));
  return pairs.map(([key, value]) => `${bold(key.padEnd(maxKeyLen))}  ${value}`).join('\n');
}

// ─── Box drawing ──────────────────────────────────────────────────────────────

/**
 * Draw a box with a title and content using Unicode box-drawing characters.
 */
export function box(title: string, content: string): string {
  const contentLines = content.split('\n');

  const titleLen = stripAnsi(title).length;
  const maxContentLen = contentLines.reduce((max, line) => Math.max(max, stripAnsi(line).length), 0);
  const innerWidth = Math.max(titleLen + 2, maxContentLen + 2);

  const top = `┌─ ${bold(title)} ${'─'.repeat(Math.max(0, innerWidth - titleLen - 1))}┐`;
  const bottom = `└${'─'.repeat(innerWidth + 2)}┘`;

  const lines: string[] = [top];
  for (const line of contentLines) {
    const pad = innerWidth - stripAnsi(line).length;
    lines.push(`│ ${line}${' '.repeat(Math.max(0, pad))} │`);
  }
  lines.push(bottom);

  return lines.join('\n');
}
