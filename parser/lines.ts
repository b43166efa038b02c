import type { EnvBinding } from '@core/types/tree';

const HEADING = /^(#{1,6})\s+(.*)$/;
const FENCE = '```';

export interface HeadingLine {
  level: number;
  name: string;
}

/**
 * `# Name` through `###### Name`; the hashes must be followed by whitespace.
 * Leading indentation is ignored.
 */
export function matchHeading(line: string): HeadingLine | null {
  const match = HEADING.exec(line.trimStart());
  if (!match) {
    return null;
  }
  return { level: match[1].length, name: match[2].trim() };
}

/**
 * A fence is exactly three backticks after optional indentation.
 * Returns the info string (trimmed, possibly empty), or null when the line is not a fence.
 */
export function matchFence(line: string): string | null {
  const trimmed = line.trimStart();
  if (!trimmed.startsWith(FENCE) || trimmed.charAt(FENCE.length) === '`') {
    return null;
  }
  return trimmed.slice(FENCE.length).trim();
}

export function isTableLine(line: string): boolean {
  return line.includes('|');
}

/**
 * The `|---|:---:|` line under a table header
 */
export function isAlignmentRow(line: string): boolean {
  return line.includes('-') && /^[\s|:-]+$/.test(line);
}

/**
 * Rows spelling a separator anywhere are never bindings
 */
export function looksLikeSeparator(line: string): boolean {
  return line.includes('---') || line.includes('===');
}

export type RowResult =
  | { kind: 'binding'; binding: EnvBinding }
  | { kind: 'skipped'; reason: 'separator' | 'header' | 'malformed' };

/**
 * Turn a table row into a binding from its first two non-empty cells
 */
export function parseTableRow(line: string): RowResult {
  if (looksLikeSeparator(line)) {
    return { kind: 'skipped', reason: 'separator' };
  }

  const cells = line
    .split('|')
    .map(cell => cell.trim())
    .filter(cell => cell.length > 0);

  if (cells.length < 2) {
    return { kind: 'skipped', reason: 'malformed' };
  }

  const [key, value] = cells;
  if (key.toLowerCase() === 'key' && value.toLowerCase() === 'value') {
    return { kind: 'skipped', reason: 'header' };
  }

  return { kind: 'binding', binding: { key, value } };
}
