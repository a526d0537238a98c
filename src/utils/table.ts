/**
 * Box-drawing tables for human-mode output (skill lists, search hits, stats).
 */

import chalk from 'chalk';

export interface Column {
  header: string;
  /** Row key the cell is read from */
  key: string;
  /** Numbers read best right-aligned (default: left) */
  align?: 'left' | 'right';
  /** Longer values are cut and end in "…" */
  maxWidth?: number;
}

export type Row = Record<string, string | number | null | undefined>;

// Corner/junction characters per rule: [left, middle, right]
const RULES = {
  top: ['┌', '┬', '┐'],
  separator: ['├', '┼', '┤'],
  bottom: ['└', '┴', '┘'],
} as const;

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

function renderCell(value: Row[string], maxWidth?: number): string {
  const text = value == null ? '' : String(value);
  if (maxWidth === undefined || visibleLength(text) <= maxWidth) {
    return text;
  }
  return text.replace(ANSI_PATTERN, '').slice(0, Math.max(0, maxWidth - 1)) + '…';
}

/**
 * Render rows under a header, with columns as wide as their widest cell.
 *
 * @example
 * ```ts
 * formatTable(
 *   [{ header: 'Category', key: 'category' }, { header: 'Count', key: 'count', align: 'right' }],
 *   [{ category: 'language', count: 12 }]
 * );
 * // ┌──────────┬───────┐
 * // │ Category │ Count │
 * // ├──────────┼───────┤
 * // │ language │    12 │
 * // └──────────┴───────┘
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const body = rows.map((row) => columns.map((col) => renderCell(row[col.key], col.maxWidth)));
  const widths = columns.map((col, i) =>
    Math.max(col.header.length, ...body.map((cells) => visibleLength(cells[i] ?? '')))
  );

  const rule = ([left, middle, right]: readonly [string, string, string]): string =>
    left + widths.map((width) => '─'.repeat(width + 2)).join(middle) + right;

  const line = (cells: string[], style: (text: string) => string = (text) => text): string => {
    const padded = columns.map((col, i) => {
      const cell = cells[i] ?? '';
      const fill = ' '.repeat(Math.max(0, (widths[i] ?? 0) - visibleLength(cell)));
      return style(col.align === 'right' ? fill + cell : cell + fill);
    });
    return `│ ${padded.join(' │ ')} │`;
  };

  return [
    rule(RULES.top),
    line(
      columns.map((col) => col.header),
      chalk.bold
    ),
    rule(RULES.separator),
    ...body.map((cells) => line(cells)),
    rule(RULES.bottom),
  ].join('\n');
}
