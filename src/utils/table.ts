/**
 * Box-drawn tables for CLI output.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column {
  /** Header text */
  header: string;
  /** Key looked up in each row */
  key: string;
  align?: Alignment;
}

export type Row = Record<string, string | number | null | undefined>;

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

function visibleLength(str: string): number {
  return str.replace(ANSI_PATTERN, '').length;
}

function pad(str: string, width: number, align: Alignment): string {
  const padding = Math.max(0, width - visibleLength(str));
  return align === 'right' ? ' '.repeat(padding) + str : str + ' '.repeat(padding);
}

function cellText(row: Row, key: string): string {
  const value = row[key];
  return value != null ? String(value) : '';
}

/**
 * Format rows as a table.
 *
 * @example
 * ```ts
 * formatTable(
 *   [{ header: 'Course', key: 'title' }, { header: 'Lessons', key: 'lessons', align: 'right' }],
 *   [{ title: 'Intro to Retrieval', lessons: 4 }]
 * );
 * // ┌────────────────────┬─────────┐
 * // │ Course             │ Lessons │
 * // ├────────────────────┼─────────┤
 * // │ Intro to Retrieval │       4 │
 * // └────────────────────┴─────────┘
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const cells = rows.map((row) => columns.map((col) => cellText(row, col.key)));
  const widths = columns.map((col, i) =>
    Math.max(visibleLength(col.header), ...cells.map((values) => visibleLength(values[i] ?? '')))
  );

  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(middle) + right;

  const line = (values: string[], header: boolean): string =>
    '│' +
    columns
      .map((col, i) => {
        const padded = pad(values[i] ?? '', widths[i] ?? 0, col.align ?? 'left');
        return ` ${header ? chalk.bold(padded) : padded} `;
      })
      .join('│') +
    '│';

  return [
    rule('┌', '┬', '┐'),
    line(
      columns.map((c) => c.header),
      true
    ),
    rule('├', '┼', '┤'),
    ...cells.map((values) => line(values, false)),
    rule('└', '┴', '┘'),
  ].join('\n');
}
