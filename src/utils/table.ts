/**
 * Table Formatting
 *
 * Box-drawn tables for CLI summaries (`sectionpick validate`).
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column {
  header: string;
  /** Row property shown in this column */
  key: string;
  align?: Alignment;
}

export type Row = Record<string, string | number | null | undefined>;

const BOX = {
  top: ['┌', '┬', '┐'],
  middle: ['├', '┼', '┤'],
  bottom: ['└', '┴', '┘'],
  horizontal: '─',
  vertical: '│',
} as const;

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

function cell(value: Row[string]): string {
  return value === null || value === undefined ? '' : String(value);
}

function pad(text: string, width: number, align: Alignment): string {
  const fill = ' '.repeat(Math.max(0, width - visibleLength(text)));
  return align === 'right' ? fill + text : text + fill;
}

/**
 * @example
 * formatTable([{ header: 'Section', key: 'name' }], [{ name: 'Privacy' }])
 * // ┌─────────┐
 * // │ Section │
 * // ├─────────┤
 * // │ Privacy │
 * // └─────────┘
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const widths = columns.map((column) =>
    Math.max(visibleLength(column.header), ...rows.map((row) => visibleLength(cell(row[column.key]))))
  );

  const rule = ([left, join, right]: readonly [string, string, string]): string =>
    left + widths.map((width) => BOX.horizontal.repeat(width + 2)).join(join) + right;

  const line = (values: string[], header: boolean): string =>
    BOX.vertical +
    columns
      .map((column, index) => {
        const padded = pad(values[index] ?? '', widths[index] ?? 0, column.align ?? 'left');
        return ` ${header ? chalk.bold(padded) : padded} `;
      })
      .join(BOX.vertical) +
    BOX.vertical;

  return [
    rule(BOX.top),
    line(columns.map((column) => column.header), true),
    rule(BOX.middle),
    ...rows.map((row) => line(columns.map((column) => cell(row[column.key])), false)),
    rule(BOX.bottom),
  ].join('\n');
}
