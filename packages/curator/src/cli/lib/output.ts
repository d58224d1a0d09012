/**
 * Output Formatting for CLI Commands
 *
 * @module cli/lib/output
 */

export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

function formatCell(column: TableColumn, value: unknown): string {
  if (column.formatter) return column.formatter(value);
  return value === null || value === undefined ? '-' : String(value);
}

/**
 * Format rows as a fixed-width table
 */
export function formatTable(
  data: readonly Readonly<Record<string, unknown>>[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => formatCell(col, row[col.key]).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i] ?? col.header.length, col.align ?? 'left'))
    .join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns
      .map((col, i) => {
        const formatted = formatCell(col, row[col.key]);
        return padCell(formatted, widths[i] ?? formatted.length, col.align ?? 'left');
      })
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

export const formatters = {
  /** Two decimal places, `-` when absent */
  decimal: (value: unknown): string => {
    if (typeof value !== 'number') return '-';
    return value.toFixed(2);
  },

  /** Ratio as a percentage with two decimals */
  percent: (value: unknown): string => {
    if (typeof value !== 'number') return '-';
    return `${(value * 100).toFixed(2)}%`;
  },
};
