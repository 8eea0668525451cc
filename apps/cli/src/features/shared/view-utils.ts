/**
 * Plain-text formatting for command output.
 */

export interface TableColumn<T> {
  header: string;
  format: (item: T) => string;
  align?: 'left' | 'right' | undefined;
}

/**
 * Compute the maximum width needed for a column based on formatted values.
 */
export function computeColumnWidth<T>(items: readonly T[], formatter: (item: T) => string, minWidth = 0): number {
  let maxWidth = minWidth;

  for (const item of items) {
    maxWidth = Math.max(maxWidth, formatter(item).length);
  }

  return maxWidth;
}

/**
 * Header line followed by one line per item, columns separated by two spaces.
 */
export function formatTable<T>(items: readonly T[], columns: readonly TableColumn<T>[]): string[] {
  const widths = columns.map((column) => computeColumnWidth(items, column.format, column.header.length));

  const renderRow = (cells: string[]) =>
    cells
      .map((cell, index) => {
        const width = widths[index] ?? cell.length;
        return columns[index]?.align === 'right' ? cell.padStart(width) : cell.padEnd(width);
      })
      .join('  ')
      .trimEnd();

  return [
    renderRow(columns.map((column) => column.header)),
    ...items.map((item) => renderRow(columns.map((column) => column.format(item)))),
  ];
}

/**
 * Up to eight significant digits, without trailing zeros.
 */
export function formatRate(value: number): string {
  return String(Number(value.toPrecision(8)));
}

/**
 * Format duration for display (123ms, 12.3s, 2m 15s)
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  }

  if (ms < 60000) {
    const seconds = ms / 1000;
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}
