export type ColumnAlignment = 'left' | 'right';

export interface TableColumn {
  header: string;
  align?: ColumnAlignment;
}

const COLUMN_SEPARATOR = '  ';

function pad(value: string, width: number, align: ColumnAlignment): string {
  return align === 'right' ? value.padStart(width) : value.padEnd(width);
}

/**
 * Render rows as a plain-text table: header, dashed rule, one line per row.
 * Columns are separated by two spaces and trailing blanks are trimmed.
 */
export function renderTable(columns: TableColumn[], rows: string[][]): string {
  const widths = columns.map((column, index) =>
    Math.max(column.header.length, ...rows.map(row => (row[index] ?? '').length))
  );

  const formatLine = (cells: string[]): string =>
    columns
      .map((column, index) => pad(cells[index] ?? '', widths[index], column.align ?? 'left'))
      .join(COLUMN_SEPARATOR)
      .trimEnd();

  const lines = [
    formatLine(columns.map(column => column.header)),
    widths.map(width => '-'.repeat(width)).join(COLUMN_SEPARATOR),
    ...rows.map(formatLine),
  ];

  return lines.join('\n');
}
