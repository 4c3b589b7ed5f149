export { formatSummaryTable, formatCascadeTable } from './report-formatter';
export { renderTable } from './table';
export type { TableColumn, ColumnAlignment } from './table';
