import { DependencyEdge, EdgeKind, objectKey } from '../database/models';
import type { Cascade, SummaryRow } from '../graph/dependency-resolver';
import { renderTable, TableColumn } from './table';

const SUMMARY_COLUMNS: TableColumn[] = [
  { header: 'Schema' },
  { header: 'Type' },
  { header: 'Name' },
  { header: 'Dependents', align: 'right' },
  { header: 'Foreign keys', align: 'right' },
];

const CASCADE_COLUMNS: TableColumn[] = [
  { header: 'Level', align: 'right' },
  { header: 'Object' },
  { header: 'Dep./For. Type' },
  { header: 'Dep./For. object' },
  { header: 'Foreign key' },
];

export function formatSummaryTable(rows: SummaryRow[]): string {
  return renderTable(
    SUMMARY_COLUMNS,
    rows.map(row => [
      row.object.schema,
      row.object.kind,
      row.object.name,
      String(row.dependentCount),
      String(row.foreignKeyCount),
    ])
  );
}

function edgeTypeLabel(edge: DependencyEdge): string {
  return edge.kind === EdgeKind.FOREIGN_KEY ? 'FOREIGN KEY' : edge.from.kind;
}

// Group edges by the object they point at, keeping first-seen order
function groupByParent(edges: DependencyEdge[]): DependencyEdge[][] {
  const groups = new Map<string, DependencyEdge[]>();

  for (const edge of edges) {
    const key = objectKey(edge.to);
    const group = groups.get(key);
    if (group) {
      group.push(edge);
    } else {
      groups.set(key, [edge]);
    }
  }

  return Array.from(groups.values());
}

/**
 * Leveled cascade report. The level number and the parent object are only
 * printed on the first row of their group.
 */
export function formatCascadeTable(cascade: Cascade): string {
  const rows: string[][] = [];

  for (const level of cascade.levels) {
    let firstOfLevel = true;

    for (const group of groupByParent(level.edges)) {
      group.forEach((edge, index) => {
        rows.push([
          firstOfLevel ? String(level.depth) : '',
          index === 0 ? objectKey(edge.to) : '',
          edgeTypeLabel(edge),
          objectKey(edge.from),
          edge.label ?? '',
        ]);
        firstOfLevel = false;
      });
    }
  }

  if (rows.length === 0) {
    rows.push(['0', objectKey(cascade.root), '', '', '']);
  }

  const table = renderTable(CASCADE_COLUMNS, rows);

  if (!cascade.truncated) {
    return table;
  }

  const lastLevel = cascade.levels[cascade.levels.length - 1];
  const pending = lastLevel ? lastLevel.objects.length : 0;
  return `${table}\n(max depth reached: ${pending} unexpanded object(s))`;
}
