import { EdgeKind, ObjectKind, objectKey } from '../../database/models';
import type { Cascade } from '../dependency-resolver';
import type { GraphDescription, GraphEdge, NodeStyle } from './types';

export const NODE_STYLES: Record<ObjectKind, NodeStyle> = {
  [ObjectKind.TABLE]: { style: 'solid', color: 'black' },
  [ObjectKind.VIEW]: { style: 'filled', color: 'lightgrey' },
  [ObjectKind.FUNCTION]: { style: 'filled', color: 'lightblue2' },
  [ObjectKind.OTHER]: { style: 'dashed', color: 'gray' },
};

/**
 * One node per visited object and one edge per recorded dependency edge.
 * Edges are drawn from the object depended upon to its dependent; foreign
 * key edges carry the referencing columns as label.
 */
export function buildCascadeGraph(cascade: Cascade): GraphDescription {
  const nodes = cascade.visited.map(object => ({
    id: objectKey(object),
    kind: object.kind,
    style: NODE_STYLES[object.kind],
  }));

  const edges: GraphEdge[] = [];
  for (const level of cascade.levels) {
    for (const edge of level.edges) {
      const graphEdge: GraphEdge = { from: objectKey(edge.to), to: objectKey(edge.from) };
      if (edge.kind === EdgeKind.FOREIGN_KEY && edge.label) {
        graphEdge.label = edge.label;
      }
      edges.push(graphEdge);
    }
  }

  return {
    name: objectKey(cascade.root),
    nodes,
    edges,
  };
}
