export * from './types';
export { buildCascadeGraph, NODE_STYLES } from './cascade-graph-builder';
export { toDot, quoteDotId } from './dot-writer';
export { GraphvizRenderer } from './graphviz-renderer';
export type { GraphvizRendererOptions } from './graphviz-renderer';
export { exportCascadeGraph, graphOutputPath } from './graph-exporter';
export type { ExportGraphOptions } from './graph-exporter';
