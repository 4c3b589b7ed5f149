import type { DependencyEdge, SchemaObject } from '../../database/models';

export interface CascadeLevel {
  depth: number;
  // Objects first discovered at this depth; level 0 holds only the root
  objects: SchemaObject[];
  // Every edge returned while expanding `objects`
  edges: DependencyEdge[];
}

export interface Cascade {
  root: SchemaObject;
  levels: CascadeLevel[];
  visited: SchemaObject[];
  truncated: boolean;
}

export interface CascadeOptions {
  maxDepth?: number;
  signal?: AbortSignal;
}

export type SummarySortKey = 'name' | 'dependents' | 'foreignKeys';

export interface SummaryOptions {
  sortBy?: SummarySortKey;
}

export interface SummaryRow {
  object: SchemaObject;
  dependentCount: number;
  foreignKeyCount: number;
}
