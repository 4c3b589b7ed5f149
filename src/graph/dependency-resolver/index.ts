export * from './types';
export { CascadeTraversalState } from './traversal-state';
export { expandObject, traverseCascade, validateMaxDepth } from './cascade-algorithms';
export {
  DependencyResolver,
  isSummarySortKey,
  sortSummaryRows,
} from './dependency-resolver-service';
