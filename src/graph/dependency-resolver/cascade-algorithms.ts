import { DependencyEdge, EdgeKind, SchemaObject, objectKey } from '../../database/models';
import type { CatalogGateway } from '../../database/services/types';
import { createComponentLogger } from '../../utils/logger';
import { CascadeAbortedError, InvalidOptionError } from '../../utils/errors';
import { CascadeTraversalState } from './traversal-state';
import { Cascade, CascadeLevel, CascadeOptions } from './types';

const logger = createComponentLogger('dependency-resolver');

/**
 * Fetch the first-level dependents and foreign-key referencers of an object
 * as edges pointing at it. Dependents come first, then referencers, each in
 * catalog order.
 */
export async function expandObject(
  gateway: CatalogGateway,
  object: SchemaObject
): Promise<DependencyEdge[]> {
  const dependents = await gateway.directDependents(object.schema, object.name);
  const references = await gateway.foreignKeyReferences(object.schema, object.name);

  if (dependents.length > 0 || references.length > 0) {
    logger.debug(`OBJECT: ${objectKey(object)}`);
  }

  const edges: DependencyEdge[] = [];

  for (const dependent of dependents) {
    logger.debug(`\t- USED IN ${dependent.kind}: ${objectKey(dependent)}`);
    edges.push({ from: dependent, to: object, kind: EdgeKind.USES });
  }

  for (const reference of references) {
    logger.debug(`\t- REFERENCED BY: ${objectKey(reference.referencer)}`);
    const edge: DependencyEdge =
      reference.columns.length > 0
        ? {
            from: reference.referencer,
            to: object,
            kind: EdgeKind.FOREIGN_KEY,
            label: reference.columns.join(', '),
          }
        : { from: reference.referencer, to: object, kind: EdgeKind.FOREIGN_KEY };
    edges.push(edge);
  }

  return edges;
}

export function validateMaxDepth(maxDepth: number | undefined): void {
  if (maxDepth === undefined) return;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new InvalidOptionError('maxDepth', maxDepth);
  }
}

/**
 * Breadth-first cascade from `root`. Each frontier object is expanded once;
 * edges into already visited objects are kept but never re-expanded, which
 * bounds the walk by the number of objects in the catalog.
 */
export async function traverseCascade(
  gateway: CatalogGateway,
  root: SchemaObject,
  options: CascadeOptions = {}
): Promise<Cascade> {
  const { maxDepth, signal } = options;
  validateMaxDepth(maxDepth);

  const state = new CascadeTraversalState(root);
  const levels: CascadeLevel[] = [];
  let frontier: SchemaObject[] = [root];
  let depth = 0;
  let truncated = false;

  while (frontier.length > 0) {
    if (maxDepth !== undefined && depth >= maxDepth) {
      levels.push({ depth, objects: frontier, edges: [] });
      truncated = true;
      break;
    }

    if (signal?.aborted) {
      throw new CascadeAbortedError(depth, signal.reason);
    }

    const edges: DependencyEdge[] = [];

    for (const object of frontier) {
      const objectEdges = await expandObject(gateway, object);
      for (const edge of objectEdges) {
        edges.push(edge);
        state.discover(edge.from);
      }
    }

    levels.push({ depth, objects: frontier, edges });
    frontier = state.takeFrontier();
    depth++;
  }

  if (truncated) {
    logger.debug('Cascade stopped at maximum depth', {
      root: objectKey(root),
      maxDepth,
      unexpanded: frontier.length,
    });
  }

  return {
    root,
    levels,
    visited: state.getVisited(),
    truncated,
  };
}
