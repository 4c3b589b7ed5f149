import { SchemaObject } from '../../database/models';
import type { CatalogGateway } from '../../database/services/types';
import { createComponentLogger } from '../../utils/logger';
import { InvalidOptionError, ObjectNotFoundError } from '../../utils/errors';
import { traverseCascade } from './cascade-algorithms';
import { Cascade, CascadeOptions, SummaryOptions, SummaryRow, SummarySortKey } from './types';

const logger = createComponentLogger('dependency-resolver');

const SORT_KEYS: readonly SummarySortKey[] = ['name', 'dependents', 'foreignKeys'];

export function isSummarySortKey(value: string): value is SummarySortKey {
  return SORT_KEYS.some(key => key === value);
}

function compareByName(a: SummaryRow, b: SummaryRow): number {
  return a.object.name.localeCompare(b.object.name);
}

export function sortSummaryRows(rows: SummaryRow[], sortBy: SummarySortKey): SummaryRow[] {
  const sorted = [...rows];

  switch (sortBy) {
    case 'name':
      return sorted.sort(compareByName);
    case 'dependents':
      return sorted.sort((a, b) => b.dependentCount - a.dependentCount || compareByName(a, b));
    case 'foreignKeys':
      return sorted.sort((a, b) => b.foreignKeyCount - a.foreignKeyCount || compareByName(a, b));
  }
}

/**
 * DependencyResolver answers the two questions of the tool for catalog
 * objects: how many objects depend on each object of a schema (first level
 * only), and what the full cascade of dependents of one object is.
 *
 * Catalog round-trips are issued one at a time. A failing lookup aborts the
 * whole call; no partial summary or cascade is ever returned.
 */
export class DependencyResolver {
  constructor(private readonly gateway: CatalogGateway) {}

  async summarize(schema: string, options: SummaryOptions = {}): Promise<SummaryRow[]> {
    if (options.sortBy !== undefined && !isSummarySortKey(options.sortBy)) {
      throw new InvalidOptionError('sortBy', options.sortBy);
    }

    const startTime = Date.now();
    const objects = await this.gateway.listSchemaObjects(schema);
    const rows: SummaryRow[] = [];

    for (const object of objects) {
      const dependents = await this.gateway.directDependents(object.schema, object.name);
      const references = await this.gateway.foreignKeyReferences(object.schema, object.name);
      rows.push({
        object,
        dependentCount: dependents.length,
        foreignKeyCount: references.length,
      });
    }

    logger.debug('Schema summary complete', {
      schema,
      objects: rows.length,
      executionTimeMs: Date.now() - startTime,
    });

    return options.sortBy ? sortSummaryRows(rows, options.sortBy) : rows;
  }

  async cascade(root: SchemaObject, options: CascadeOptions = {}): Promise<Cascade> {
    const startTime = Date.now();
    const result = await traverseCascade(this.gateway, root, options);

    logger.debug('Cascade complete', {
      root: `${root.schema}.${root.name}`,
      levels: result.levels.length,
      objects: result.visited.length,
      executionTimeMs: Date.now() - startTime,
    });

    return result;
  }

  async resolveRoot(schema: string, name: string): Promise<SchemaObject> {
    const object = await this.gateway.findSchemaObject(schema, name);
    if (!object) {
      throw new ObjectNotFoundError(schema, name);
    }
    return object;
  }

  async cascadeByName(schema: string, name: string, options: CascadeOptions = {}): Promise<Cascade> {
    const root = await this.resolveRoot(schema, name);
    return this.cascade(root, options);
  }
}
