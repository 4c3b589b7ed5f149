import type { Knex } from 'knex';
import {
  CatalogObjectRow,
  ForeignKeyReference,
  ForeignKeyRow,
  ObjectKind,
  SchemaObject,
  classifyObjectKind,
  createSchemaObject,
} from '../models';
import { createComponentLogger } from '../../utils/logger';
import { CatalogUnavailableError } from '../../utils/errors';
import type { CatalogGateway } from './types';
import {
  DIRECT_DEPENDENTS_SQL,
  FIND_SCHEMA_OBJECT_SQL,
  FOREIGN_KEY_REFERENCES_SQL,
  LIST_SCHEMA_OBJECTS_SQL,
  buildDefinitionPatterns,
} from './catalog-queries';

const logger = createComponentLogger('catalog-gateway');

export interface PostgresCatalogGatewayOptions {
  excludedSchemas?: string[];
}

const DEFAULT_EXCLUDED_SCHEMAS = ['pg_catalog', 'information_schema'];

/**
 * Normalize the aggregated column list of a foreign key. node-postgres parses
 * `text[]` into an array; a driver without array parsing hands back the
 * `{a,b}` literal instead.
 */
export function parseColumnNames(value: ForeignKeyRow['column_name']): string[] {
  if (!value) return [];

  if (Array.isArray(value)) {
    return value;
  }

  const trimmed = value.trim();
  if (trimmed.startsWith('{') && trimmed.endsWith('}')) {
    return trimmed
      .slice(1, -1)
      .split(',')
      .map(column => column.trim().replace(/^"(.*)"$/, '$1'))
      .filter(column => column.length > 0);
  }

  return [trimmed];
}

function toSchemaObject(row: CatalogObjectRow): SchemaObject {
  return createSchemaObject(row.schema_name, row.name, classifyObjectKind(row.type));
}

/**
 * Catalog gateway over a caller-owned knex connection to PostgreSQL.
 * The gateway never opens or closes the connection itself.
 */
export class PostgresCatalogGateway implements CatalogGateway {
  private readonly excludedSchemas: string[];

  constructor(
    private readonly db: Knex,
    options: PostgresCatalogGatewayOptions = {}
  ) {
    this.excludedSchemas = options.excludedSchemas ?? DEFAULT_EXCLUDED_SCHEMAS;
  }

  async listSchemaObjects(schema: string): Promise<SchemaObject[]> {
    const rows = await this.query<CatalogObjectRow>('listSchemaObjects', LIST_SCHEMA_OBJECTS_SQL, [
      schema,
    ]);
    return rows.map(toSchemaObject);
  }

  async findSchemaObject(schema: string, name: string): Promise<SchemaObject | undefined> {
    const rows = await this.query<CatalogObjectRow>('findSchemaObject', FIND_SCHEMA_OBJECT_SQL, [
      schema,
      name,
    ]);
    return rows.length > 0 ? toSchemaObject(rows[0]) : undefined;
  }

  async directDependents(schema: string, name: string): Promise<SchemaObject[]> {
    const patterns = buildDefinitionPatterns(schema, name);
    const rows = await this.query<CatalogObjectRow>('directDependents', DIRECT_DEPENDENTS_SQL, [
      this.excludedSchemas,
      schema,
      name,
      this.excludedSchemas,
      this.excludedSchemas,
      patterns.qualified,
      patterns.qualifiedCall,
      patterns.bare,
      schema,
      patterns.bareCall,
      schema,
    ]);
    return rows.map(toSchemaObject);
  }

  async foreignKeyReferences(schema: string, name: string): Promise<ForeignKeyReference[]> {
    const rows = await this.query<ForeignKeyRow>(
      'foreignKeyReferences',
      FOREIGN_KEY_REFERENCES_SQL,
      [schema, name]
    );
    return rows.map(row => ({
      referencer: createSchemaObject(row.schema_name, row.table_name, ObjectKind.TABLE),
      columns: parseColumnNames(row.column_name),
    }));
  }

  private async query<TRow>(
    operation: string,
    sql: string,
    bindings: Knex.RawBinding[]
  ): Promise<TRow[]> {
    try {
      const result: { rows: TRow[] } = await this.db.raw(sql, bindings);
      return result.rows;
    } catch (error) {
      logger.error('Catalog query failed', {
        operation,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new CatalogUnavailableError(operation, error);
    }
  }
}
