/**
 * Catalog object model shared by the gateway, the resolver and the outputs
 */

export enum ObjectKind {
  TABLE = 'TABLE',
  VIEW = 'VIEW',
  FUNCTION = 'FUNCTION',
  OTHER = 'OTHER',
}

export enum EdgeKind {
  // `from` references `to` in its view or function definition
  USES = 'USES',
  // `from` declares a foreign key into `to`
  FOREIGN_KEY = 'FOREIGN_KEY',
}

export interface SchemaObject {
  readonly schema: string;
  readonly name: string;
  readonly kind: ObjectKind;
}

export interface DependencyEdge {
  readonly from: SchemaObject;
  readonly to: SchemaObject;
  readonly kind: EdgeKind;
  readonly label?: string;
}

export interface ForeignKeyReference {
  readonly referencer: SchemaObject;
  readonly columns: readonly string[];
}

// Raw catalog rows, as returned by the PostgreSQL queries
export interface CatalogObjectRow {
  type: string;
  schema_name: string;
  name: string;
}

export interface ForeignKeyRow {
  schema_name: string;
  table_name: string;
  column_name: string[] | string | null;
}

const KIND_BY_CATALOG_TYPE: Record<string, ObjectKind> = {
  'BASE TABLE': ObjectKind.TABLE,
  TABLE: ObjectKind.TABLE,
  'FOREIGN TABLE': ObjectKind.TABLE,
  'PARTITIONED TABLE': ObjectKind.TABLE,
  VIEW: ObjectKind.VIEW,
  'MATERIALIZED VIEW': ObjectKind.VIEW,
  FUNCTION: ObjectKind.FUNCTION,
  PROCEDURE: ObjectKind.FUNCTION,
  AGGREGATE: ObjectKind.FUNCTION,
  WINDOW: ObjectKind.FUNCTION,
};

export function classifyObjectKind(catalogType: string): ObjectKind {
  return KIND_BY_CATALOG_TYPE[catalogType.trim().toUpperCase()] ?? ObjectKind.OTHER;
}

export function createSchemaObject(schema: string, name: string, kind: ObjectKind): SchemaObject {
  return Object.freeze({ schema, name, kind });
}

/**
 * Identity key of a catalog object. Kind is not part of identity.
 */
export function objectKey(object: Pick<SchemaObject, 'schema' | 'name'>): string {
  return `${object.schema}.${object.name}`;
}
