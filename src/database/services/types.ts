import type { ForeignKeyReference, SchemaObject } from '../models';

/**
 * Read-only catalog lookups the dependency resolver is built on.
 *
 * Every operation answers one level deep only and rejects with
 * `CatalogUnavailableError` when the catalog cannot be reached or queried.
 */
export interface CatalogGateway {
  /** Tables and views of a schema, in catalog listing order. */
  listSchemaObjects(schema: string): Promise<SchemaObject[]>;

  /** Table, view or function with the given qualified name, if any. */
  findSchemaObject(schema: string, name: string): Promise<SchemaObject | undefined>;

  /** Views and functions whose definition references the object. */
  directDependents(schema: string, name: string): Promise<SchemaObject[]>;

  /** Tables declaring a foreign key into the object. */
  foreignKeyReferences(schema: string, name: string): Promise<ForeignKeyReference[]>;
}
