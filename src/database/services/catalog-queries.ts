/**
 * SQL for the PostgreSQL catalog lookups.
 *
 * Dependents are found textually: view, materialized view and function
 * definitions, with line breaks collapsed, are matched with SIMILAR TO against
 * the qualified or bare object name. See `buildDefinitionPatterns`.
 */

export const DIRECT_DEPENDENTS_SQL = `
  WITH f AS (
    SELECT
      'FUNCTION'::TEXT AS "type",
      n.nspname AS schema_name,
      p.proname AS "name",
      regexp_replace(pg_get_functiondef(p.oid), '[\\n\\r]+', ' ', 'g') AS definition
    FROM pg_catalog.pg_proc p
      INNER JOIN pg_catalog.pg_namespace n ON (n.oid = p.pronamespace)
    WHERE NOT (n.nspname = ANY (?::text[]))
      AND p.prokind IN ('f', 'p')
      AND NOT (n.nspname = ? AND p.proname = ?)
  ),
  v AS (
    SELECT
      'VIEW'::TEXT AS "type",
      v.schemaname AS schema_name,
      v.viewname AS "name",
      regexp_replace(v.definition, '[\\n\\r]+', ' ', 'g') AS definition
    FROM pg_catalog.pg_views v
    WHERE NOT (v.schemaname = ANY (?::text[]))
  ),
  m AS (
    SELECT
      'MATERIALIZED VIEW'::TEXT AS "type",
      m.schemaname AS schema_name,
      m.matviewname AS "name",
      regexp_replace(m.definition, '[\\n\\r]+', ' ', 'g') AS definition
    FROM pg_catalog.pg_matviews m
    WHERE NOT (m.schemaname = ANY (?::text[]))
  ),
  r AS (
    SELECT * FROM f
    UNION SELECT * FROM v
    UNION SELECT * FROM m
  )
  SELECT "type", schema_name, "name"
  FROM r
  WHERE definition SIMILAR TO ?
    OR definition SIMILAR TO ?
    OR (definition SIMILAR TO ? AND schema_name = ?)
    OR (definition SIMILAR TO ? AND schema_name = ?)
  ORDER BY "type", schema_name, "name"
`;

export const FOREIGN_KEY_REFERENCES_SQL = `
  SELECT
    rest.table_schema AS schema_name,
    rest.table_name,
    rest.column_name
  FROM (
    SELECT
      a.constraint_catalog, a.constraint_schema, a.constraint_name, a.table_schema, a.table_name
    FROM information_schema.constraint_column_usage a
    GROUP BY a.constraint_catalog, a.constraint_schema, a.constraint_name, a.table_schema, a.table_name
  ) refer
  INNER JOIN information_schema.referential_constraints fkey
    USING (constraint_catalog, constraint_schema, constraint_name)
  INNER JOIN (
    SELECT
      k.constraint_catalog, k.constraint_schema, k.constraint_name, k.table_schema, k.table_name,
      array_agg(k.column_name::TEXT ORDER BY k.ordinal_position) AS column_name
    FROM information_schema.key_column_usage k
    GROUP BY k.constraint_catalog, k.constraint_schema, k.constraint_name, k.table_schema, k.table_name
  ) rest
    USING (constraint_catalog, constraint_schema, constraint_name)
  WHERE refer.table_schema = ? AND refer.table_name = ?
  ORDER BY rest.table_schema, rest.table_name
`;

export const LIST_SCHEMA_OBJECTS_SQL = `
  SELECT
    table_type AS "type",
    table_schema AS schema_name,
    table_name AS "name"
  FROM information_schema.tables
  WHERE table_schema = ?
    AND table_type IN ('BASE TABLE', 'VIEW')
  ORDER BY table_name ASC
`;

export const FIND_SCHEMA_OBJECT_SQL = `
  SELECT "type", schema_name, "name"
  FROM (
    SELECT table_type::TEXT AS "type", table_schema::TEXT AS schema_name, table_name::TEXT AS "name"
    FROM information_schema.tables
    UNION ALL
    SELECT 'MATERIALIZED VIEW'::TEXT, schemaname::TEXT, matviewname::TEXT
    FROM pg_catalog.pg_matviews
    UNION ALL
    SELECT 'FUNCTION'::TEXT, n.nspname::TEXT, p.proname::TEXT
    FROM pg_catalog.pg_proc p
      INNER JOIN pg_catalog.pg_namespace n ON (n.oid = p.pronamespace)
  ) o
  WHERE schema_name = ? AND "name" = ?
  LIMIT 1
`;

export interface DefinitionPatterns {
  qualified: string;
  qualifiedCall: string;
  bare: string;
  bareCall: string;
}

/**
 * Escape the SIMILAR TO metacharacters of an identifier so it only matches
 * itself. The default escape character is the backslash.
 */
export function escapeSimilarTo(identifier: string): string {
  return identifier.replace(/[\\_%|*+?{}()[\]]/g, match => `\\${match}`);
}

/**
 * Patterns matching a reference to `schema.name` inside a collapsed
 * definition: qualified or bare, optionally double-quoted, followed either by
 * a space or by an opening parenthesis (a function call). The bare patterns
 * are only applied to dependents living in the same schema.
 */
export function buildDefinitionPatterns(schema: string, name: string): DefinitionPatterns {
  const s = escapeSimilarTo(schema);
  const n = escapeSimilarTo(name);

  return {
    qualified: `% (")?${s}(")?.(")?${n}(")? %`,
    qualifiedCall: `% (")?${s}(")?.(")?${n}(")?\\(%`,
    bare: `% (")?${n}(")? %`,
    bareCall: `% (")?${n}(")?\\(%`,
  };
}
