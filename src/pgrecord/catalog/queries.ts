// catalog/queries.ts
//
// Read-only catalog queries. $1 is the schema, $2 an optional list of table
// names (empty list = every table of the schema).

export const COLUMNS_QUERY = `
SELECT
  c.table_name,
  obj_description(p.attrelid, 'pg_class') AS table_description,
  t.table_type,
  c.column_name,
  c.ordinal_position::int AS ordinal_position,
  col_description(p.attrelid, p.attnum) AS column_description,
  c.column_default,
  pg_catalog.format_type(p.atttypid, p.atttypmod) AS data_type,
  c.is_nullable = 'YES' AS is_nullable,
  c.is_identity = 'YES' AS is_identity,
  c.is_generated = 'ALWAYS' AS is_generated
FROM information_schema.columns c
JOIN information_schema.tables t
  ON t.table_catalog = c.table_catalog
  AND t.table_schema = c.table_schema
  AND t.table_name = c.table_name
JOIN pg_catalog.pg_attribute p
  ON p.attrelid = (quote_ident(c.table_schema) || '.' || quote_ident(c.table_name))::regclass
  AND p.attname = c.column_name
WHERE c.table_catalog = current_database()
  AND c.table_schema = $1
  AND (cardinality($2::text[]) = 0 OR c.table_name = ANY($2::text[]))
ORDER BY c.table_name, c.ordinal_position;`;

// Constraints per column, plus plain (non-unique) indexes as the "i" pseudo kind;
// their column is recovered from the index definition.
export const CONSTRAINTS_QUERY = `
SELECT
  cl.relname::text AS table_name,
  a.attname::text AS column_name,
  con.conname::text AS constraint_name,
  con.contype::text AS constraint_type,
  pg_get_constraintdef(con.oid) AS constraint_definition,
  COALESCE(am.amname::text, '') AS index_type
FROM pg_catalog.pg_class cl
JOIN pg_catalog.pg_namespace n ON n.oid = cl.relnamespace
JOIN pg_catalog.pg_attribute a ON a.attrelid = cl.oid
JOIN pg_catalog.pg_constraint con ON con.conrelid = cl.oid AND a.attnum = ANY (con.conkey)
LEFT JOIN pg_catalog.pg_index idx ON idx.indrelid = cl.oid AND idx.indexrelid = con.conindid
LEFT JOIN pg_catalog.pg_class i ON i.oid = idx.indexrelid
LEFT JOIN pg_catalog.pg_am am ON am.oid = i.relam
WHERE n.nspname = $1
  AND (cardinality($2::text[]) = 0 OR cl.relname = ANY($2::text[]))
UNION ALL
SELECT
  tablename::text AS table_name,
  '' AS column_name,
  indexname::text AS constraint_name,
  'i' AS constraint_type,
  indexdef AS constraint_definition,
  '' AS index_type
FROM pg_indexes
WHERE schemaname = $1
  AND (cardinality($2::text[]) = 0 OR tablename = ANY($2::text[]))
  AND indexdef NOT LIKE '%UNIQUE%'
ORDER BY table_name, column_name;`;

// Unique indexes created with CREATE UNIQUE INDEX rather than by a constraint.
export const UNIQUE_INDEXES_QUERY = `
SELECT
  t.relname::text AS table_name,
  i.relname::text AS index_name,
  array_agg(a.attname::text ORDER BY array_position(p.indkey::int2[], a.attnum)) AS index_columns
FROM pg_catalog.pg_index p
JOIN pg_catalog.pg_class t ON t.oid = p.indrelid
JOIN pg_catalog.pg_class i ON i.oid = p.indexrelid
JOIN pg_catalog.pg_namespace n ON n.oid = t.relnamespace
JOIN pg_catalog.pg_attribute a ON a.attrelid = t.oid AND a.attnum = ANY(p.indkey)
WHERE n.nspname = $1
  AND (cardinality($2::text[]) = 0 OR t.relname = ANY($2::text[]))
  AND p.indisunique
  AND NOT p.indisprimary
  AND NOT EXISTS (SELECT 1 FROM pg_catalog.pg_constraint c WHERE c.conindid = p.indexrelid)
GROUP BY t.relname, i.relname
ORDER BY t.relname, i.relname;`;

export const TRIGGERS_QUERY = `
SELECT
  event_object_catalog,
  event_object_schema,
  trigger_name,
  event_manipulation,
  event_object_table,
  action_statement,
  action_orientation,
  action_timing
FROM information_schema.triggers
WHERE event_object_catalog = current_database()
  AND event_object_schema = $1
  AND (cardinality($2::text[]) = 0 OR event_object_table = ANY($2::text[]))
ORDER BY event_object_table, trigger_name;`;
