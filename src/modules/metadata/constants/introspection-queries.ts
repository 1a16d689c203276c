/**
 * Catalog queries used by the schema prober. Most take the schema name as `$1` and the
 * relation name as `$2`; the `regclass` lookups take one quoted, schema-qualified name.
 */
export const INTROSPECTION_QUERIES = {
  LIST_TABLES: `
    SELECT
      t.table_name,
      t.table_type,
      pg_catalog.obj_description(c.oid, 'pg_class') AS table_comment
    FROM information_schema.tables t
    JOIN pg_catalog.pg_namespace n ON n.nspname = t.table_schema
    LEFT JOIN pg_catalog.pg_class c ON c.relname = t.table_name AND c.relnamespace = n.oid
    WHERE t.table_schema = $1
    AND t.table_type = 'BASE TABLE'
    ORDER BY t.table_name;
  `,
  // information_schema.tables does not list materialized views, so views come from pg_class.
  LIST_VIEWS: `
    SELECT
      c.relname AS view_name,
      CASE c.relkind WHEN 'm' THEN 'MATERIALIZED VIEW' ELSE 'VIEW' END AS view_type,
      pg_catalog.obj_description(c.oid, 'pg_class') AS view_comment,
      pg_catalog.pg_get_viewdef(c.oid, true) AS view_definition
    FROM pg_catalog.pg_class c
    JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
    WHERE n.nspname = $1
    AND c.relkind IN ('v', 'm')
    ORDER BY c.relname;
  `,
  GET_COLUMNS: `
    SELECT
      a.attname AS column_name,
      pg_catalog.format_type(a.atttypid, NULL) AS data_type,
      information_schema._pg_char_max_length(a.atttypid, a.atttypmod) AS character_maximum_length,
      information_schema._pg_numeric_precision(a.atttypid, a.atttypmod) AS numeric_precision,
      information_schema._pg_numeric_scale(a.atttypid, a.atttypmod) AS numeric_scale,
      NOT a.attnotnull AS is_nullable,
      pg_catalog.pg_get_expr(d.adbin, d.adrelid) AS column_default,
      pg_catalog.col_description(c.oid, a.attnum) AS column_comment,
      a.attnum AS ordinal_position
    FROM pg_catalog.pg_attribute a
    JOIN pg_catalog.pg_class c ON c.oid = a.attrelid
    JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
    LEFT JOIN pg_catalog.pg_attrdef d ON d.adrelid = a.attrelid AND d.adnum = a.attnum
    WHERE n.nspname = $1
    AND c.relname = $2
    AND a.attnum > 0
    AND NOT a.attisdropped
    ORDER BY a.attnum;
  `,
  GET_PRIMARY_KEYS: `
    SELECT a.attname AS column_name
    FROM pg_catalog.pg_index i
    JOIN pg_catalog.pg_attribute a ON a.attrelid = i.indrelid
      AND a.attnum = ANY(i.indkey)
    WHERE i.indrelid = $1::regclass
    AND i.indisprimary
    ORDER BY array_position(i.indkey::int2[], a.attnum);
  `,
  GET_FOREIGN_KEYS: `
    SELECT
      a.attname AS column_name,
      ft.relname AS foreign_table_name,
      fa.attname AS foreign_column_name,
      con.conname AS constraint_name,
      CASE con.confupdtype
        WHEN 'c' THEN 'CASCADE' WHEN 'n' THEN 'SET NULL' WHEN 'd' THEN 'SET DEFAULT'
        WHEN 'r' THEN 'RESTRICT' ELSE 'NO ACTION'
      END AS update_rule,
      CASE con.confdeltype
        WHEN 'c' THEN 'CASCADE' WHEN 'n' THEN 'SET NULL' WHEN 'd' THEN 'SET DEFAULT'
        WHEN 'r' THEN 'RESTRICT' ELSE 'NO ACTION'
      END AS delete_rule
    FROM pg_catalog.pg_constraint con
    JOIN pg_catalog.pg_class t ON t.oid = con.conrelid
    JOIN pg_catalog.pg_namespace n ON n.oid = t.relnamespace
    JOIN pg_catalog.pg_class ft ON ft.oid = con.confrelid
    CROSS JOIN LATERAL unnest(con.conkey, con.confkey) WITH ORDINALITY AS k(attnum, fattnum, ord)
    JOIN pg_catalog.pg_attribute a ON a.attrelid = con.conrelid AND a.attnum = k.attnum
    JOIN pg_catalog.pg_attribute fa ON fa.attrelid = con.confrelid AND fa.attnum = k.fattnum
    WHERE con.contype = 'f'
    AND n.nspname = $1
    AND t.relname = $2
    ORDER BY con.conname, k.ord;
  `,
  LIST_FOREIGN_KEY_EDGES: `
    SELECT
      t.relname AS from_table,
      a.attname AS from_column,
      ft.relname AS to_table,
      fa.attname AS to_column
    FROM pg_catalog.pg_constraint con
    JOIN pg_catalog.pg_class t ON t.oid = con.conrelid
    JOIN pg_catalog.pg_namespace n ON n.oid = t.relnamespace
    JOIN pg_catalog.pg_class ft ON ft.oid = con.confrelid
    CROSS JOIN LATERAL unnest(con.conkey, con.confkey) WITH ORDINALITY AS k(attnum, fattnum, ord)
    JOIN pg_catalog.pg_attribute a ON a.attrelid = con.conrelid AND a.attnum = k.attnum
    JOIN pg_catalog.pg_attribute fa ON fa.attrelid = con.confrelid AND fa.attnum = k.fattnum
    WHERE con.contype = 'f'
    AND n.nspname = $1
    ORDER BY t.relname, con.conname, k.ord;
  `,
  GET_INDEXES: `
    SELECT
      i.relname AS index_name,
      a.attname AS column_name,
      ix.indisunique AS is_unique,
      ix.indisprimary AS is_primary,
      am.amname AS index_type
    FROM pg_catalog.pg_class t
    JOIN pg_catalog.pg_namespace n ON n.oid = t.relnamespace
    JOIN pg_catalog.pg_index ix ON t.oid = ix.indrelid
    JOIN pg_catalog.pg_class i ON i.oid = ix.indexrelid
    JOIN pg_catalog.pg_am am ON i.relam = am.oid
    CROSS JOIN LATERAL unnest(ix.indkey::int2[]) WITH ORDINALITY AS k(attnum, ord)
    JOIN pg_catalog.pg_attribute a ON a.attrelid = t.oid AND a.attnum = k.attnum
    WHERE t.relkind IN ('r', 'p')
    AND n.nspname = $1
    AND t.relname = $2
    ORDER BY i.relname, k.ord;
  `,
  GET_ROW_ESTIMATE: `
    SELECT c.reltuples::bigint AS estimate
    FROM pg_catalog.pg_class c
    JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
    WHERE n.nspname = $1
    AND c.relname = $2;
  `,
  GET_TABLE_SIZE: `
    SELECT pg_catalog.pg_size_pretty(pg_catalog.pg_total_relation_size($1::regclass)) AS size;
  `
} as const;
