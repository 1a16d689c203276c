import { qualifiedName, quoteIdent, toCount, toSampleRow } from '../../utils/sql.js';
import { getErrorMessage } from '../../utils/logger.js';
import { INTROSPECTION_QUERIES } from './constants/introspection-queries.js';
import type {
  ColumnMeta,
  ColumnStats,
  ForeignKeyMeta,
  IndexMeta,
  ReferentialAction,
  SampleRow,
  SchemaConnection,
  ViewType
} from './types/metadata.types.js';

type RawTableRow = {
  table_name: string;
  table_type: string;
  table_comment: string | null;
};

type RawViewRow = {
  view_name: string;
  view_type: string;
  view_comment: string | null;
  view_definition: string | null;
};

type RawColumnRow = {
  column_name: string;
  data_type: string;
  character_maximum_length: number | string | null;
  numeric_precision: number | string | null;
  numeric_scale: number | string | null;
  is_nullable: boolean | string;
  column_default: string | null;
  column_comment: string | null;
  ordinal_position: number | string;
};

type RawForeignKeyRow = {
  column_name: string;
  foreign_table_name: string;
  foreign_column_name: string;
  constraint_name: string;
  update_rule: string;
  delete_rule: string;
};

type RawEdgeRow = {
  from_table: string;
  from_column: string;
  to_table: string;
  to_column: string;
};

type RawIndexRow = {
  index_name: string;
  column_name: string;
  is_unique: boolean;
  is_primary: boolean;
  index_type: string;
};

type RawStatsRow = {
  total_rows: number | string;
  non_null_count: number | string;
  distinct_count: number | string;
};

export interface TableInfo {
  tableName: string;
  comment: string | null;
}

export interface ViewInfo {
  viewName: string;
  viewType: ViewType;
  comment: string | null;
  definition: string;
}

export interface ForeignKeyEdgeRow {
  fromTable: string;
  fromColumn: string;
  toTable: string;
  toColumn: string;
}

const REFERENTIAL_ACTIONS: readonly ReferentialAction[] = ['NO ACTION', 'CASCADE', 'SET NULL', 'SET DEFAULT', 'RESTRICT'];

function toReferentialAction(value: string): ReferentialAction {
  const match = REFERENTIAL_ACTIONS.find((action) => action === value.toUpperCase());
  return match ?? 'NO ACTION';
}

function toNullableNumber(value: number | string | null): number | null {
  if (value === null) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function roundPercentage(part: number, total: number): number {
  if (total <= 0) return 0;
  return Math.round((part / total) * 100 * 100) / 100;
}

/**
 * Read-only catalog and data probes for one schema over one connection.
 *
 * Methods throw on query failure; deciding whether a failure degrades or aborts is left
 * to the caller. The one exception is {@link SchemaProber.getColumnStatistics}, which
 * records per-column failures in place so one bad column never hides the others.
 */
export class SchemaProber {
  constructor(
    private readonly connection: SchemaConnection,
    private readonly schemaName = 'public'
  ) {}

  async listTables(): Promise<TableInfo[]> {
    const rows = await this.connection.query<RawTableRow>(INTROSPECTION_QUERIES.LIST_TABLES, [this.schemaName]);
    return rows.map((row) => ({ tableName: row.table_name, comment: row.table_comment ?? null }));
  }

  async listViews(): Promise<ViewInfo[]> {
    const rows = await this.connection.query<RawViewRow>(INTROSPECTION_QUERIES.LIST_VIEWS, [this.schemaName]);
    return rows.map((row) => ({
      viewName: row.view_name,
      viewType: row.view_type === 'MATERIALIZED VIEW' ? 'MATERIALIZED VIEW' : 'VIEW',
      comment: row.view_comment ?? null,
      definition: row.view_definition ?? ''
    }));
  }

  async getColumns(relationName: string): Promise<ColumnMeta[]> {
    const rows = await this.connection.query<RawColumnRow>(INTROSPECTION_QUERIES.GET_COLUMNS, [
      this.schemaName,
      relationName
    ]);

    return rows.map((row) => ({
      name: row.column_name,
      dataType: row.data_type,
      maxLength: toNullableNumber(row.character_maximum_length),
      numericPrecision: toNullableNumber(row.numeric_precision),
      numericScale: toNullableNumber(row.numeric_scale),
      isNullable: row.is_nullable === true || row.is_nullable === 'YES',
      defaultValue: row.column_default ?? null,
      comment: row.column_comment ?? null,
      ordinal: toCount(row.ordinal_position)
    }));
  }

  async getPrimaryKeys(tableName: string): Promise<string[]> {
    const rows = await this.connection.query<{ column_name: string }>(INTROSPECTION_QUERIES.GET_PRIMARY_KEYS, [
      qualifiedName(this.schemaName, tableName)
    ]);
    return rows.map((row) => row.column_name);
  }

  async getForeignKeys(tableName: string): Promise<ForeignKeyMeta[]> {
    const rows = await this.connection.query<RawForeignKeyRow>(INTROSPECTION_QUERIES.GET_FOREIGN_KEYS, [
      this.schemaName,
      tableName
    ]);

    return rows.map((row) => ({
      column: row.column_name,
      foreignTable: row.foreign_table_name,
      foreignColumn: row.foreign_column_name,
      constraintName: row.constraint_name,
      onUpdate: toReferentialAction(row.update_rule),
      onDelete: toReferentialAction(row.delete_rule)
    }));
  }

  /**
   * Every foreign-key column pair in the schema, ordered by source table.
   */
  async listForeignKeyEdges(): Promise<ForeignKeyEdgeRow[]> {
    const rows = await this.connection.query<RawEdgeRow>(INTROSPECTION_QUERIES.LIST_FOREIGN_KEY_EDGES, [
      this.schemaName
    ]);

    return rows.map((row) => ({
      fromTable: row.from_table,
      fromColumn: row.from_column,
      toTable: row.to_table,
      toColumn: row.to_column
    }));
  }

  /**
   * Indexes grouped by name; the catalog returns one row per indexed column.
   */
  async getIndexes(tableName: string): Promise<IndexMeta[]> {
    const rows = await this.connection.query<RawIndexRow>(INTROSPECTION_QUERIES.GET_INDEXES, [
      this.schemaName,
      tableName
    ]);

    const indexes = new Map<string, IndexMeta>();
    for (const row of rows) {
      const existing = indexes.get(row.index_name);
      if (existing) {
        existing.columns.push(row.column_name);
        continue;
      }
      indexes.set(row.index_name, {
        indexName: row.index_name,
        columns: [row.column_name],
        isUnique: row.is_unique,
        isPrimary: row.is_primary,
        indexType: row.index_type
      });
    }

    return Array.from(indexes.values());
  }

  /**
   * Planner estimate; never-analyzed tables report -1 on recent servers, which reads as 0.
   */
  async getRowCount(tableName: string): Promise<number> {
    const rows = await this.connection.query<{ estimate: number | string }>(INTROSPECTION_QUERIES.GET_ROW_ESTIMATE, [
      this.schemaName,
      tableName
    ]);
    const estimate = rows[0] ? toCount(rows[0].estimate) : 0;
    return Math.max(estimate, 0);
  }

  async getTableSize(tableName: string): Promise<string> {
    const rows = await this.connection.query<{ size: string | null }>(INTROSPECTION_QUERIES.GET_TABLE_SIZE, [
      qualifiedName(this.schemaName, tableName)
    ]);
    return rows[0]?.size ?? 'Unknown';
  }

  async getColumnStatistics(tableName: string, columnNames: string[]): Promise<Record<string, ColumnStats>> {
    const stats: Record<string, ColumnStats> = {};
    const relation = qualifiedName(this.schemaName, tableName);

    for (const columnName of columnNames) {
      const column = quoteIdent(columnName);
      try {
        const rows = await this.connection.query<RawStatsRow>(
          `SELECT COUNT(*) AS total_rows, COUNT(${column}) AS non_null_count, COUNT(DISTINCT ${column}) AS distinct_count FROM ${relation};`
        );
        const row = rows[0];
        const total = row ? toCount(row.total_rows) : 0;
        const nonNull = row ? toCount(row.non_null_count) : 0;
        const distinctCount = row ? toCount(row.distinct_count) : 0;
        const nullCount = total - nonNull;

        stats[columnName] = {
          nullCount,
          nullPercentage: roundPercentage(nullCount, total),
          distinctCount,
          distinctPercentage: roundPercentage(distinctCount, total)
        };
      } catch (error) {
        stats[columnName] = { error: getErrorMessage(error) };
      }
    }

    return stats;
  }

  /**
   * Up to `limit` rows in storage order, with values made JSON-safe.
   */
  async getSampleData(relationName: string, limit: number): Promise<SampleRow[]> {
    const rows = await this.connection.query<Record<string, unknown>>(
      `SELECT * FROM ${qualifiedName(this.schemaName, relationName)} LIMIT $1;`,
      [limit]
    );
    return rows.map((row) => toSampleRow(row));
  }
}
