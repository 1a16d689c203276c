/**
 * JSON-safe value as stored in sample rows and persisted snapshots.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type SampleRow = Record<string, JsonValue>;

/**
 * Referential action as reported by information_schema.referential_constraints.
 */
export type ReferentialAction = 'NO ACTION' | 'CASCADE' | 'SET NULL' | 'SET DEFAULT' | 'RESTRICT';

export type ViewType = 'VIEW' | 'MATERIALIZED VIEW';

export interface ColumnMeta {
  name: string;
  dataType: string;
  maxLength: number | null;
  numericPrecision: number | null;
  numericScale: number | null;
  isNullable: boolean;
  defaultValue: string | null;
  comment: string | null;
  ordinal: number;
}

export interface ForeignKeyMeta {
  column: string;
  foreignTable: string;
  foreignColumn: string;
  constraintName: string;
  onUpdate: ReferentialAction;
  onDelete: ReferentialAction;
}

/**
 * One entry per index; `columns` lists every participating column in key order.
 */
export interface IndexMeta {
  indexName: string;
  columns: string[];
  isUnique: boolean;
  isPrimary: boolean;
  indexType: string;
}

export interface ColumnStatsValues {
  nullCount: number;
  nullPercentage: number;
  distinctCount: number;
  distinctPercentage: number;
}

export interface ColumnStatsError {
  error: string;
}

export type ColumnStats = ColumnStatsValues | ColumnStatsError;

export interface TableMeta {
  tableType: 'BASE TABLE';
  comment: string | null;
  /** Planner estimate from pg_class.reltuples, not an exact count. */
  rowCount: number;
  tableSize: string;
  columns: ColumnMeta[];
  primaryKeys: string[];
  foreignKeys: ForeignKeyMeta[];
  indexes: IndexMeta[];
  columnStatistics?: Record<string, ColumnStats>;
  sampleData?: SampleRow[];
}

export interface ViewMeta {
  viewType: ViewType;
  comment: string | null;
  definition: string;
  columns: ColumnMeta[];
  sampleData?: SampleRow[];
}

export interface RelationshipEdge {
  fromColumn: string;
  toTable: string;
  toColumn: string;
}

export type RelationshipGraph = Record<string, RelationshipEdge[]>;

export type ProbeStep =
  | 'columns'
  | 'primary_keys'
  | 'foreign_keys'
  | 'indexes'
  | 'row_count'
  | 'table_size'
  | 'column_statistics'
  | 'sample_data'
  | 'relationships';

/**
 * A probing sub-step that failed and was degraded to an empty result.
 */
export interface ProbeWarning {
  relation: string;
  step: ProbeStep;
  message: string;
}

export interface Snapshot {
  databaseName: string;
  extractedAt: string;
  totalTables: number;
  totalViews: number;
  tables: Record<string, TableMeta>;
  views: Record<string, ViewMeta>;
  relationships: RelationshipGraph;
  warnings: ProbeWarning[];
  /** Set only when the database could not be reached; the rest of the snapshot is empty. */
  connectionError?: string;
}

export interface CacheEntry {
  snapshot: Snapshot;
  cachedAt: Date;
}

export interface ExtractOptions {
  includeSamples: boolean;
  sampleRows: number;
  includeStatistics: boolean;
  useCache: boolean;
}

/**
 * Read-only database handle used by the prober. Rows come back as plain
 * field-name to value objects in column order.
 */
export interface SchemaConnection {
  query<R extends Record<string, unknown>>(text: string, values?: unknown[]): Promise<R[]>;
  close(): Promise<void>;
}

export type ConnectionFactory = () => Promise<SchemaConnection>;

/**
 * Outcome of a degradable probing step: either the value, or the fallback plus the failure.
 */
export type ProbeResult<T> = { ok: true; value: T } | { ok: false; value: T; error: string };
