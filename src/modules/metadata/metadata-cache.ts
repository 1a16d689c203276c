import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { CacheEntry, JsonValue, Snapshot } from './types/metadata.types.js';

export const CACHE_TTL_MS = 60 * 60 * 1000;
export const CACHE_FORMAT_VERSION = 1;

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(z.string(), jsonValueSchema)])
);

const referentialActionSchema = z.enum(['NO ACTION', 'CASCADE', 'SET NULL', 'SET DEFAULT', 'RESTRICT']);

const columnSchema = z.object({
  name: z.string(),
  dataType: z.string(),
  maxLength: z.number().nullable(),
  numericPrecision: z.number().nullable(),
  numericScale: z.number().nullable(),
  isNullable: z.boolean(),
  defaultValue: z.string().nullable(),
  comment: z.string().nullable(),
  ordinal: z.number()
});

const columnStatsSchema = z.union([
  z.object({
    nullCount: z.number(),
    nullPercentage: z.number(),
    distinctCount: z.number(),
    distinctPercentage: z.number()
  }),
  z.object({ error: z.string() })
]);

const sampleRowSchema = z.record(z.string(), jsonValueSchema);

const tableSchema = z.object({
  tableType: z.literal('BASE TABLE'),
  comment: z.string().nullable(),
  rowCount: z.number(),
  tableSize: z.string(),
  columns: z.array(columnSchema),
  primaryKeys: z.array(z.string()),
  foreignKeys: z.array(
    z.object({
      column: z.string(),
      foreignTable: z.string(),
      foreignColumn: z.string(),
      constraintName: z.string(),
      onUpdate: referentialActionSchema,
      onDelete: referentialActionSchema
    })
  ),
  indexes: z.array(
    z.object({
      indexName: z.string(),
      columns: z.array(z.string()),
      isUnique: z.boolean(),
      isPrimary: z.boolean(),
      indexType: z.string()
    })
  ),
  columnStatistics: z.record(z.string(), columnStatsSchema).optional(),
  sampleData: z.array(sampleRowSchema).optional()
});

const viewSchema = z.object({
  viewType: z.enum(['VIEW', 'MATERIALIZED VIEW']),
  comment: z.string().nullable(),
  definition: z.string(),
  columns: z.array(columnSchema),
  sampleData: z.array(sampleRowSchema).optional()
});

export const snapshotSchema: z.ZodType<Snapshot> = z.object({
  databaseName: z.string(),
  extractedAt: z.string(),
  totalTables: z.number(),
  totalViews: z.number(),
  tables: z.record(z.string(), tableSchema),
  views: z.record(z.string(), viewSchema),
  relationships: z.record(
    z.string(),
    z.array(z.object({ fromColumn: z.string(), toTable: z.string(), toColumn: z.string() }))
  ),
  warnings: z.array(
    z.object({
      relation: z.string(),
      step: z.enum([
        'columns',
        'primary_keys',
        'foreign_keys',
        'indexes',
        'row_count',
        'table_size',
        'column_statistics',
        'sample_data',
        'relationships'
      ]),
      message: z.string()
    })
  ),
  connectionError: z.string().optional()
});

const cacheFileSchema = z.object({
  version: z.literal(CACHE_FORMAT_VERSION),
  cachedAt: z.string().datetime(),
  snapshot: snapshotSchema
});

interface MetadataCacheOptions {
  ttlMs?: number;
  now?: () => Date;
}

/**
 * Single-entry, file-backed snapshot cache. The file holds a versioned JSON envelope;
 * anything unreadable, mis-shaped, from another format version or older than the TTL
 * is reported as a miss.
 */
export class MetadataCache {
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(
    readonly filePath: string,
    options: MetadataCacheOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? CACHE_TTL_MS;
    this.now = options.now ?? (() => new Date());
  }

  async get(): Promise<CacheEntry | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      return null;
    }

    const parsed = cacheFileSchema.safeParse(decoded);
    if (!parsed.success) {
      return null;
    }

    const cachedAt = new Date(parsed.data.cachedAt);
    if (this.now().getTime() - cachedAt.getTime() > this.ttlMs) {
      return null;
    }

    return { snapshot: parsed.data.snapshot, cachedAt };
  }

  /**
   * Replace the stored entry. Writes a sibling temp file and renames it into place so a
   * concurrent reader sees either the old entry or the new one.
   */
  async put(snapshot: Snapshot): Promise<CacheEntry> {
    const cachedAt = this.now();
    const payload = JSON.stringify({
      version: CACHE_FORMAT_VERSION,
      cachedAt: cachedAt.toISOString(),
      snapshot
    });

    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;
    await mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await writeFile(tempPath, payload, 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }

    return { snapshot, cachedAt };
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}
