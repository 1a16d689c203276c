import { createLogger, getErrorMessage } from '../../utils/logger.js';
import { formatForAi } from './ai-formatter.js';
import type { MetadataCache } from './metadata-cache.js';
import { buildRelationshipGraph } from './relationship-grapher.js';
import { SchemaProber, type TableInfo, type ViewInfo } from './schema-prober.js';
import type {
  ConnectionFactory,
  ExtractOptions,
  ProbeResult,
  ProbeStep,
  ProbeWarning,
  SchemaConnection,
  Snapshot,
  TableMeta,
  ViewMeta
} from './types/metadata.types.js';

export const DEFAULT_EXTRACT_OPTIONS: ExtractOptions = {
  includeSamples: true,
  sampleRows: 3,
  includeStatistics: true,
  useCache: true
};

export class MetadataExtractionError extends Error {
  constructor(
    message: string,
    readonly details?: string
  ) {
    super(message);
    this.name = 'MetadataExtractionError';
  }
}

export interface MetadataExtractorDependencies {
  connect: ConnectionFactory;
  cache: MetadataCache;
  databaseName: string;
  schemaName?: string;
  now?: () => Date;
}

const logger = createLogger('METADATA');

export function createEmptySnapshot(databaseName: string, extractedAt: string, connectionError?: string): Snapshot {
  const snapshot: Snapshot = {
    databaseName,
    extractedAt,
    totalTables: 0,
    totalViews: 0,
    tables: {},
    views: {},
    relationships: {},
    warnings: []
  };
  if (connectionError !== undefined) {
    snapshot.connectionError = connectionError;
  }
  return snapshot;
}

/**
 * Builds full schema snapshots for one database, reading through a file cache.
 *
 * Each uncached extraction opens its own connection, probes relations one at a time and
 * closes the connection before returning. Failures inside a single probe are recorded as
 * warnings on the snapshot instead of aborting the extraction.
 */
export class MetadataExtractor {
  private readonly connect: ConnectionFactory;
  private readonly cache: MetadataCache;
  private readonly databaseName: string;
  private readonly schemaName: string;
  private readonly now: () => Date;

  constructor(dependencies: MetadataExtractorDependencies) {
    this.connect = dependencies.connect;
    this.cache = dependencies.cache;
    this.databaseName = dependencies.databaseName;
    this.schemaName = dependencies.schemaName ?? 'public';
    this.now = dependencies.now ?? (() => new Date());
  }

  /**
   * Return a snapshot of the schema. A fresh cache entry is returned as-is, whatever
   * inclusion flags were requested.
   */
  async extractAllMetadata(options: Partial<ExtractOptions> = {}): Promise<Snapshot> {
    const resolved: ExtractOptions = { ...DEFAULT_EXTRACT_OPTIONS, ...options };
    const startedAt = Date.now();

    if (resolved.useCache) {
      const entry = await this.cache.get();
      if (entry) {
        logger.info('extract', 'CACHE_HIT', `cachedAt=${entry.cachedAt.toISOString()}`, Date.now() - startedAt);
        return entry.snapshot;
      }
      logger.info('extract', 'CACHE_MISS');
    }

    let connection: SchemaConnection;
    try {
      connection = await this.connect();
    } catch (error) {
      logger.error('connect', error);
      return createEmptySnapshot(this.databaseName, this.now().toISOString(), getErrorMessage(error, 'Connection failed'));
    }

    let snapshot: Snapshot;
    try {
      snapshot = await this.probeSchema(connection, resolved);
    } finally {
      await this.release(connection);
    }

    if (resolved.useCache) {
      try {
        await this.cache.put(snapshot);
      } catch (error) {
        logger.error('cache-write', error);
      }
    }

    logger.info(
      'extract',
      'SUCCESS',
      `tables=${snapshot.totalTables} views=${snapshot.totalViews} warnings=${snapshot.warnings.length}`,
      Date.now() - startedAt
    );
    return snapshot;
  }

  formatForAi(snapshot: Snapshot): string {
    return formatForAi(snapshot);
  }

  async clearCache(): Promise<void> {
    await this.cache.clear();
    logger.info('clear-cache', 'SUCCESS', this.cache.filePath);
  }

  private async probeSchema(connection: SchemaConnection, options: ExtractOptions): Promise<Snapshot> {
    const prober = new SchemaProber(connection, this.schemaName);
    const warnings: ProbeWarning[] = [];

    const attempt = async <T>(relation: string, step: ProbeStep, fallback: T, run: () => Promise<T>): Promise<T> => {
      const result = await settle(run, fallback);
      if (!result.ok) {
        warnings.push({ relation, step, message: result.error });
        logger.info(step, 'DEGRADED', `${relation}: ${result.error}`);
      }
      return result.value;
    };

    let tableInfos: TableInfo[];
    let viewInfos: ViewInfo[];
    try {
      tableInfos = await prober.listTables();
      viewInfos = await prober.listViews();
    } catch (error) {
      throw new MetadataExtractionError('Failed to enumerate tables and views', getErrorMessage(error));
    }

    const edges = await attempt('*', 'relationships', [], () => prober.listForeignKeyEdges());
    const tables: Record<string, TableMeta> = {};
    const views: Record<string, ViewMeta> = {};

    for (const info of tableInfos) {
      const name = info.tableName;
      logger.info('probe-table', 'START', name);

      const columns = await attempt(name, 'columns', [], () => prober.getColumns(name));
      const table: TableMeta = {
        tableType: 'BASE TABLE',
        comment: info.comment,
        rowCount: await attempt(name, 'row_count', 0, () => prober.getRowCount(name)),
        tableSize: await attempt(name, 'table_size', 'Unknown', () => prober.getTableSize(name)),
        columns,
        primaryKeys: await attempt(name, 'primary_keys', [], () => prober.getPrimaryKeys(name)),
        foreignKeys: await attempt(name, 'foreign_keys', [], () => prober.getForeignKeys(name)),
        indexes: await attempt(name, 'indexes', [], () => prober.getIndexes(name))
      };

      // Empty tables have nothing to measure or sample.
      if (options.includeStatistics && table.rowCount > 0) {
        table.columnStatistics = await prober.getColumnStatistics(
          name,
          columns.map((column) => column.name)
        );
        for (const [column, stats] of Object.entries(table.columnStatistics)) {
          if ('error' in stats) {
            warnings.push({ relation: `${name}.${column}`, step: 'column_statistics', message: stats.error });
          }
        }
      }

      if (options.includeSamples && table.rowCount > 0) {
        table.sampleData = await attempt(name, 'sample_data', [], () => prober.getSampleData(name, options.sampleRows));
      }

      tables[name] = table;
    }

    for (const info of viewInfos) {
      const name = info.viewName;
      logger.info('probe-view', 'START', name);

      const view: ViewMeta = {
        viewType: info.viewType,
        comment: info.comment,
        definition: info.definition,
        columns: await attempt(name, 'columns', [], () => prober.getColumns(name))
      };

      if (options.includeSamples) {
        view.sampleData = await attempt(name, 'sample_data', [], () => prober.getSampleData(name, options.sampleRows));
      }

      views[name] = view;
    }

    return {
      databaseName: this.databaseName,
      extractedAt: this.now().toISOString(),
      totalTables: tableInfos.length,
      totalViews: viewInfos.length,
      tables,
      views,
      relationships: buildRelationshipGraph(edges),
      warnings
    };
  }

  private async release(connection: SchemaConnection): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      logger.error('release', error);
    }
  }
}

async function settle<T>(run: () => Promise<T>, fallback: T): Promise<ProbeResult<T>> {
  try {
    return { ok: true, value: await run() };
  } catch (error) {
    return { ok: false, value: fallback, error: getErrorMessage(error) };
  }
}
