import type { Pool } from 'pg';
import type { PoolManager } from '../../core/pool-manager.js';
import type { ConnectionConfig, QueryResult } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';
import type { AIService } from '../ai/ai.service.js';
import type { QueryValidator } from '../ai/query-validator.js';
import type { GenerateQueryResponse, SchemaReference } from '../ai/types/ai.types.js';
import type { MetadataService } from '../metadata/metadata.service.js';
import type { Snapshot } from '../metadata/types/metadata.types.js';
import { AppError } from '../../utils/errors.js';
import type { ConnectionStore } from '../workspace/workspace.service.js';
import type { WorkspaceSession } from '../workspace/workspace.session.js';

/**
 * Runs one statement and returns its rows.
 */
export interface ReadOnlyExecutor {
  run(sql: string): Promise<Record<string, unknown>[]>;
}

export type ExecutorFactory = (connectionName: string, config: ConnectionConfig) => ReadOnlyExecutor;

const logger = createLogger('QUERY');

/**
 * Execute inside a READ ONLY transaction that is always rolled back, so even a statement
 * that slips past the validator cannot change data.
 */
export function createPoolExecutor(pool: Pool): ReadOnlyExecutor {
  return {
    async run(sql: string) {
      const client = await pool.connect();
      let releaseError: Error | undefined;
      try {
        await client.query('BEGIN READ ONLY');
        const result = await client.query<Record<string, unknown>>(sql);
        return result.rows;
      } finally {
        try {
          await client.query('ROLLBACK');
        } catch (error) {
          logger.error('rollback', error);
          releaseError = error instanceof Error ? error : new Error('Rollback failed');
        }
        client.release(releaseError);
      }
    }
  };
}

export function poolExecutorFactory(pools: PoolManager): ExecutorFactory {
  return (connectionName, config) => createPoolExecutor(pools.getPool(connectionName, config));
}

export function toSchemaReference(snapshot: Snapshot): SchemaReference {
  return { tables: Object.keys(snapshot.tables), views: Object.keys(snapshot.views) };
}

export interface QueryServiceDependencies {
  store: ConnectionStore;
  metadata: MetadataService;
  ai: AIService;
  validator: QueryValidator;
  executorFor: ExecutorFactory;
}

export class QueryService {
  constructor(private readonly deps: QueryServiceDependencies) {}

  /**
   * Question → schema text → checked SQL for the session's active profile, not executed.
   */
  async generateSql(session: WorkspaceSession, question: string): Promise<GenerateQueryResponse> {
    const connectionName = session.requireActiveConnection();
    const extractor = await this.deps.metadata.forConnection(connectionName);
    const snapshot = await extractor.extractAllMetadata({
      includeSamples: false,
      includeStatistics: false,
      useCache: true
    });

    if (snapshot.connectionError) {
      throw new AppError('Database connection failed', 502, snapshot.connectionError);
    }

    return this.deps.ai.generateQuery(
      connectionName,
      { question, schemaText: extractor.formatForAi(snapshot) },
      toSchemaReference(snapshot)
    );
  }

  async answerQuestion(session: WorkspaceSession, question: string): Promise<QueryResult> {
    const generated = await this.generateSql(session, question);
    return this.run(session.requireActiveConnection(), generated.query);
  }

  /**
   * Run caller-supplied SQL through the same read-only gate as generated SQL.
   */
  async executeSql(session: WorkspaceSession, sql: string): Promise<QueryResult> {
    const connectionName = session.requireActiveConnection();
    const validation = this.deps.validator.validateQuery(sql);
    if (!validation.isValid) {
      throw new AppError('Query rejected', 400, validation.errors.join('; '));
    }
    return this.run(connectionName, sql);
  }

  private async run(connectionName: string, sql: string): Promise<QueryResult> {
    const config = await this.deps.store.getConnectionConfig(connectionName);
    if (!config) {
      throw new AppError('Connection not found', 404, `No saved connection named '${connectionName}'`);
    }

    const startedAt = Date.now();
    try {
      const results = await this.deps.executorFor(connectionName, config).run(sql);
      logger.info(`execute:${connectionName}`, 'SUCCESS', `Rows:${results.length}`, Date.now() - startedAt);
      return { sql, results, rowCount: results.length };
    } catch (error) {
      logger.error(`execute:${connectionName}`, error);
      throw new AppError('Query execution failed', 400, error instanceof Error ? error.message : undefined);
    }
  }
}
