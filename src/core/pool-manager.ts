import pg, { type Client, type Pool } from 'pg';
import type { SchemaConnection } from '../modules/metadata/types/metadata.types.js';
import type { ConnectionConfig } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const { Client: ClientClass, Pool: PoolClass } = pg;

const logger = createLogger('POOL');

export interface ConnectionOptions {
  statementTimeoutMs?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Unconnected client for one schema extraction, with its idle-error listener attached.
 */
export function createSchemaClient(config: ConnectionConfig, options: ConnectionOptions = {}): Client {
  const client = new ClientClass({
    ...config,
    statement_timeout: options.statementTimeoutMs,
    connectionTimeoutMillis: options.connectionTimeoutMillis ?? 5000
  });
  // pg emits 'error' on an idle client when the backend drops it; unhandled, that ends the process
  client.on('error', (err) => logger.error('schema-client', err));
  return client;
}

/**
 * Open a dedicated client for one schema extraction. The caller owns it and must close it.
 */
export async function openSchemaConnection(
  config: ConnectionConfig,
  options: ConnectionOptions = {}
): Promise<SchemaConnection> {
  const client = createSchemaClient(config, options);
  await client.connect();

  return {
    async query<R extends Record<string, unknown>>(text: string, values?: unknown[]): Promise<R[]> {
      const result = await client.query<R>(text, values);
      return result.rows;
    },
    async close() {
      await client.end();
    }
  };
}

/**
 * Open, probe and close a connection. Resolves with the server version string.
 */
export async function testConnection(config: ConnectionConfig): Promise<string> {
  const connection = await openSchemaConnection(config, { connectionTimeoutMillis: 5000 });
  try {
    const rows = await connection.query<{ version: string }>('SELECT version() AS version;');
    return rows[0]?.version ?? 'unknown';
  } finally {
    await connection.close();
  }
}

/**
 * Query-execution pools, one per connection profile. Schema extraction does not use
 * these; it opens its own client through {@link openSchemaConnection}.
 */
export class PoolManager {
  private pools: Map<string, Pool> = new Map();

  constructor(private readonly options: ConnectionOptions = {}) {}

  getPool(profileName: string, config: ConnectionConfig): Pool {
    const existing = this.pools.get(profileName);
    if (existing) {
      return existing;
    }

    const pool = new PoolClass({
      ...config,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: this.options.connectionTimeoutMillis ?? 5000,
      statement_timeout: this.options.statementTimeoutMs
    });

    pool.on('error', (err) => {
      logger.error(`pool:${profileName}`, err);
      void this.closePool(profileName);
    });

    this.pools.set(profileName, pool);
    return pool;
  }

  async closePool(profileName: string): Promise<void> {
    const pool = this.pools.get(profileName);
    if (!pool) return;

    this.pools.delete(profileName);
    try {
      await pool.end();
    } catch (err) {
      logger.error(`close:${profileName}`, err);
    }
  }

  async closeAll(): Promise<void> {
    await Promise.all(Array.from(this.pools.keys()).map((name) => this.closePool(name)));
  }
}
