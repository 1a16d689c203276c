import { createHash } from 'node:crypto';
import path from 'node:path';
import type { ConnectionConfig } from '../../types/index.js';
import { AppError } from '../../utils/errors.js';
import type { ConnectionStore } from '../workspace/workspace.service.js';
import { MetadataCache } from './metadata-cache.js';
import { MetadataExtractor } from './metadata-extractor.js';
import type { SchemaConnection } from './types/metadata.types.js';

export type SchemaConnector = (config: ConnectionConfig) => Promise<SchemaConnection>;

export interface MetadataServiceOptions {
  cacheDir: string;
  connect: SchemaConnector;
  schemaName?: string;
  now?: () => Date;
}

/**
 * Cache file for one profile. The hash keeps names that slug to the same text apart.
 */
export function cacheFileFor(cacheDir: string, connectionName: string): string {
  const slug = connectionName.replace(/[^A-Za-z0-9_-]/g, '_').slice(0, 48);
  const digest = createHash('sha256').update(connectionName).digest('hex').slice(0, 8);
  return path.join(cacheDir, `metadata-${slug}-${digest}.json`);
}

/**
 * Hands out a {@link MetadataExtractor} bound to a saved connection profile.
 */
export class MetadataService {
  constructor(
    private readonly store: ConnectionStore,
    private readonly options: MetadataServiceOptions
  ) {}

  async forConnection(connectionName: string): Promise<MetadataExtractor> {
    const config = await this.store.getConnectionConfig(connectionName);
    if (!config) {
      throw new AppError('Connection not found', 404, `No saved connection named '${connectionName}'`);
    }

    return new MetadataExtractor({
      connect: () => this.options.connect(config),
      cache: this.cacheFor(connectionName),
      databaseName: config.database,
      schemaName: this.options.schemaName,
      now: this.options.now
    });
  }

  cacheFor(connectionName: string): MetadataCache {
    return new MetadataCache(cacheFileFor(this.options.cacheDir, connectionName), { now: this.options.now });
  }
}
