import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { decrypt, encrypt } from '../../core/encryption.js';
import type { ConnectionConfig, ConnectionProfile, ConnectionSummary } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';

export const connectionInputSchema = z.object({
  host: z.string().min(1, 'Host is required'),
  database: z.string().min(1, 'Database is required'),
  user: z.string().min(1, 'User is required'),
  password: z.string(),
  port: z.coerce.number().int().min(1).max(65535).default(5432),
  description: z.string().default('')
});

export type ConnectionInput = z.infer<typeof connectionInputSchema>;

export const connectionImportSchema = connectionInputSchema.extend({
  name: z.string().min(1).optional(),
  password: z.string().default(''),
  description: z.string().default('Imported connection')
});

export type ConnectionImport = z.infer<typeof connectionImportSchema>;

export type ConnectionExport = Omit<ConnectionConfig, 'password'> & {
  name: string;
  description: string;
  password?: string;
};

const storedProfileSchema = z.object({
  name: z.string(),
  host: z.string(),
  database: z.string(),
  user: z.string(),
  password: z.string(),
  port: z.number(),
  description: z.string(),
  createdAt: z.string(),
  lastUsed: z.string().nullable()
});

const storeFileSchema = z.array(storedProfileSchema);

const logger = createLogger('WORKSPACE');

type ProfileMap = Map<string, ConnectionProfile>;

function toSummary(name: string, profile: ConnectionProfile): ConnectionSummary {
  const { password: _password, ...rest } = profile;
  return { ...rest, name };
}

function importTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Named connection profiles kept in one encrypted JSON document on disk, stored as a list
 * of named entries so any profile name round-trips.
 *
 * The document is loaded on first use; every mutation rewrites it through a temp file and
 * rename. Operations are serialized so concurrent requests never interleave writes.
 */
export class ConnectionStore {
  private connections: ProfileMap | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly keyHex: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async addConnection(name: string, input: ConnectionInput): Promise<ConnectionSummary> {
    return this.exclusive(async (connections) => {
      const existing = connections.get(name);
      const profile: ConnectionProfile = {
        host: input.host,
        database: input.database,
        user: input.user,
        password: input.password,
        port: input.port,
        description: input.description,
        createdAt: existing?.createdAt ?? this.now().toISOString(),
        lastUsed: existing?.lastUsed ?? null
      };
      connections.set(name, profile);
      await this.save(connections);
      logger.info('add', 'SUCCESS', name);
      return toSummary(name, profile);
    });
  }

  /**
   * Full profile including the password; records the access time.
   */
  async getConnection(name: string): Promise<ConnectionProfile | null> {
    return this.exclusive(async (connections) => {
      const profile = connections.get(name);
      if (!profile) return null;

      profile.lastUsed = this.now().toISOString();
      await this.save(connections);
      return { ...profile };
    });
  }

  async hasConnection(name: string): Promise<boolean> {
    return this.exclusive(async (connections) => connections.has(name));
  }

  async listConnections(): Promise<ConnectionSummary[]> {
    return this.exclusive(async (connections) =>
      Array.from(connections, ([name, profile]) => toSummary(name, profile))
    );
  }

  async deleteConnection(name: string): Promise<boolean> {
    return this.exclusive(async (connections) => {
      if (!connections.delete(name)) return false;
      await this.save(connections);
      logger.info('delete', 'SUCCESS', name);
      return true;
    });
  }

  async getConnectionConfig(name: string): Promise<ConnectionConfig | null> {
    const profile = await this.getConnection(name);
    if (!profile) return null;
    return {
      host: profile.host,
      database: profile.database,
      user: profile.user,
      password: profile.password,
      port: profile.port
    };
  }

  async exportConnection(name: string, includePassword = false): Promise<ConnectionExport | null> {
    const profile = await this.getConnection(name);
    if (!profile) return null;

    const exported: ConnectionExport = {
      name,
      host: profile.host,
      database: profile.database,
      user: profile.user,
      port: profile.port,
      description: profile.description
    };
    if (includePassword) {
      exported.password = profile.password;
    }
    return exported;
  }

  /**
   * Save an exported profile; unnamed imports get an `imported_<timestamp>` name.
   */
  async importConnection(data: ConnectionImport): Promise<string> {
    const name = data.name ?? `imported_${importTimestamp(this.now())}`;
    await this.addConnection(name, {
      host: data.host,
      database: data.database,
      user: data.user,
      password: data.password,
      port: data.port,
      description: data.description
    });
    return name;
  }

  private exclusive<T>(operation: (connections: ProfileMap) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => operation(await this.load()));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async load(): Promise<ProfileMap> {
    if (this.connections) return this.connections;

    let raw: string | null = null;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        logger.error('load', error);
      }
    }

    this.connections = raw === null ? new Map() : this.decode(raw);
    return this.connections;
  }

  private decode(raw: string): ProfileMap {
    try {
      const parsed = storeFileSchema.safeParse(JSON.parse(decrypt(raw, this.keyHex)));
      if (parsed.success) {
        return new Map(parsed.data.map(({ name, ...profile }) => [name, profile]));
      }
      logger.warn('load', 'Connection store has an unexpected shape; starting empty');
    } catch (error) {
      logger.error('load', error);
    }
    return new Map();
  }

  private async save(connections: ProfileMap): Promise<void> {
    const entries = Array.from(connections, ([name, profile]) => ({ name, ...profile }));
    const payload = encrypt(JSON.stringify(entries, null, 2), this.keyHex);
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;
    await mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    try {
      await writeFile(tempPath, payload, { encoding: 'utf8', mode: 0o600 });
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      logger.error('save', error);
      throw error;
    }
  }
}
