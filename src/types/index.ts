/**
 * Credentials needed to open a PostgreSQL connection.
 */
export interface ConnectionConfig {
  host: string;
  database: string;
  user: string;
  password: string;
  port: number;
}

/**
 * Saved connection profile as stored (encrypted) on disk.
 */
export interface ConnectionProfile extends ConnectionConfig {
  description: string;
  createdAt: string;
  lastUsed: string | null;
}

/**
 * Profile as returned to clients: no password, plus its name.
 */
export type ConnectionSummary = Omit<ConnectionProfile, 'password'> & { name: string };

export interface QueryResult {
  sql: string;
  results: Record<string, unknown>[];
  rowCount: number;
}

export interface ApiErrorBody {
  success: false;
  error: string;
  details?: string;
}
