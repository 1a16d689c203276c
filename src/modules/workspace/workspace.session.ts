import NodeCache from 'node-cache';
import { AppError } from '../../utils/errors.js';

/**
 * Per-client workspace state: which saved profile queries and metadata requests target.
 */
export class WorkspaceSession {
  activeConnection: string | null = null;
  lastSeen = 0;

  constructor(readonly id: string) {}

  requireActiveConnection(): string {
    if (!this.activeConnection) {
      throw new AppError('No active database connection', 400, 'Activate a saved connection first.');
    }
    return this.activeConnection;
  }
}

export interface SessionRegistryOptions {
  idleTtlSeconds?: number;
  maxSessions?: number;
}

/**
 * Sessions expire after `idleTtlSeconds` without a request. When `maxSessions` is reached the
 * least recently seen session is dropped to make room.
 */
export class SessionRegistry {
  private readonly sessions: NodeCache;
  private readonly idleTtlSeconds: number;
  private readonly maxSessions: number;
  private tick = 0;

  constructor(options: SessionRegistryOptions = {}) {
    this.idleTtlSeconds = options.idleTtlSeconds ?? 3600;
    this.maxSessions = options.maxSessions ?? 1000;
    this.sessions = new NodeCache({ stdTTL: this.idleTtlSeconds, checkperiod: 120, useClones: false });
  }

  get(id: string): WorkspaceSession {
    this.tick += 1;

    const existing = this.sessions.get<WorkspaceSession>(id);
    if (existing) {
      existing.lastSeen = this.tick;
      this.sessions.ttl(id, this.idleTtlSeconds);
      return existing;
    }

    if (this.sessions.keys().length >= this.maxSessions) {
      this.evictOldest();
    }

    const session = new WorkspaceSession(id);
    session.lastSeen = this.tick;
    this.sessions.set(id, session);
    return session;
  }

  get size(): number {
    return this.sessions.keys().length;
  }

  /**
   * Clear `connectionName` from every session that has it active.
   */
  deactivateEverywhere(connectionName: string): number {
    let cleared = 0;
    for (const session of this.all()) {
      if (session.activeConnection === connectionName) {
        session.activeConnection = null;
        cleared += 1;
      }
    }
    return cleared;
  }

  private all(): WorkspaceSession[] {
    return Object.values(this.sessions.mget<WorkspaceSession>(this.sessions.keys()));
  }

  private evictOldest(): void {
    let oldest: WorkspaceSession | undefined;
    for (const session of this.all()) {
      if (!oldest || session.lastSeen < oldest.lastSeen) oldest = session;
    }
    if (oldest) this.sessions.del(oldest.id);
  }
}
