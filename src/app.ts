import cors from 'cors';
import express, { type Express, type Response } from 'express';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import { env } from './config/env.js';
import { openSchemaConnection, PoolManager, testConnection } from './core/pool-manager.js';
import { errorMiddleware } from './middleware/error.middleware.js';
import { createSessionMiddleware, requireSession, SESSION_HEADER, type SessionRequest } from './middleware/session.middleware.js';
import { AIService } from './modules/ai/ai.service.js';
import { createAiRouter } from './modules/ai/ai.routes.js';
import { QueryValidator } from './modules/ai/query-validator.js';
import { createMetadataRouter } from './modules/metadata/metadata.routes.js';
import { MetadataService, type SchemaConnector } from './modules/metadata/metadata.service.js';
import { createQueryRouter } from './modules/query/query.routes.js';
import { poolExecutorFactory, QueryService, type ExecutorFactory } from './modules/query/query.service.js';
import { ConnectionStore } from './modules/workspace/workspace.service.js';
import { createWorkspaceRouter } from './modules/workspace/workspace.routes.js';
import { SessionRegistry, type SessionRegistryOptions } from './modules/workspace/workspace.session.js';
import type { ConnectionConfig } from './types/index.js';

export interface AppDependencies {
  store: ConnectionStore;
  sessions: SessionRegistry;
  metadata: MetadataService;
  ai: AIService;
  validator: QueryValidator;
  query: QueryService;
  pools: Pick<PoolManager, 'closePool' | 'closeAll'>;
  testConnection: (config: ConnectionConfig) => Promise<string>;
}

export interface DependencyParts {
  store: ConnectionStore;
  ai: AIService;
  cacheDir: string;
  connect: SchemaConnector;
  executorFor: ExecutorFactory;
  pools: AppDependencies['pools'];
  testConnection: AppDependencies['testConnection'];
  sessionLimits?: SessionRegistryOptions;
  now?: () => Date;
}

/**
 * Wire the services together from their outer edges (storage, database access, model).
 */
export function assembleDependencies(parts: DependencyParts): AppDependencies {
  const validator = new QueryValidator();
  const metadata = new MetadataService(parts.store, {
    cacheDir: parts.cacheDir,
    connect: parts.connect,
    now: parts.now
  });

  return {
    store: parts.store,
    sessions: new SessionRegistry(parts.sessionLimits),
    metadata,
    ai: parts.ai,
    validator,
    query: new QueryService({
      store: parts.store,
      metadata,
      ai: parts.ai,
      validator,
      executorFor: parts.executorFor
    }),
    pools: parts.pools,
    testConnection: parts.testConnection
  };
}

export function createDefaultDependencies(): AppDependencies {
  const pools = new PoolManager({ statementTimeoutMs: env.STATEMENT_TIMEOUT_MS });

  return assembleDependencies({
    store: new ConnectionStore(env.CONNECTIONS_FILE, env.ENCRYPTION_KEY),
    ai: new AIService({
      apiKey: env.GROQ_API_KEY,
      modelName: env.GROQ_MODEL,
      cacheTtlSeconds: env.AI_CACHE_TTL,
      maxCacheSize: env.AI_MAX_CACHE_SIZE
    }),
    cacheDir: env.CACHE_DIR,
    connect: (config) => openSchemaConnection(config, { statementTimeoutMs: env.STATEMENT_TIMEOUT_MS }),
    executorFor: poolExecutorFactory(pools),
    pools,
    testConnection,
    sessionLimits: { idleTtlSeconds: env.SESSION_IDLE_TTL, maxSessions: env.MAX_SESSIONS }
  });
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // 1. Security Headers
  app.use(helmet());

  // 2. CORS Configuration
  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      methods: ['GET', 'POST', 'PUT', 'DELETE'],
      allowedHeaders: ['Content-Type', SESSION_HEADER]
    })
  );

  app.use(express.json({ limit: '1mb' }));

  // Model calls and user queries are the expensive routes
  const limiter = rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    limit: env.RATE_LIMIT_MAX_REQUESTS,
    standardHeaders: true,
    legacyHeaders: false,
    message: { success: false, error: 'Too many requests', details: 'Rate limit exceeded, try again later' }
  });
  app.use('/api/ai', limiter);
  app.use('/api/query', limiter);

  app.use('/api', createSessionMiddleware(deps.sessions));

  app.get('/api/health', (req: SessionRequest, res: Response) => {
    res.json({
      success: true,
      data: {
        status: 'ok',
        uptimeSeconds: Math.round(process.uptime()),
        activeConnection: requireSession(req).activeConnection
      }
    });
  });

  // Routes
  app.use('/api/workspace', createWorkspaceRouter(deps));
  app.use('/api/metadata', createMetadataRouter(deps));
  app.use('/api/query', createQueryRouter(deps));
  app.use('/api/ai', createAiRouter(deps));

  app.use('/api', (_req, res) => {
    res.status(404).json({ success: false, error: 'Not found', details: 'No route matches this request' });
  });

  // Error middleware MUST be the last one added
  app.use(errorMiddleware);

  return app;
}
