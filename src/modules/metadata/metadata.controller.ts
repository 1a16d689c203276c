import type { NextFunction, Response } from 'express';
import { z } from 'zod';
import type { AppDependencies } from '../../app.js';
import { requireSession, type SessionRequest } from '../../middleware/session.middleware.js';
import { AppError, describeIssues } from '../../utils/errors.js';
import { DEFAULT_EXTRACT_OPTIONS } from './metadata-extractor.js';
import type { Snapshot } from './types/metadata.types.js';

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true'));

const MetadataQuerySchema = z.object({
  includeSamples: flag(DEFAULT_EXTRACT_OPTIONS.includeSamples),
  sampleRows: z.coerce.number().int().min(1).max(100).default(DEFAULT_EXTRACT_OPTIONS.sampleRows),
  includeStatistics: flag(DEFAULT_EXTRACT_OPTIONS.includeStatistics),
  useCache: flag(DEFAULT_EXTRACT_OPTIONS.useCache)
});

function assertConnected(snapshot: Snapshot): Snapshot {
  if (snapshot.connectionError) {
    throw new AppError('Database connection failed', 502, snapshot.connectionError);
  }
  return snapshot;
}

export function createMetadataController(deps: AppDependencies) {
  return {
    /**
     * GET /api/metadata/schema
     * Schema text as handed to the model: no samples or statistics.
     */
    getSchemaText: async (req: SessionRequest, res: Response, next: NextFunction) => {
      try {
        const connection = requireSession(req).requireActiveConnection();
        const extractor = await deps.metadata.forConnection(connection);
        const snapshot = assertConnected(
          await extractor.extractAllMetadata({ includeSamples: false, includeStatistics: false, useCache: true })
        );
        res.json({ success: true, data: { connection, schema: extractor.formatForAi(snapshot) } });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/metadata
     */
    getMetadata: async (req: SessionRequest, res: Response, next: NextFunction) => {
      const validation = MetadataQuerySchema.safeParse(req.query);
      if (!validation.success) {
        return res.status(400).json({ success: false, error: 'Invalid request', details: describeIssues(validation.error) });
      }

      try {
        const connection = requireSession(req).requireActiveConnection();
        const extractor = await deps.metadata.forConnection(connection);
        const snapshot = assertConnected(await extractor.extractAllMetadata(validation.data));
        res.json({ success: true, data: snapshot });
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /api/metadata/refresh
     * Drop the cached snapshot and generated SQL, then extract and store a fresh one.
     */
    refresh: async (req: SessionRequest, res: Response, next: NextFunction) => {
      try {
        const connection = requireSession(req).requireActiveConnection();
        const extractor = await deps.metadata.forConnection(connection);
        await extractor.clearCache();
        deps.ai.clearScope(connection);

        const snapshot = assertConnected(await extractor.extractAllMetadata({ useCache: true }));
        res.json({
          success: true,
          data: {
            connection,
            extractedAt: snapshot.extractedAt,
            totalTables: snapshot.totalTables,
            totalViews: snapshot.totalViews,
            warnings: snapshot.warnings
          }
        });
      } catch (error) {
        next(error);
      }
    },

    /**
     * DELETE /api/metadata/cache
     */
    clearCache: async (req: SessionRequest, res: Response, next: NextFunction) => {
      try {
        const connection = requireSession(req).requireActiveConnection();
        await deps.metadata.cacheFor(connection).clear();
        deps.ai.clearScope(connection);
        res.json({ success: true, data: { connection, cleared: true } });
      } catch (error) {
        next(error);
      }
    }
  };
}
