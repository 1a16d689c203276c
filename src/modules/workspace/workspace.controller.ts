import type { NextFunction, Response } from 'express';
import { z } from 'zod';
import type { AppDependencies } from '../../app.js';
import { requireSession, type SessionRequest } from '../../middleware/session.middleware.js';
import type { ConnectionConfig } from '../../types/index.js';
import { AppError, describeIssues } from '../../utils/errors.js';
import { getErrorMessage } from '../../utils/logger.js';
import { connectionImportSchema, connectionInputSchema } from './workspace.service.js';

const connectionNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_.-]{1,64}$/, 'Name must be 1-64 characters of letters, digits, ".", "_" or "-"');

const AddConnectionSchema = connectionInputSchema.extend({ name: connectionNameSchema });

const ImportConnectionSchema = connectionImportSchema.extend({ name: connectionNameSchema.optional() });

const ExportQuerySchema = z.object({
  includePassword: z.enum(['true', 'false']).default('false')
});

function notFound(name: string): AppError {
  return new AppError('Connection not found', 404, `No saved connection named '${name}'`);
}

export function createWorkspaceController(deps: AppDependencies) {
  const probe = async (config: ConnectionConfig) => {
    try {
      return await deps.testConnection(config);
    } catch (error) {
      throw new AppError('Connection test failed', 502, getErrorMessage(error));
    }
  };

  return {
    /**
     * GET /api/workspace/connections
     */
    listConnections: async (req: SessionRequest, res: Response, next: NextFunction) => {
      try {
        const connections = await deps.store.listConnections();
        res.json({
          success: true,
          data: { connections, activeConnection: requireSession(req).activeConnection }
        });
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /api/workspace/connections
     */
    addConnection: async (req: SessionRequest, res: Response, next: NextFunction) => {
      const validation = AddConnectionSchema.safeParse(req.body);
      if (!validation.success) {
        return res.status(400).json({ success: false, error: 'Invalid request', details: describeIssues(validation.error) });
      }

      try {
        const { name, ...input } = validation.data;
        const existed = await deps.store.hasConnection(name);
        const connection = await deps.store.addConnection(name, input);
        if (existed) {
          // credentials may have changed: stale pools and cached schema go
          await deps.pools.closePool(name);
          await deps.metadata.cacheFor(name).clear();
          deps.ai.clearScope(name);
        }
        res.status(existed ? 200 : 201).json({ success: true, data: connection });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/workspace/connections/:name
     */
    getConnection: async (req: SessionRequest, res: Response, next: NextFunction) => {
      try {
        const { name } = req.params;
        const connection = (await deps.store.listConnections()).find((summary) => summary.name === name);
        if (!connection) throw notFound(name);
        res.json({ success: true, data: connection });
      } catch (error) {
        next(error);
      }
    },

    /**
     * DELETE /api/workspace/connections/:name
     */
    deleteConnection: async (req: SessionRequest, res: Response, next: NextFunction) => {
      try {
        const { name } = req.params;
        if (!(await deps.store.deleteConnection(name))) throw notFound(name);

        const deactivatedSessions = deps.sessions.deactivateEverywhere(name);
        await deps.pools.closePool(name);
        await deps.metadata.cacheFor(name).clear();
        deps.ai.clearScope(name);

        res.json({ success: true, data: { deleted: name, deactivatedSessions } });
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /api/workspace/connections/test
     */
    testConnection: async (req: SessionRequest, res: Response, next: NextFunction) => {
      const validation = connectionInputSchema.safeParse(req.body);
      if (!validation.success) {
        return res.status(400).json({ success: false, error: 'Invalid request', details: describeIssues(validation.error) });
      }

      try {
        const { description: _description, ...config } = validation.data;
        const serverVersion = await probe(config);
        res.json({ success: true, data: { connected: true, serverVersion } });
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /api/workspace/connections/:name/activate
     */
    activateConnection: async (req: SessionRequest, res: Response, next: NextFunction) => {
      try {
        const session = requireSession(req);
        const { name } = req.params;
        const config = await deps.store.getConnectionConfig(name);
        if (!config) throw notFound(name);

        const serverVersion = await probe(config);
        session.activeConnection = name;
        res.json({ success: true, data: { activeConnection: name, serverVersion } });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/workspace/connections/:name/export
     */
    exportConnection: async (req: SessionRequest, res: Response, next: NextFunction) => {
      const validation = ExportQuerySchema.safeParse(req.query);
      if (!validation.success) {
        return res.status(400).json({ success: false, error: 'Invalid request', details: describeIssues(validation.error) });
      }

      try {
        const { name } = req.params;
        const exported = await deps.store.exportConnection(name, validation.data.includePassword === 'true');
        if (!exported) throw notFound(name);
        res.json({ success: true, data: exported });
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /api/workspace/connections/import
     */
    importConnection: async (req: SessionRequest, res: Response, next: NextFunction) => {
      const validation = ImportConnectionSchema.safeParse(req.body);
      if (!validation.success) {
        return res.status(400).json({ success: false, error: 'Invalid request', details: describeIssues(validation.error) });
      }

      try {
        const name = await deps.store.importConnection(validation.data);
        res.status(201).json({ success: true, data: { name } });
      } catch (error) {
        next(error);
      }
    }
  };
}
