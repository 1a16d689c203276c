import type { NextFunction, Response } from 'express';
import { z } from 'zod';
import type { AppDependencies } from '../../app.js';
import { requireSession, type SessionRequest } from '../../middleware/session.middleware.js';
import { describeIssues } from '../../utils/errors.js';

const GenerateQuerySchema = z.object({
  question: z.string().trim().min(3, 'Question must be at least 3 characters')
});

const ValidateQuerySchema = z.object({
  query: z.string().min(1, 'Query cannot be empty')
});

export function createAiController(deps: AppDependencies) {
  return {
    /**
     * POST /api/ai/generate-query
     */
    generateQuery: async (req: SessionRequest, res: Response, next: NextFunction) => {
      const validation = GenerateQuerySchema.safeParse(req.body);
      if (!validation.success) {
        return res.status(400).json({ success: false, error: 'Invalid request', details: describeIssues(validation.error) });
      }

      try {
        const data = await deps.query.generateSql(requireSession(req), validation.data.question);
        res.json({ success: true, data });
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /api/ai/validate-query
     */
    validateQuery: (req: SessionRequest, res: Response) => {
      const validation = ValidateQuerySchema.safeParse(req.body);
      if (!validation.success) {
        return res.status(400).json({ success: false, error: 'Invalid request', details: describeIssues(validation.error) });
      }

      res.json({ success: true, data: deps.validator.validateQuery(validation.data.query) });
    },

    /**
     * GET /api/ai/stats
     */
    getStats: (_req: SessionRequest, res: Response) => {
      res.json({ success: true, data: deps.ai.getCacheStats() });
    }
  };
}
