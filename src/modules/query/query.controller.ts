import type { NextFunction, Response } from 'express';
import { z } from 'zod';
import type { AppDependencies } from '../../app.js';
import { requireSession, type SessionRequest } from '../../middleware/session.middleware.js';
import { describeIssues } from '../../utils/errors.js';

const AskSchema = z.object({
  question: z.string().trim().min(3, 'Question must be at least 3 characters')
});

const ExecuteSchema = z.object({
  sql: z.string().trim().min(1, 'SQL query cannot be empty')
});

export function createQueryController(deps: AppDependencies) {
  return {
    /**
     * Natural-language question against the session's active database.
     */
    askQuestion: async (req: SessionRequest, res: Response, next: NextFunction) => {
      const validation = AskSchema.safeParse(req.body);
      if (!validation.success) {
        return res.status(400).json({ success: false, error: 'Invalid request', details: describeIssues(validation.error) });
      }

      try {
        const result = await deps.query.answerQuestion(requireSession(req), validation.data.question);
        res.json({ success: true, data: result });
      } catch (error) {
        next(error);
      }
    },

    /**
     * Raw SQL from the caller, held to the same read-only rules as generated SQL.
     */
    runUserQuery: async (req: SessionRequest, res: Response, next: NextFunction) => {
      const validation = ExecuteSchema.safeParse(req.body);
      if (!validation.success) {
        return res.status(400).json({ success: false, error: 'Invalid request', details: describeIssues(validation.error) });
      }

      try {
        const result = await deps.query.executeSql(requireSession(req), validation.data.sql);
        res.json({ success: true, data: result });
      } catch (error) {
        next(error);
      }
    }
  };
}
