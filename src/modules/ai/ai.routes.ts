import { Router } from 'express';
import type { AppDependencies } from '../../app.js';
import { createAiController } from './ai.controller.js';

export function createAiRouter(deps: AppDependencies): Router {
  const controller = createAiController(deps);
  const router = Router();

  /**
   * POST /api/ai/generate-query
   * Generate SQL for the active connection without running it.
   */
  router.post('/generate-query', controller.generateQuery);

  /**
   * POST /api/ai/validate-query
   * Run the read-only safety gate over a statement.
   */
  router.post('/validate-query', controller.validateQuery);

  /**
   * GET /api/ai/stats
   * Return AI cache and monitoring metrics.
   */
  router.get('/stats', controller.getStats);

  return router;
}
