import { Router } from 'express';
import type { AppDependencies } from '../../app.js';
import { createQueryController } from './query.controller.js';

export function createQueryRouter(deps: AppDependencies): Router {
  const controller = createQueryController(deps);
  const router = Router();

  // Endpoint: POST /api/query
  // Purpose: question -> generated SQL -> rows
  router.post('/', controller.askQuestion);

  // Endpoint: POST /api/query/execute
  // Purpose: Runs raw SQL provided by the user
  router.post('/execute', controller.runUserQuery);

  return router;
}
