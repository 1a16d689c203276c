import { Router } from 'express';
import type { AppDependencies } from '../../app.js';
import { createMetadataController } from './metadata.controller.js';

export function createMetadataRouter(deps: AppDependencies): Router {
  const controller = createMetadataController(deps);
  const router = Router();

  router.get('/', controller.getMetadata);
  router.get('/schema', controller.getSchemaText);
  router.post('/refresh', controller.refresh);
  router.delete('/cache', controller.clearCache);

  return router;
}
