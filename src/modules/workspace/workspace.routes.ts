import { Router } from 'express';
import type { AppDependencies } from '../../app.js';
import { createWorkspaceController } from './workspace.controller.js';

export function createWorkspaceRouter(deps: AppDependencies): Router {
  const controller = createWorkspaceController(deps);
  const router = Router();

  router.get('/connections', controller.listConnections);
  router.post('/connections', controller.addConnection);

  router.post('/connections/test', controller.testConnection);
  router.post('/connections/import', controller.importConnection);

  router.get('/connections/:name', controller.getConnection);
  router.delete('/connections/:name', controller.deleteConnection);
  router.post('/connections/:name/activate', controller.activateConnection);
  router.get('/connections/:name/export', controller.exportConnection);

  return router;
}
