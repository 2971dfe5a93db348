import { Router } from 'express';
import { SystemController } from '../controllers/system.controller';

export function createSystemRouter(controller: SystemController): Router {
  const router = Router();

  router.get('/stats', controller.getStats);
  router.get('/settings', controller.getSettings);
  router.put('/settings', controller.updateSettings);
  router.get('/logs', controller.getLogs);
  router.get('/health', controller.getHealth);

  return router;
}
