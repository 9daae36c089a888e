import { Router } from 'express';
import type { HealthController } from '../controllers/health.controller';

export function createHealthRouter(healthController: HealthController): Router {
  const router = Router();

  /**
   * GET /api/v1/health
   * Basic health check - no actor header required
   */
  router.get('/', (req, res, next) => {
    healthController.getHealthCheck(req, res).catch(next);
  });

  /**
   * GET /api/v1/health/ready
   */
  router.get('/ready', healthController.getReadiness.bind(healthController));

  return router;
}
