import { Router } from 'express';
import type { RecordsStore } from '../records/records.types';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

export function createHealthRouter(records: RecordsStore): Router {
  const router = Router();
  const healthController = new HealthController(new HealthService(records));

  // Public health check endpoint (no auth required)
  router.get('/', healthController.checkHealth);

  return router;
}
