import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/error.middleware';
import { HealthService } from './health.service';

export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  checkHealth = asyncHandler(async (_req: Request, res: Response) => {
    const health = await this.healthService.checkHealth();

    const statusCode = health.status === 'healthy' ? 200 : 503;

    res.status(statusCode).json(health);
  });
}
