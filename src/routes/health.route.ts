import { NextFunction, Request, Response, Router } from 'express';
import { createHealthController } from '../controllers/health.controller';
import { HealthService } from '../services/health.service';

export const createHealthRouter = (health: Pick<HealthService, 'status'>): Router => {
  const { handleHealth } = createHealthController(health);
  const router = Router();

  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    handleHealth(req, res).catch(next);
  });

  return router;
};
