import { Request, Response } from 'express';
import { HealthService, HealthStatus } from '../services/health.service';

export const createHealthController = (health: Pick<HealthService, 'status'>) => {
  const handleHealth = async (
    _req: Pick<Request, 'query'>,
    res: Pick<Response<HealthStatus>, 'status' | 'json'>
  ): Promise<void> => {
    const status = await health.status();
    res.status(status.status === 'ok' ? 200 : 503).json(status);
  };

  return { handleHealth };
};
