import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { PrescriptionControllerDeps } from './controllers/prescription.controller';
import { errorMessage } from './errors/PipelineErrors';
import { createHealthRouter } from './routes/health.route';
import { createPrescriptionRouter, UploadRejectedError } from './routes/prescription.route';
import { HealthService } from './services/health.service';
import { ServiceResponse } from './types/PrescriptionTypes';
import { createLogger, Logger } from './utils/logger';

export interface AppDeps extends PrescriptionControllerDeps {
  health: Pick<HealthService, 'status'>;
  maxUploadBytes: number;
}

export const createApp = (deps: AppDeps) => {
  const logger: Logger = deps.logger ?? createLogger('http');
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  app.use('/prescriptions', createPrescriptionRouter({ ...deps, logger }, deps.maxUploadBytes));
  app.use('/health', createHealthRouter(deps.health));

  app.use(
    (error: unknown, _req: Request, res: Response<ServiceResponse<never>>, _next: NextFunction) => {
      if (error instanceof UploadRejectedError || error instanceof multer.MulterError) {
        res.status(400).json({ success: false, error: error.message });
        return;
      }
      logger.error('Unhandled request error', { error: errorMessage(error) });
      res.status(500).json({ success: false, error: errorMessage(error, 'Internal server error.') });
    }
  );

  return app;
};
