import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config';
import { buildContainer } from './container';
import { errorMessage } from './errors/PipelineErrors';
import { createLogger, setDefaultLogLevel } from './utils/logger';

const logger = createLogger('server');

const start = async (): Promise<void> => {
  const config = loadConfig();
  setDefaultLogLevel(config.logLevel);

  const container = await buildContainer(config);
  const app = createApp({
    pipeline: container.pipeline,
    images: container.images,
    audit: container.audit,
    health: container.health,
    maxUploadBytes: config.server.maxUploadBytes,
  });

  app.listen(config.server.port, () => {
    logger.info(`Server listening on http://localhost:${config.server.port}`, {
      models: container.gateway.modelIds,
    });
  });
};

start().catch((error: unknown) => {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exitCode = 1;
});
