import express from 'express';

import { loadConfigFromDotenv } from './config';
import { ConfigurationError } from './errors';
import { createHealthRouter } from './routes/health';
import { createRankRouter } from './routes/rank';
import { createSessionRouter } from './routes/session';
import { createServices } from './services';

const startSessionSweeper = (sweep: () => Promise<unknown>, intervalMs: number): void => {
  if (intervalMs <= 0) {
    return;
  }

  const timer = setInterval(() => {
    sweep().catch((error: unknown) => {
      console.error('[SESSION] Session sweep failed:', error);
    });
  }, intervalMs);

  timer.unref();
};

const main = async (): Promise<void> => {
  const config = loadConfigFromDotenv();
  const services = await createServices(config);

  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use('/health', createHealthRouter());
  app.use('/rank-cvs', createRankRouter({ pipeline: services.pipeline, maxFiles: config.uploads.maxFiles }));
  app.use('/', createSessionRouter({ pipeline: services.pipeline, sessions: services.sessions }));

  startSessionSweeper(() => services.pipeline.sweep(config.sessions.maxAgeMs), config.sessions.sweepIntervalMs);

  app.listen(config.port, () => {
    console.log(`Server listening on port ${config.port}`);
  });
};

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(`[STARTUP] Fatal configuration error: ${error.message}`);
  } else {
    console.error('[STARTUP] Failed to start server:', error);
  }
  process.exitCode = 1;
});
