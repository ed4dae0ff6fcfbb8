import { Router } from 'express';

import type { HealthResponse } from '../types';

// Routes are only mounted once start-up verification has passed.
export const createHealthRouter = (): Router => {
  const router = Router();

  router.get('/', (_req, res) => {
    const body: HealthResponse = {
      status: 'healthy',
      services: {
        ingestion: true,
        agent: true,
        ranking: true,
      },
    };

    res.json(body);
  });

  return router;
};
