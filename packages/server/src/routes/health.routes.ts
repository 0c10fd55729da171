import { Router } from 'express';
import type { HealthResponse } from '@coursewright/shared';

import type { JobQueue } from '../jobs/jobQueue.js';

export const createHealthRouter = (queue: JobQueue): Router => {
  const router = Router();

  router.get('/health', (_req, res) => {
    const body: HealthResponse = {
      status: 'ok',
      uptime: process.uptime(),
      queue: queue.stats(),
    };
    res.status(200).json(body);
  });

  return router;
};
