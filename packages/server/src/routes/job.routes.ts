import { Router } from 'express';
import { jobParamsSchema } from '@coursewright/shared';

import type { JobQueue } from '../jobs/jobQueue.js';
import { validate } from '../middleware/validate.middleware.js';
import { getJobStatus } from '../services/jobStatus.service.js';

export const createJobRouter = (queue: JobQueue): Router => {
  const router = Router();

  router.get('/jobs/:jobId', validate({ params: jobParamsSchema }), (req, res) => {
    res.status(200).json(getJobStatus(queue, req.params.jobId));
  });

  return router;
};
