import { Router } from 'express';

import type { JobQueue } from '../jobs/jobQueue.js';
import type { TaskRegistry } from '../jobs/tasks.js';
import { createHealthRouter } from './health.routes.js';
import { createJobRouter } from './job.routes.js';
import { createTaskRouter } from './task.routes.js';

export interface ApiDependencies {
  queue: JobQueue;
  tasks: TaskRegistry;
}

export const createApiRouter = ({ queue, tasks }: ApiDependencies): Router => {
  const router = Router();

  router.use(createHealthRouter(queue));
  router.use(createTaskRouter(queue, tasks));
  router.use(createJobRouter(queue));

  return router;
};

/** Unprefixed routes: a liveness check and job polling at `/jobs/:jobId`. */
export const createRootRouter = ({ queue }: Pick<ApiDependencies, 'queue'>): Router => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });
  router.use(createJobRouter(queue));

  return router;
};
