import { Router } from 'express';
import {
  JobStatus,
  NativeJobState,
  type AsyncTaskResponse,
  type SyncTaskResponse,
} from '@coursewright/shared';

import type { JobQueue } from '../jobs/jobQueue.js';
import type { TaskRegistry } from '../jobs/tasks.js';
import { validate } from '../middleware/validate.middleware.js';
import { taskSubmissionLimiter } from '../middleware/rateLimiter.middleware.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import { TaskFailedError } from '../utils/errors.js';

/**
 * Exposes every registered task twice:
 *   POST /sync/<task>   runs it in the request and answers with its result
 *   POST /async/<task>  queues it and answers with a job id to poll
 */
export const createTaskRouter = (queue: JobQueue, tasks: TaskRegistry): Router => {
  const router = Router();

  for (const task of Object.values(tasks)) {
    router.post(
      `/sync/${task.name}`,
      taskSubmissionLimiter,
      validate(task.payloadSchema),
      asyncHandler(async (req, res) => {
        const job = await queue.runInline(task, req.body);
        if (job.state === NativeJobState.FAILURE) {
          throw new TaskFailedError(`Task ${task.name} failed after ${job.attempts} attempt(s)`, {
            job_id: job.id,
            reason: job.result,
          });
        }
        const body: SyncTaskResponse = { status: JobStatus.COMPLETED, result: job.result };
        res.status(200).json(body);
      }),
    );

    router.post(
      `/async/${task.name}`,
      taskSubmissionLimiter,
      validate(task.payloadSchema),
      (req, res) => {
        const jobId = queue.enqueue(task, req.body);
        req.log.info({ jobId, task: task.name }, 'Task submitted');
        const body: AsyncTaskResponse = { status: JobStatus.QUEUED, job_id: jobId };
        res.status(202).json(body);
      },
    );
  }

  return router;
};
