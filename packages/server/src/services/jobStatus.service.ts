import { JobStatus, NativeJobState, type JobStatusResponse } from '@coursewright/shared';
import type { JobQueue } from '../jobs/jobQueue.js';

const STATUS_BY_STATE: Record<NativeJobState, JobStatus> = {
  [NativeJobState.PENDING]: JobStatus.QUEUED,
  [NativeJobState.STARTED]: JobStatus.RUNNING,
  // A job waiting out its retry delay is back in the queue as far as callers can tell.
  [NativeJobState.RETRY]: JobStatus.QUEUED,
  [NativeJobState.SUCCESS]: JobStatus.COMPLETED,
  [NativeJobState.FAILURE]: JobStatus.FAILED,
};

export const toJobStatus = (state: NativeJobState | null): JobStatus =>
  state === null ? JobStatus.UNKNOWN : STATUS_BY_STATE[state];

export const getJobStatus = (queue: JobQueue, jobId: string): JobStatusResponse => {
  const status = toJobStatus(queue.getStatus(jobId));
  const terminal = status === JobStatus.COMPLETED || status === JobStatus.FAILED;
  return {
    job_id: jobId,
    status,
    result: terminal ? queue.getResult(jobId) ?? null : null,
  };
};
