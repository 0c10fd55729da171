import { describe, it, expect, vi } from 'vitest';
import { JobStatus, NativeJobState } from '@coursewright/shared';

import { getJobStatus, toJobStatus } from '../jobStatus.service.js';
import type { JobQueue } from '../../jobs/jobQueue.js';

const fakeQueue = (state: NativeJobState | null, result: unknown): JobQueue => ({
  enqueue: vi.fn(),
  getStatus: vi.fn(() => state),
  getResult: vi.fn(() => result),
  runInline: vi.fn(),
  stats: vi.fn(),
});

describe('toJobStatus', () => {
  it.each([
    [NativeJobState.PENDING, JobStatus.QUEUED],
    [NativeJobState.STARTED, JobStatus.RUNNING],
    [NativeJobState.RETRY, JobStatus.QUEUED],
    [NativeJobState.SUCCESS, JobStatus.COMPLETED],
    [NativeJobState.FAILURE, JobStatus.FAILED],
    [null, JobStatus.UNKNOWN],
  ])('maps %s to %s', (state, status) => {
    expect(toJobStatus(state)).toBe(status);
  });
});

describe('getJobStatus', () => {
  it('returns the result of a completed job', () => {
    const queue = fakeQueue(NativeJobState.SUCCESS, { topic: 'Optics', content: [] });
    expect(getJobStatus(queue, 'job-1')).toEqual({
      job_id: 'job-1',
      status: JobStatus.COMPLETED,
      result: { topic: 'Optics', content: [] },
    });
  });

  it('returns the diagnostic string of a failed job', () => {
    const queue = fakeQueue(NativeJobState.FAILURE, 'schema: options.B: Required');
    expect(getJobStatus(queue, 'job-1').result).toBe('schema: options.B: Required');
  });

  it('returns a null result while the job is running', () => {
    const queue = fakeQueue(NativeJobState.STARTED, 'stale');
    expect(getJobStatus(queue, 'job-1')).toEqual({ job_id: 'job-1', status: JobStatus.RUNNING, result: null });
    expect(queue.getResult).not.toHaveBeenCalled();
  });

  it('reports unknown with a null result for an id the queue does not hold', () => {
    const queue = fakeQueue(null, null);
    expect(getJobStatus(queue, 'missing')).toEqual({ job_id: 'missing', status: JobStatus.UNKNOWN, result: null });
  });
});
