import { z } from 'zod';
import { JobStatus, NativeJobState } from '../enums/index.js';

// Job ids are opaque to callers. Any non-empty id is accepted so that an id
// the queue has never seen (or has already expired) reads as "unknown"
// instead of failing validation.
export const jobParamsSchema = z.object({
  jobId: z.string().trim().min(1).max(200),
});

export const jobStatusResponseSchema = z.object({
  job_id: z.string(),
  status: z.nativeEnum(JobStatus),
  result: z.unknown().nullable(),
});

export const syncTaskResponseSchema = z.object({
  status: z.literal(JobStatus.COMPLETED),
  result: z.unknown(),
});

export const asyncTaskResponseSchema = z.object({
  status: z.literal(JobStatus.QUEUED),
  job_id: z.string(),
});

export const queueStatsSchema = z.object({
  pending: z.number().int(),
  active: z.number().int(),
  retrying: z.number().int(),
  stored: z.number().int(),
});

export const healthResponseSchema = z.object({
  status: z.literal('ok'),
  uptime: z.number(),
  queue: queueStatsSchema,
});

export const nativeJobStateSchema = z.nativeEnum(NativeJobState);
