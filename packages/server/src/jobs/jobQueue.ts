import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import pino from 'pino';
import { FailureKind, NativeJobState, type QueueStats, type TaskName } from '@coursewright/shared';

import { Sentry } from '../config/sentry.js';
import type { LlmGatewayFactory } from '../services/llm.gateway.js';
import { ServiceUnavailableError } from '../utils/errors.js';
import { describeFailure, failureFromError, type StepFailure } from '../utils/result.js';
import { runAttempt, type AttemptOutcome, type TaskDefinition } from './taskEnvelope.js';

export interface JobRecord {
  readonly id: string;
  readonly task: TaskName;
  readonly payload: unknown;
  readonly state: NativeJobState;
  readonly attempts: number;
  /** Task result on SUCCESS, diagnostic string on FAILURE, null before either. */
  readonly result: unknown;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly finishedAt: number | null;
}

/**
 * The queue runtime as seen by the HTTP layer: submit work, read its native
 * state and its stored result. `getStatus` returns null for ids it does not
 * hold (never seen, or expired).
 */
export interface JobQueue {
  enqueue(task: TaskDefinition, payload: unknown): string;
  getStatus(jobId: string): NativeJobState | null;
  getResult(jobId: string): unknown;
  runInline(task: TaskDefinition, payload: unknown): Promise<JobRecord>;
  stats(): QueueStats;
}

export interface InMemoryJobQueueOptions {
  createGateway: LlmGatewayFactory;
  concurrency: number;
  resultTtlMs: number;
  logger?: pino.Logger;
  now?: () => number;
}

interface MutableJob {
  id: string;
  definition: TaskDefinition;
  payload: unknown;
  state: NativeJobState;
  attempts: number;
  result: unknown;
  createdAt: number;
  updatedAt: number;
  finishedAt: number | null;
}

const TERMINAL_STATES: ReadonlySet<NativeJobState> = new Set([
  NativeJobState.SUCCESS,
  NativeJobState.FAILURE,
]);

const CLOSED_FAILURE: StepFailure = { kind: FailureKind.INTERNAL, message: 'Job queue closed before the job finished' };

// Stored results are handed out as copies so callers cannot change them.
const toRecord = (job: MutableJob): JobRecord => ({
  id: job.id,
  task: job.definition.name,
  payload: job.payload,
  state: job.state,
  attempts: job.attempts,
  result: structuredClone(job.result),
  createdAt: job.createdAt,
  updatedAt: job.updatedAt,
  finishedAt: job.finishedAt,
});

/**
 * In-process queue runtime with a bounded worker pool.
 *
 * Jobs run FIFO, at most `concurrency` at a time. A retry outcome puts the
 * job in RETRY and requeues the same payload after the task's delay, so every
 * attempt starts from scratch. The result is written exactly once, when the
 * job reaches SUCCESS or FAILURE, and terminal jobs are dropped `resultTtlMs`
 * after they finish.
 */
export class InMemoryJobQueue implements JobQueue {
  private readonly jobs = new Map<string, MutableJob>();
  private readonly pending: string[] = [];
  private readonly retryTimers = new Map<string, NodeJS.Timeout>();
  private readonly idleWaiters: Array<() => void> = [];
  private readonly logger: pino.Logger;
  private readonly now: () => number;
  private active = 0;
  private closed = false;

  constructor(private readonly options: InMemoryJobQueueOptions) {
    this.logger = options.logger ?? pino({ name: 'job-queue' });
    this.now = options.now ?? Date.now;
  }

  enqueue(task: TaskDefinition, payload: unknown): string {
    if (this.closed) throw new ServiceUnavailableError('Job queue is closed');
    this.sweepExpired();

    const job = this.createJob(task, payload);
    this.jobs.set(job.id, job);
    this.pending.push(job.id);
    this.logger.info({ jobId: job.id, task: task.name }, 'Job queued');
    this.pump();
    return job.id;
  }

  getStatus(jobId: string): NativeJobState | null {
    return this.lookup(jobId)?.state ?? null;
  }

  getResult(jobId: string): unknown {
    const job = this.lookup(jobId);
    if (!job || !TERMINAL_STATES.has(job.state)) return null;
    return structuredClone(job.result);
  }

  getJob(jobId: string): JobRecord | null {
    const job = this.lookup(jobId);
    return job ? toRecord(job) : null;
  }

  /**
   * Executes a task in the caller's own async context, retrying in place with
   * the same policy as queued jobs. The job is not stored and cannot be polled.
   */
  async runInline(task: TaskDefinition, payload: unknown): Promise<JobRecord> {
    const job = this.createJob(task, payload);
    this.logger.info({ jobId: job.id, task: task.name }, 'Running job inline');

    for (;;) {
      const outcome = await this.attempt(job);
      if (outcome.type !== 'retry') {
        this.finish(job, outcome);
        return toRecord(job);
      }
      this.markRetry(job);
      if (task.retryDelayMs > 0) await sleep(task.retryDelayMs);
    }
  }

  stats(): QueueStats {
    return {
      pending: this.pending.length,
      active: this.active,
      retrying: this.retryTimers.size,
      stored: this.jobs.size,
    };
  }

  /** Resolves once nothing is pending, running, or waiting to be retried. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stops accepting jobs. Attempts already running finish; jobs still waiting
   * to run or to be retried are failed, and so is a running job whose attempt
   * asks for a retry after this point.
   */
  close(): void {
    this.closed = true;
    for (const [jobId, timer] of this.retryTimers) {
      clearTimeout(timer);
      this.abandon(this.jobs.get(jobId));
    }
    this.retryTimers.clear();
    for (const jobId of this.pending.splice(0)) this.abandon(this.jobs.get(jobId));
    this.notifyIdle();
  }

  private createJob(task: TaskDefinition, payload: unknown): MutableJob {
    const now = this.now();
    return {
      id: randomUUID(),
      definition: task,
      payload,
      state: NativeJobState.PENDING,
      attempts: 0,
      result: null,
      createdAt: now,
      updatedAt: now,
      finishedAt: null,
    };
  }

  private pump(): void {
    while (!this.closed && this.active < this.options.concurrency && this.pending.length > 0) {
      const jobId = this.pending.shift();
      const job = jobId === undefined ? undefined : this.jobs.get(jobId);
      if (!job) continue;

      this.active++;
      void this.process(job).finally(() => {
        this.active--;
        this.pump();
        this.notifyIdle();
      });
    }
  }

  private async process(job: MutableJob): Promise<void> {
    let outcome: AttemptOutcome;
    try {
      outcome = await this.attempt(job);
    } catch (err) {
      // runAttempt classifies task errors itself; this only guards the worker loop.
      outcome = { type: 'fail', failure: failureFromError(err) };
    }
    if (outcome.type !== 'retry') {
      this.finish(job, outcome);
      return;
    }

    if (this.closed) {
      this.abandon(job);
      return;
    }

    this.markRetry(job);
    const delay = job.definition.retryDelayMs;
    if (delay === 0) {
      this.pending.push(job.id);
      return;
    }
    const timer = setTimeout(() => {
      this.retryTimers.delete(job.id);
      this.pending.push(job.id);
      this.pump();
    }, delay);
    // Pending retries must not keep the process alive on shutdown.
    timer.unref();
    this.retryTimers.set(job.id, timer);
  }

  private attempt(job: MutableJob): Promise<AttemptOutcome> {
    job.attempts += 1;
    job.state = NativeJobState.STARTED;
    job.updatedAt = this.now();
    return runAttempt(job.definition, job.payload, {
      jobId: job.id,
      attempt: job.attempts,
      logger: this.logger,
      createGateway: this.options.createGateway,
    });
  }

  private markRetry(job: MutableJob): void {
    job.state = NativeJobState.RETRY;
    job.updatedAt = this.now();
  }

  private finish(job: MutableJob, outcome: Exclude<AttemptOutcome, { type: 'retry' }>): void {
    if (TERMINAL_STATES.has(job.state)) return;

    const now = this.now();
    job.updatedAt = now;
    job.finishedAt = now;

    if (outcome.type === 'success') {
      job.state = NativeJobState.SUCCESS;
      job.result = outcome.value;
      this.logger.info(
        { jobId: job.id, task: job.definition.name, attempts: job.attempts },
        'Job completed',
      );
      return;
    }

    job.state = NativeJobState.FAILURE;
    job.result = describeFailure(outcome.failure);
    this.logger.error(
      { jobId: job.id, task: job.definition.name, attempts: job.attempts, failure: outcome.failure },
      'Job failed',
    );
    Sentry.captureMessage(`Job ${job.definition.name} failed`, {
      level: 'error',
      extra: { jobId: job.id, attempts: job.attempts, failure: outcome.failure },
    });
  }

  private abandon(job: MutableJob | undefined): void {
    if (!job || TERMINAL_STATES.has(job.state)) return;
    const now = this.now();
    job.state = NativeJobState.FAILURE;
    job.result = describeFailure(CLOSED_FAILURE);
    job.updatedAt = now;
    job.finishedAt = now;
    this.logger.warn({ jobId: job.id, task: job.definition.name }, 'Job abandoned on queue close');
  }

  private lookup(jobId: string): MutableJob | undefined {
    const job = this.jobs.get(jobId);
    if (job && this.isExpired(job)) {
      this.jobs.delete(jobId);
      return undefined;
    }
    return job;
  }

  private isExpired(job: MutableJob): boolean {
    return job.finishedAt !== null && this.now() - job.finishedAt >= this.options.resultTtlMs;
  }

  private sweepExpired(): void {
    for (const [id, job] of this.jobs) {
      if (this.isExpired(job)) this.jobs.delete(id);
    }
  }

  private isIdle(): boolean {
    return this.active === 0 && this.pending.length === 0 && this.retryTimers.size === 0;
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters.splice(0);
    for (const resolve of waiters) resolve();
  }
}
