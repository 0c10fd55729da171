import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  FailureKind,
  NativeJobState,
  TaskName,
  askLlmRequestSchema,
} from '@coursewright/shared';

import { InMemoryJobQueue } from '../jobQueue.js';
import { createTaskRegistry } from '../tasks.js';
import { defineTask } from '../taskEnvelope.js';
import { createLlmGateway, type LlmGateway } from '../../services/llm.gateway.js';
import { ServiceUnavailableError } from '../../utils/errors.js';
import { fail, ok, type Result } from '../../utils/result.js';
import {
  constantGateway,
  sequenceGateway,
  silentLogger,
  transportError,
} from '../../__tests__/helpers/llm.helper.js';

const tasks = createTaskRegistry({ maxAttempts: 3, retryDelayMs: 0 });
const TTL_MS = 60 * 60 * 1000;

const queues: InMemoryJobQueue[] = [];

const createQueue = (gateway: LlmGateway, overrides: { concurrency?: number; now?: () => number } = {}) => {
  const createGateway = vi.fn(() => gateway);
  const queue = new InMemoryJobQueue({
    createGateway,
    concurrency: overrides.concurrency ?? 2,
    resultTtlMs: TTL_MS,
    logger: silentLogger,
    now: overrides.now,
  });
  queues.push(queue);
  return { queue, createGateway };
};

// Fails `failures` times with a transport failure, then succeeds.
const flakyTask = (failures: number, retryDelayMs = 0) => {
  let calls = 0;
  return defineTask({
    name: TaskName.ASK_LLM,
    payloadSchema: askLlmRequestSchema,
    maxAttempts: 3,
    retryDelayMs,
    run: async () => {
      calls += 1;
      return calls <= failures
        ? fail({ kind: FailureKind.TRANSPORT, message: 'flaky upstream' })
        : ok('recovered');
    },
  });
};

// Every attempt blocks until release() is called, then resolves `outcome`.
const gatedTask = (outcome: Result<unknown>, retryDelayMs = 0) => {
  let release = (): void => undefined;
  const opened = new Promise<void>((resolve) => {
    release = resolve;
  });
  const task = defineTask({
    name: TaskName.ASK_LLM,
    payloadSchema: askLlmRequestSchema,
    maxAttempts: 3,
    retryDelayMs,
    run: async () => {
      await opened;
      return outcome;
    },
  });
  return { task, release: () => release() };
};

afterEach(() => {
  for (const queue of queues.splice(0)) queue.close();
});

describe('InMemoryJobQueue', () => {
  it('runs jobs FIFO within the concurrency limit', async () => {
    const { queue } = createQueue(constantGateway('answer'), { concurrency: 1 });

    const first = queue.enqueue(tasks[TaskName.ASK_LLM], { prompt: 'one' });
    const second = queue.enqueue(tasks[TaskName.ASK_LLM], { prompt: 'two' });

    expect(queue.getStatus(first)).toBe(NativeJobState.STARTED);
    expect(queue.getStatus(second)).toBe(NativeJobState.PENDING);
    expect(queue.stats()).toEqual({ pending: 1, active: 1, retrying: 0, stored: 2 });

    await queue.onIdle();

    expect(queue.getStatus(first)).toBe(NativeJobState.SUCCESS);
    expect(queue.getStatus(second)).toBe(NativeJobState.SUCCESS);
    expect(queue.getResult(second)).toBe('answer');
  });

  it('returns null status and result for an id it never issued', () => {
    const { queue } = createQueue(constantGateway('answer'));
    expect(queue.getStatus('no-such-job')).toBeNull();
    expect(queue.getResult('no-such-job')).toBeNull();
  });

  it('withholds the result until the job is terminal', async () => {
    const { queue } = createQueue(constantGateway('answer'));
    const jobId = queue.enqueue(tasks[TaskName.ASK_LLM], { prompt: 'Hi' });

    expect(queue.getResult(jobId)).toBeNull();
    await queue.onIdle();
    expect(queue.getResult(jobId)).toBe('answer');
  });

  it('fails question generation after exactly 3 attempts when the model never returns JSON', async () => {
    const gateway = constantGateway('I am not JSON');
    const { queue, createGateway } = createQueue(gateway);

    const jobId = queue.enqueue(tasks[TaskName.GENERATE_QUESTION], { query: 'Projectile motion' });
    await queue.onIdle();

    const job = queue.getJob(jobId);
    expect(job?.state).toBe(NativeJobState.FAILURE);
    expect(job?.attempts).toBe(3);
    expect(gateway.requests).toHaveLength(3);
    expect(createGateway).toHaveBeenCalledTimes(3);
    expect(queue.getResult(jobId)).toMatch(/^parse: /);
  });

  it('succeeds on a later attempt after a transient failure', async () => {
    const gateway = sequenceGateway([transportError(), 'second time lucky']);
    const { queue } = createQueue(gateway);

    const jobId = queue.enqueue(tasks[TaskName.ASK_LLM], { prompt: 'Hi' });
    await queue.onIdle();

    expect(queue.getJob(jobId)).toMatchObject({
      state: NativeJobState.SUCCESS,
      attempts: 2,
      result: 'second time lucky',
    });
  });

  it('waits the retry delay before requeueing', async () => {
    const { queue } = createQueue(constantGateway('unused'));

    const jobId = queue.enqueue(flakyTask(1, 200), { prompt: 'Hi' });
    await vi.waitFor(() => expect(queue.getStatus(jobId)).toBe(NativeJobState.RETRY), { interval: 5 });
    expect(queue.stats().retrying).toBe(1);

    await queue.onIdle();

    expect(queue.getJob(jobId)).toMatchObject({ state: NativeJobState.SUCCESS, attempts: 2 });
  });

  it('fails on the first attempt when no API key is configured', async () => {
    const queue = new InMemoryJobQueue({
      createGateway: () => createLlmGateway({ apiKey: undefined, maxTokens: 1024 }),
      concurrency: 1,
      resultTtlMs: TTL_MS,
      logger: silentLogger,
    });
    queues.push(queue);

    const jobId = queue.enqueue(tasks[TaskName.CREATE_LEARNING_PATH], { topic: 'Optics' });
    await queue.onIdle();

    expect(queue.getJob(jobId)).toMatchObject({
      state: NativeJobState.FAILURE,
      attempts: 1,
      result: 'configuration: ANTHROPIC_API_KEY is not configured',
    });
  });

  it('fails an invalid payload without retrying', async () => {
    const { queue } = createQueue(constantGateway('unused'));

    const jobId = queue.enqueue(tasks[TaskName.ASK_LLM], {});
    await queue.onIdle();

    expect(queue.getJob(jobId)).toMatchObject({
      state: NativeJobState.FAILURE,
      attempts: 1,
      result: 'configuration: prompt: Required',
    });
  });

  it('drops terminal records once the retention window has passed', async () => {
    let clock = 1_000;
    const { queue } = createQueue(constantGateway('answer'), { now: () => clock });

    const jobId = queue.enqueue(tasks[TaskName.ASK_LLM], { prompt: 'Hi' });
    await queue.onIdle();

    clock += TTL_MS - 1;
    expect(queue.getStatus(jobId)).toBe(NativeJobState.SUCCESS);

    clock += 1;
    expect(queue.getStatus(jobId)).toBeNull();
    expect(queue.getResult(jobId)).toBeNull();
  });

  it('stops accepting jobs and fails jobs waiting on a retry on close', async () => {
    const { queue } = createQueue(constantGateway('unused'));

    const jobId = queue.enqueue(flakyTask(3, 60_000), { prompt: 'Hi' });
    await vi.waitFor(() => expect(queue.getStatus(jobId)).toBe(NativeJobState.RETRY), { interval: 5 });

    queue.close();

    expect(queue.stats().retrying).toBe(0);
    expect(queue.getJob(jobId)).toMatchObject({
      state: NativeJobState.FAILURE,
      result: 'internal: Job queue closed before the job finished',
    });
    expect(() => queue.enqueue(tasks[TaskName.ASK_LLM], { prompt: 'Hi' })).toThrow(ServiceUnavailableError);
    await expect(queue.onIdle()).resolves.toBeUndefined();
  });

  it('fails jobs still waiting to run on close', async () => {
    const gate = gatedTask(ok('done'));
    const { queue } = createQueue(constantGateway('unused'), { concurrency: 1 });

    const running = queue.enqueue(gate.task, { prompt: 'first' });
    const waiting = queue.enqueue(gate.task, { prompt: 'second' });
    queue.close();

    expect(queue.getStatus(waiting)).toBe(NativeJobState.FAILURE);
    expect(queue.stats().pending).toBe(0);

    gate.release();
    await queue.onIdle();
    expect(queue.getJob(running)).toMatchObject({ state: NativeJobState.SUCCESS, result: 'done' });
  });

  it('does not schedule a retry for an attempt that fails after close', async () => {
    const gate = gatedTask(fail({ kind: FailureKind.TRANSPORT, message: 'upstream reset' }), 50);
    const { queue } = createQueue(constantGateway('unused'));

    const jobId = queue.enqueue(gate.task, { prompt: 'Hi' });
    await vi.waitFor(() => expect(queue.getStatus(jobId)).toBe(NativeJobState.STARTED), { interval: 5 });

    queue.close();
    gate.release();
    await queue.onIdle();

    expect(queue.stats()).toEqual({ pending: 0, active: 0, retrying: 0, stored: 1 });
    expect(queue.getJob(jobId)).toMatchObject({
      state: NativeJobState.FAILURE,
      attempts: 1,
      result: 'internal: Job queue closed before the job finished',
    });
  });

  it('hands out copies of stored results', async () => {
    const { queue } = createQueue(constantGateway('unused'));
    const task = defineTask({
      name: TaskName.ASK_LLM,
      payloadSchema: askLlmRequestSchema,
      maxAttempts: 1,
      retryDelayMs: 0,
      run: async () => ok({ tags: ['optics'] }),
    });

    const jobId = queue.enqueue(task, { prompt: 'Hi' });
    await queue.onIdle();

    const result = queue.getResult(jobId);
    expect(result).toEqual({ tags: ['optics'] });
    if (typeof result === 'object' && result !== null && 'tags' in result && Array.isArray(result.tags)) {
      result.tags.push('mutated');
    }
    expect(queue.getResult(jobId)).toEqual({ tags: ['optics'] });
    expect(queue.getJob(jobId)?.result).toEqual({ tags: ['optics'] });
  });

  describe('runInline', () => {
    it('runs the task to completion without storing the job', async () => {
      const gateway = sequenceGateway([transportError(), 'inline answer']);
      const { queue } = createQueue(gateway);

      const job = await queue.runInline(tasks[TaskName.ASK_LLM], { prompt: 'Hi' });

      expect(job).toMatchObject({ state: NativeJobState.SUCCESS, attempts: 2, result: 'inline answer' });
      expect(queue.getStatus(job.id)).toBeNull();
    });

    it('returns the failed record when attempts are exhausted', async () => {
      const { queue } = createQueue(constantGateway(transportError('connect ECONNREFUSED')));

      const job = await queue.runInline(tasks[TaskName.ASK_LLM], { prompt: 'Hi' });

      expect(job).toMatchObject({
        state: NativeJobState.FAILURE,
        attempts: 3,
        result: 'transport: connect ECONNREFUSED',
      });
    });
  });
});
