import type pino from 'pino';
import type { ZodSchema, ZodType, ZodTypeDef } from 'zod';
import { FailureKind, type TaskName } from '@coursewright/shared';
import type { LlmGateway, LlmGatewayFactory } from '../services/llm.gateway.js';
import { fail, failureFromError, type Result, type StepFailure } from '../utils/result.js';

/** Everything one execution of a task may touch. Private to that execution. */
export interface TaskContext {
  jobId: string;
  attempt: number;
  logger: pino.Logger;
  gateway: LlmGateway;
}

export interface TaskConfig<P, R> {
  name: TaskName;
  payloadSchema: ZodType<P, ZodTypeDef, unknown>;
  maxAttempts: number;
  retryDelayMs: number;
  run: (payload: P, ctx: TaskContext) => Promise<Result<R>>;
}

/** A task with its payload type erased, as stored by the queue runtime. */
export interface TaskDefinition {
  readonly name: TaskName;
  readonly payloadSchema: ZodSchema;
  readonly maxAttempts: number;
  readonly retryDelayMs: number;
  execute(payload: unknown, ctx: TaskContext): Promise<Result<unknown>>;
}

export type AttemptOutcome =
  | { type: 'success'; value: unknown }
  | { type: 'retry'; failure: StepFailure }
  | { type: 'fail'; failure: StepFailure };

export interface AttemptParams {
  jobId: string;
  attempt: number;
  logger: pino.Logger;
  createGateway: LlmGatewayFactory;
}

export const defineTask = <P, R>(config: TaskConfig<P, R>): TaskDefinition => ({
  name: config.name,
  payloadSchema: config.payloadSchema,
  maxAttempts: config.maxAttempts,
  retryDelayMs: config.retryDelayMs,
  async execute(payload, ctx) {
    // Payloads normally arrive pre-validated by the HTTP layer; anything that
    // reaches the queue another way is checked here. Retrying cannot fix it.
    const parsed = config.payloadSchema.safeParse(payload);
    if (!parsed.success) {
      return fail({
        kind: FailureKind.CONFIGURATION,
        message: 'Invalid task payload',
        issues: parsed.error.issues.map((i) => `${i.path.join('.') || 'payload'}: ${i.message}`),
      });
    }
    return config.run(parsed.data, ctx);
  },
});

/**
 * Runs one attempt of a task and decides what the queue does next.
 *
 *   success                         → success
 *   configuration failure           → fail (no retry)
 *   transport/parse/schema/internal → retry, or fail once attempt == maxAttempts
 *
 * Never throws: a task that throws, or a gateway factory that throws, is
 * classified the same way as a returned failure.
 */
export const runAttempt = async (
  task: TaskDefinition,
  payload: unknown,
  params: AttemptParams,
): Promise<AttemptOutcome> => {
  const logger = params.logger.child({
    jobId: params.jobId,
    task: task.name,
    attempt: params.attempt,
  });

  let result: Result<unknown>;
  try {
    const gateway = params.createGateway();
    logger.info('Task attempt started');
    result = await task.execute(payload, {
      jobId: params.jobId,
      attempt: params.attempt,
      logger,
      gateway,
    });
  } catch (err) {
    result = fail(failureFromError(err));
  }

  if (result.ok) {
    logger.info('Task attempt succeeded');
    return { type: 'success', value: result.value };
  }

  const { failure } = result;
  if (failure.kind === FailureKind.CONFIGURATION) {
    logger.error({ failure }, 'Task failed with a configuration failure, not retrying');
    return { type: 'fail', failure };
  }
  if (params.attempt >= task.maxAttempts) {
    logger.error({ failure, maxAttempts: task.maxAttempts }, 'Task failed, attempts exhausted');
    return { type: 'fail', failure };
  }
  logger.warn({ failure, retryDelayMs: task.retryDelayMs }, 'Task attempt failed, will retry');
  return { type: 'retry', failure };
};
