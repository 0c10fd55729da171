import { z } from 'zod';
import {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_WORKER_CONCURRENCY,
  JOB_RESULT_TTL_MS,
} from '@coursewright/shared';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  CORS_ORIGIN: z.string().min(1).default('*'),
  // Optional at startup: a job that needs the LLM without a key fails as a
  // configuration failure instead of taking the whole service down.
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(8192),
  JOB_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(DEFAULT_MAX_ATTEMPTS),
  JOB_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_DELAY_MS),
  JOB_RESULT_TTL_MS: z.coerce.number().int().positive().default(JOB_RESULT_TTL_MS),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(DEFAULT_WORKER_CONCURRENCY),
  SENTRY_DSN: z.string().optional(),
});

const result = envSchema.safeParse(process.env);

if (!result.success) {
  console.error('Invalid environment variables:');
  console.error(result.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = result.data;

export interface JobSettings {
  readonly maxAttempts: number;
  readonly retryDelayMs: number;
  readonly resultTtlMs: number;
  readonly concurrency: number;
}

export interface LlmSettings {
  readonly apiKey: string | undefined;
  readonly maxTokens: number;
}

export const jobSettings: JobSettings = Object.freeze({
  maxAttempts: env.JOB_MAX_ATTEMPTS,
  retryDelayMs: env.JOB_RETRY_DELAY_MS,
  resultTtlMs: env.JOB_RESULT_TTL_MS,
  concurrency: env.WORKER_CONCURRENCY,
});

export const llmSettings: LlmSettings = Object.freeze({
  apiKey: env.ANTHROPIC_API_KEY,
  maxTokens: env.LLM_MAX_TOKENS,
});
