// Sentry must be initialised before any other imports so it can instrument
// the Express request lifecycle from the start.
import './config/sentry.js';

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { pinoHttp } from 'pino-http';
import pino from 'pino';

import { env, jobSettings, llmSettings } from './config/env.js';
import { InMemoryJobQueue } from './jobs/jobQueue.js';
import { createTaskRegistry } from './jobs/tasks.js';
import { createLlmGateway } from './services/llm.gateway.js';
import { createApiRouter, createRootRouter, type ApiDependencies } from './routes/index.js';
import { globalRateLimiter } from './middleware/rateLimiter.middleware.js';
import { requestIdMiddleware } from './middleware/requestId.middleware.js';
import { errorHandler } from './middleware/error.middleware.js';
import { NotFoundError } from './utils/errors.js';

export interface AppDependencies extends ApiDependencies {
  queue: InMemoryJobQueue;
}

/** Queue and task registry wired from the process environment. */
export const createDefaultDependencies = (): AppDependencies => ({
  // Each attempt gets its own gateway built from an immutable settings snapshot.
  queue: new InMemoryJobQueue({
    createGateway: () => createLlmGateway(llmSettings),
    concurrency: jobSettings.concurrency,
    resultTtlMs: jobSettings.resultTtlMs,
  }),
  tasks: createTaskRegistry(jobSettings),
});

export const createApp = (deps: ApiDependencies = createDefaultDependencies()) => {
  const app = express();
  const logger = pino({ name: 'server' });

  // requestIdMiddleware must be first so req.requestId is set before anything
  // can throw (e.g. express.json() on a malformed body).
  app.use(requestIdMiddleware);
  app.use(helmet());
  app.use(cors({ origin: env.CORS_ORIGIN }));
  // Sketch prompts carry a full question and explanation.
  app.use(express.json({ limit: '256kb' }));
  // genReqId reads the requestId already attached by requestIdMiddleware so that
  // pino-http's req.log child logger carries it.
  app.use(pinoHttp<Request, Response>({ logger, genReqId: (req) => req.requestId }));
  app.use(globalRateLimiter);

  app.use('/api', createApiRouter(deps));
  app.use(createRootRouter(deps));

  app.use((_req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError('Route not found'));
  });

  // errorHandler calls Sentry.captureException only for 5xx.
  app.use(errorHandler);

  return app;
};
