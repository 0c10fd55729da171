import { RATE_LIMIT_TASK_SUBMISSIONS_PER_MINUTE } from '@coursewright/shared';

import rateLimit from 'express-rate-limit';

import { RateLimitError } from '../utils/errors.js';

export const createRateLimiter = (
  windowMs: number,
  max: number,
  message = 'Too many requests, please try again later',
) => {
  return rateLimit({
    windowMs,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    // Rendered by errorHandler like every other client error.
    handler: (_req, _res, next) => {
      next(new RateLimitError(message));
    },
  });
};

export const globalRateLimiter = createRateLimiter(60 * 1000, 100);

// Applies to both /sync and /async submissions. Every submission ends in one or
// more LLM calls, so it is limited well below the global budget.
export const taskSubmissionLimiter = createRateLimiter(
  60 * 1000,
  RATE_LIMIT_TASK_SUBMISSIONS_PER_MINUTE,
  `Task submission limit reached. You can submit up to ${RATE_LIMIT_TASK_SUBMISSIONS_PER_MINUTE} tasks per minute.`,
);
