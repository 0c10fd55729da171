import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ErrorCode, type ApiErrorResponse } from '@coursewright/shared';
import pino from 'pino';

import { Sentry } from '../config/sentry.js';
import { AppError, TaskFailedError } from '../utils/errors.js';

const logger = pino({ name: 'error-handler' });

// express.json() rejects unparseable bodies with an http-errors instance
// tagged with this type.
const isMalformedJsonBody = (err: Error): boolean =>
  'type' in err && err.type === 'entity.parse.failed';

const sendError = (res: Response, status: number, error: ApiErrorResponse['error']): void => {
  const body: ApiErrorResponse = { error };
  res.status(status).json(body);
};

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction,
) => {
  // A sync task that failed terminally. The job envelope already logged and
  // reported it, so it is only rendered here.
  if (err instanceof TaskFailedError) {
    req.log.warn({ details: err.details }, 'Synchronous task failed');
    sendError(res, err.statusCode, { code: err.code, message: err.message, details: err.details });
    return;
  }

  // Expected conditions with their own status. Do not report to Sentry.
  if (err instanceof AppError) {
    sendError(res, err.statusCode, { code: err.code, message: err.message, details: err.details });
    return;
  }

  // 400: validation errors. Do not report to Sentry.
  if (err instanceof ZodError) {
    sendError(res, 400, {
      code: ErrorCode.VALIDATION_ERROR,
      message: 'Validation failed',
      details: err.errors.map((e) => ({
        field: e.path.join('.'),
        message: e.message,
      })),
    });
    return;
  }

  if (isMalformedJsonBody(err)) {
    sendError(res, 400, { code: ErrorCode.BAD_REQUEST, message: 'Request body is not valid JSON' });
    return;
  }

  // 5xx: unexpected error. Log and report to Sentry with request context.
  const requestId = req.requestId;

  logger.error({ err, requestId }, 'Unhandled error');

  Sentry.captureException(err, {
    extra: {
      requestId,
      method: req.method,
      path: req.path,
    },
  });

  sendError(res, 500, { code: ErrorCode.INTERNAL_ERROR, message: 'An unexpected error occurred' });
};
