import { randomUUID } from 'node:crypto';

import pino from 'pino';
import type { Request, Response, NextFunction } from 'express';

const rootLogger = pino({ name: 'server' });

// Upstream proxies may already have tagged the request; their id is kept when
// it looks like an id and not arbitrary text.
const INCOMING_ID_PATTERN = /^[A-Za-z0-9._-]{8,128}$/;

const resolveRequestId = (req: Request): string => {
  const incoming = req.get('X-Request-Id');
  return incoming && INCOMING_ID_PATTERN.test(incoming) ? incoming : randomUUID();
};

// Attaches a request ID to every incoming request:
//   - req.requestId  used for Sentry context and response header
//   - req.log        child pino logger with requestId bound
//   - X-Request-Id   response header so clients can correlate a job submission
export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const requestId = resolveRequestId(req);
  req.requestId = requestId;
  req.log = rootLogger.child({ requestId });
  res.setHeader('X-Request-Id', requestId);
  next();
};
