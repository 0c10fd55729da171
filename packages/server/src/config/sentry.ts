import * as Sentry from '@sentry/node';

import { env } from './env.js';

// Initialised once at startup, before the Express app is built. Without a
// SENTRY_DSN every SDK call is a no-op, which is the case in dev and tests.
Sentry.init({
  dsn: env.SENTRY_DSN,
  environment: env.NODE_ENV,
  enabled: !!env.SENTRY_DSN,
  initialScope: { tags: { service: 'coursewright-server' } },
});

export { Sentry };
