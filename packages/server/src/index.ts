import 'dotenv/config';
import { env } from './config/env.js';
import { createApp, createDefaultDependencies } from './app.js';
import pino from 'pino';

const logger = pino({ name: 'server' });
const deps = createDefaultDependencies();
const app = createApp(deps);

const server = app.listen(env.PORT, () => {
  logger.info(
    { port: env.PORT, env: env.NODE_ENV, llmConfigured: !!env.ANTHROPIC_API_KEY },
    'Server started',
  );
});

const shutdown = () => {
  logger.info({ queue: deps.queue.stats() }, 'Shutting down gracefully...');
  deps.queue.close();
  server.close(() => {
    deps.queue
      .onIdle()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Failed to drain job queue');
        process.exit(1);
      });
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
