import { env } from './config/env';
import { createApp } from './app';
import { createDataStore } from './store';
import { initDefaultAdmin } from './scripts/initDefaultAdmin';
import { logger } from './observability/logger';

async function start() {
  const store = await createDataStore(env);
  await initDefaultAdmin(store.users, env.defaultAdmin);

  const app = createApp(store);
  const server = app.listen(env.port, () => {
    logger.info({ port: env.port, dataStore: env.dataStore }, 'Server running');
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      store
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Error closing data store');
          process.exit(1);
        });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
