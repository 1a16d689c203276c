import { createApp, createDefaultDependencies } from './app.js';
import { env } from './config/env.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('SERVER');

const deps = createDefaultDependencies();
const app = createApp(deps);

const server = app.listen(Number(env.PORT), () => {
  console.log(`🚀 Server running in ${env.NODE_ENV} mode on port ${env.PORT}`);
});

const shutdown = (signal: string) => {
  logger.info('shutdown', 'START', signal);
  server.close(() => {
    deps.pools
      .closeAll()
      .then(() => {
        logger.info('shutdown', 'SUCCESS');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('shutdown', error);
        process.exit(1);
      });
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
