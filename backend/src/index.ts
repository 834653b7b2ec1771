import { createApp } from './app';
import { loadConfig } from './config/env';
import { openStores } from './config/stores';
import { configureLogger, logger, serializeError } from './utils/logger';

async function startServer() {
  const config = loadConfig();
  configureLogger({ nodeEnv: config.NODE_ENV, level: config.LOG_LEVEL });

  const stores = await openStores(config);
  const app = createApp({ config, cards: stores.cards, sessions: stores.sessions });

  const server = app.listen(config.PORT, config.HOST, () => {
    logger.info('Server started', { host: config.HOST, port: config.PORT, nodeEnv: config.NODE_ENV });
    logger.info('Health endpoint ready', { url: `http://${config.HOST}:${config.PORT}/health` });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });
    server.close((closeError) => {
      if (closeError) {
        logger.error('HTTP server close failed', { error: serializeError(closeError) });
      }
      stores
        .close()
        .then(() => process.exit(closeError ? 1 : 0))
        .catch((error: unknown) => {
          logger.error('Failed to close stores', { error: serializeError(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error) => {
  logger.error('Failed to start server', { error: serializeError(error) });
  process.exit(1);
});
