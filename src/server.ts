/**
 * Server Entry Point
 * @module server
 */

import { buildApp } from './app.js';
import { loadConfig } from './config/index.js';
import { createLogger, getLogger, setLogger } from './logging/index.js';

async function start(): Promise<void> {
  const config = await loadConfig();

  setLogger(createLogger('chart-renderer', {
    level: config.logging.level,
    pretty: config.logging.pretty,
    environment: config.env,
    version: config.version,
  }));
  const logger = getLogger();

  const app = await buildApp({
    config,
    logger: { level: config.logging.level },
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  await app.listen({ host: config.server.host, port: config.server.port });
  logger.info(
    { host: config.server.host, port: config.server.port, env: config.env },
    'Chart render service listening'
  );
}

start().catch((error: unknown) => {
  getLogger().fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
