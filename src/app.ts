/**
 * Fastify Application Factory
 * @module app
 */

import Fastify, { type FastifyInstance } from 'fastify';
import { AppConfigSchema, type AppConfig } from './config/index.js';
import { getModuleLogger } from './logging/index.js';
import errorHandler from './middleware/error-handler.js';
import routes from './routes/index.js';

/**
 * Application configuration options
 */
export interface AppOptions {
  /**
   * Fastify request logger; `false` disables it
   * @default pino at the configured level
   */
  logger?: boolean | { level: string };

  /**
   * Loaded configuration
   * @default schema defaults
   */
  config?: AppConfig;
}

/**
 * Create and configure Fastify application instance
 */
export async function buildApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  const config = opts.config ?? AppConfigSchema.parse({});
  const logger = getModuleLogger('app-factory');

  const app = Fastify({
    logger: opts.logger ?? { level: config.logging.level },
    bodyLimit: config.server.bodyLimit,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
  });

  // Register error handler (must be before routes)
  await app.register(errorHandler, {
    includeStackTraces: config.env !== 'production',
    production: config.env === 'production',
  });
  logger.debug('Error handler registered');

  await app.register(routes, { config });
  logger.debug('Routes registered');

  app.addHook('onClose', async () => {
    logger.info('Application closing...');
  });

  return app;
}

/**
 * Create application for testing (disabled logging)
 */
export async function buildTestApp(config?: AppConfig): Promise<FastifyInstance> {
  return buildApp({ logger: false, config });
}

export default buildApp;
