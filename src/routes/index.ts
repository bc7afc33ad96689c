/**
 * Route Registration
 * @module routes
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { AppConfig } from '../config/index.js';
import healthRoutes from './health.js';
import renderRoutes from './render.js';
import valuesRoutes from './values.js';

export interface RoutesOptions {
  config: AppConfig;
}

const routes: FastifyPluginAsync<RoutesOptions> = async (
  fastify: FastifyInstance,
  options: RoutesOptions
): Promise<void> => {
  // Health check at the root
  await fastify.register(healthRoutes, { version: options.config.version });

  await fastify.register(renderRoutes, { prefix: '/api/v1/render', config: options.config });
  await fastify.register(valuesRoutes, { prefix: '/api/v1/values' });
};

export default routes;
