/**
 * Health Check Routes
 * @module routes/health
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { HealthCheckSchema, type HealthCheck } from './schemas/common.js';

export interface HealthRouteOptions {
  version: string;
}

/**
 * Application start time for uptime calculation
 */
const startTime = Date.now();

function getUptime(): number {
  return Math.floor((Date.now() - startTime) / 1000);
}

const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (
  fastify: FastifyInstance,
  options: HealthRouteOptions
): Promise<void> => {
  /**
   * Liveness check
   * GET /health
   */
  fastify.get<{ Reply: HealthCheck }>(
    '/health',
    {
      schema: {
        tags: ['Health'],
        response: {
          200: HealthCheckSchema,
        },
      },
    },
    async (_request, reply) => {
      const health: HealthCheck = {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: options.version,
        uptime: getUptime(),
      };

      return reply.status(200).send(health);
    }
  );
};

export default healthRoutes;
