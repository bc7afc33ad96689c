/**
 * Values Routes
 * @module routes/values
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { ValuesStore, toPlain } from '../values/index.js';
import { ErrorResponseSchema } from './schemas/common.js';
import {
  MergeValuesRequestSchema,
  MergeValuesResponseSchema,
  type MergeValuesRequest,
  type MergeValuesResponse,
} from './schemas/render.js';
import { toValuesLayers } from './layers.js';

const valuesRoutes: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  /**
   * Merge value layers, lowest precedence first
   * POST /api/v1/values/merge
   */
  fastify.post<{ Body: MergeValuesRequest; Reply: MergeValuesResponse }>(
    '/merge',
    {
      schema: {
        tags: ['Values'],
        body: MergeValuesRequestSchema,
        response: {
          200: MergeValuesResponseSchema,
          400: ErrorResponseSchema,
          422: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const store = ValuesStore.fromLayers(toValuesLayers(request.body.layers, request.body.set));

      return reply.status(200).send({
        layers: store.layerNames(),
        values: toPlain(store.resolve()),
      });
    }
  );
};

export default valuesRoutes;
