/**
 * Render Routes
 * @module routes/render
 *
 * POST /api/v1/render renders an inline chart for one release.
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { createChart, renderChart } from '../chart/index.js';
import type { AppConfig } from '../config/index.js';
import type { RenderedDocument } from '../manifest/index.js';
import { ErrorResponseSchema } from './schemas/common.js';
import {
  RenderRequestSchema,
  RenderResponseSchema,
  type RenderRequest,
  type RenderResponse,
} from './schemas/render.js';
import { toValuesLayers } from './layers.js';

export interface RenderRouteOptions {
  config: AppConfig;
}

function toResponseDocument(doc: RenderedDocument): RenderResponse['documents'][number] {
  return {
    index: doc.index,
    template: doc.template,
    apiVersion: doc.apiVersion,
    kind: doc.kind,
    name: doc.name,
    namespace: doc.namespace,
    content: doc.content,
  };
}

const renderRoutes: FastifyPluginAsync<RenderRouteOptions> = async (
  fastify: FastifyInstance,
  options: RenderRouteOptions
): Promise<void> => {
  const { config } = options;

  /**
   * Render a chart
   * POST /api/v1/render
   */
  fastify.post<{ Body: RenderRequest; Reply: RenderResponse }>(
    '/',
    {
      schema: {
        tags: ['Render'],
        body: RenderRequestSchema,
        response: {
          200: RenderResponseSchema,
          400: ErrorResponseSchema,
          422: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { chart: payload, layers = [], set = [], release } = request.body;

      const chart = createChart({
        metadata: payload.metadata,
        values: payload.values ?? '',
        templates: payload.templates,
      });

      const result = renderChart(chart, {
        layers: toValuesLayers(layers, set),
        release,
        maxIncludeDepth: config.render.maxIncludeDepth,
        requireKind: config.manifest.requireKind,
      });

      return reply.status(200).send({
        documentCount: result.documents.length,
        documents: result.documents.map(toResponseDocument),
        manifest: result.manifest,
      });
    }
  );
};

export default renderRoutes;
