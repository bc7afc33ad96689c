/**
 * Render API Schemas
 * @module routes/schemas/render
 */

import { Type, type Static } from '@sinclair/typebox';
import { ValuesLayerSchema } from './common.js';

// ============================================================================
// Render
// ============================================================================

export const ChartPayloadSchema = Type.Object({
  /** Chart.yaml content */
  metadata: Type.Record(Type.String(), Type.Unknown()),
  /** values.yaml text */
  values: Type.Optional(Type.String()),
  /** Template sources keyed by path below templates/ */
  templates: Type.Record(Type.String(), Type.String()),
});

export const RenderRequestSchema = Type.Object({
  chart: ChartPayloadSchema,
  layers: Type.Optional(Type.Array(ValuesLayerSchema)),
  set: Type.Optional(Type.Array(Type.String(), { description: '--set style assignments' })),
  release: Type.Optional(Type.Object({
    name: Type.Optional(Type.String({ minLength: 1 })),
    namespace: Type.Optional(Type.String({ minLength: 1 })),
    revision: Type.Optional(Type.Integer({ minimum: 1 })),
  })),
});

export type RenderRequest = Static<typeof RenderRequestSchema>;

export const RenderedDocumentSchema = Type.Object({
  index: Type.Integer(),
  template: Type.Optional(Type.String()),
  apiVersion: Type.Optional(Type.String()),
  kind: Type.Optional(Type.String()),
  name: Type.Optional(Type.String()),
  namespace: Type.Optional(Type.String()),
  content: Type.Unknown(),
});

export const RenderResponseSchema = Type.Object({
  documentCount: Type.Integer(),
  documents: Type.Array(RenderedDocumentSchema),
  manifest: Type.String(),
});

export type RenderResponse = Static<typeof RenderResponseSchema>;

// ============================================================================
// Values merge
// ============================================================================

export const MergeValuesRequestSchema = Type.Object({
  layers: Type.Array(ValuesLayerSchema, { minItems: 1 }),
  set: Type.Optional(Type.Array(Type.String())),
});

export type MergeValuesRequest = Static<typeof MergeValuesRequestSchema>;

export const MergeValuesResponseSchema = Type.Object({
  layers: Type.Array(Type.String()),
  values: Type.Unknown(),
});

export type MergeValuesResponse = Static<typeof MergeValuesResponseSchema>;
