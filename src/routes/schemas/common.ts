/**
 * Common API Schemas
 * @module routes/schemas/common
 *
 * Shared TypeBox schemas for API request/response validation.
 */

import { Type, type Static } from '@sinclair/typebox';

// ============================================================================
// Error Schemas
// ============================================================================

/**
 * API Error response schema
 */
export const ErrorResponseSchema = Type.Object({
  statusCode: Type.Number({ description: 'HTTP status code' }),
  error: Type.String({ description: 'Error type' }),
  message: Type.String({ description: 'Human-readable error message' }),
  code: Type.Optional(Type.String({ description: 'Error code for programmatic handling' })),
  details: Type.Optional(Type.Unknown({ description: 'Additional error details' })),
  requestId: Type.Optional(Type.String()),
  timestamp: Type.Optional(Type.String()),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

// ============================================================================
// Health Schemas
// ============================================================================

export const HealthCheckSchema = Type.Object({
  status: Type.Literal('healthy'),
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.String(),
  uptime: Type.Number({ description: 'Seconds since start' }),
});

export type HealthCheck = Static<typeof HealthCheckSchema>;

// ============================================================================
// Values Schemas
// ============================================================================

/**
 * One override layer: either structured values or YAML text
 */
export const ValuesLayerSchema = Type.Union([
  Type.Object({
    name: Type.String({ minLength: 1 }),
    values: Type.Record(Type.String(), Type.Unknown()),
  }),
  Type.Object({
    name: Type.String({ minLength: 1 }),
    yaml: Type.String(),
  }),
]);

export type ValuesLayerInput = Static<typeof ValuesLayerSchema>;
