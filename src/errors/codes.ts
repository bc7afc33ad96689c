/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the chart render engine.
 * Provides typed error codes for consistent error handling across the pipeline.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * HTTP/API Error Codes
 */
export const HttpErrorCodes = {
  // 400 Bad Request
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // 404 Not Found
  NOT_FOUND: 'NOT_FOUND',
  ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',

  // 422 Unprocessable Entity
  UNPROCESSABLE_ENTITY: 'UNPROCESSABLE_ENTITY',

  // 500 Internal Server Error
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type HttpErrorCode = typeof HttpErrorCodes[keyof typeof HttpErrorCodes];

/**
 * Values Store Error Codes
 */
export const ValuesErrorCodes = {
  TYPE_MISMATCH: 'TYPE_MISMATCH',
  INVALID_VALUES: 'INVALID_VALUES',
  INVALID_SET_EXPRESSION: 'INVALID_SET_EXPRESSION',
} as const;

export type ValuesErrorCode = typeof ValuesErrorCodes[keyof typeof ValuesErrorCodes];

/**
 * Template Error Codes
 */
export const TemplateErrorCodes = {
  TEMPLATE_SYNTAX: 'TEMPLATE_SYNTAX',
  UNDEFINED_REFERENCE: 'UNDEFINED_REFERENCE',
  UNKNOWN_HELPER: 'UNKNOWN_HELPER',
  RENDER_DEPTH_EXCEEDED: 'RENDER_DEPTH_EXCEEDED',
  FUNCTION_ERROR: 'FUNCTION_ERROR',
} as const;

export type TemplateErrorCode = typeof TemplateErrorCodes[keyof typeof TemplateErrorCodes];

/**
 * Manifest Error Codes
 */
export const ManifestErrorCodes = {
  MALFORMED_DOCUMENT: 'MALFORMED_DOCUMENT',
  MANIFEST_AGGREGATE: 'MANIFEST_AGGREGATE',
} as const;

export type ManifestErrorCode = typeof ManifestErrorCodes[keyof typeof ManifestErrorCodes];

/**
 * Chart and Configuration Error Codes
 */
export const InfrastructureErrorCodes = {
  CHART_LOAD_ERROR: 'CHART_LOAD_ERROR',
  INVALID_CHART: 'INVALID_CHART',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type InfrastructureErrorCode =
  typeof InfrastructureErrorCodes[keyof typeof InfrastructureErrorCodes];

// ============================================================================
// Combined Error Code Type
// ============================================================================

export const ErrorCodes = {
  ...HttpErrorCodes,
  ...ValuesErrorCodes,
  ...TemplateErrorCodes,
  ...ManifestErrorCodes,
  ...InfrastructureErrorCodes,
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// HTTP Status Mapping
// ============================================================================

const HTTP_STATUS_MAP: Record<ErrorCode, number> = {
  BAD_REQUEST: 400,
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  ROUTE_NOT_FOUND: 404,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_ERROR: 500,

  TYPE_MISMATCH: 422,
  INVALID_VALUES: 400,
  INVALID_SET_EXPRESSION: 400,

  TEMPLATE_SYNTAX: 400,
  UNDEFINED_REFERENCE: 422,
  UNKNOWN_HELPER: 422,
  RENDER_DEPTH_EXCEEDED: 422,
  FUNCTION_ERROR: 422,

  MALFORMED_DOCUMENT: 422,
  MANIFEST_AGGREGATE: 422,

  CHART_LOAD_ERROR: 400,
  INVALID_CHART: 400,
  CONFIGURATION_ERROR: 500,
};

/**
 * Get the HTTP status code for an error code
 */
export function getHttpStatusForCode(code: ErrorCode): number {
  return HTTP_STATUS_MAP[code] ?? 500;
}

/**
 * Check if a string is a known error code
 */
export function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(HTTP_STATUS_MAP, value);
}
