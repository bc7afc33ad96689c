/**
 * Global Error Handler Middleware
 * @module middleware/error-handler
 *
 * Fastify error handler mapping engine errors to HTTP responses.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { type BaseError, isBaseError, isOperationalError } from '../errors/index.js';
import { getModuleLogger } from '../logging/index.js';

// ============================================================================
// Error Response Types
// ============================================================================

export interface ErrorResponse {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  details?: unknown;
  requestId?: string;
  timestamp?: string;
  stack?: string;
}

// ============================================================================
// Error Formatting
// ============================================================================

/**
 * Get HTTP error name from status code
 */
function getHttpErrorName(statusCode: number): string {
  const names: Record<number, string> = {
    400: 'Bad Request',
    404: 'Not Found',
    413: 'Payload Too Large',
    415: 'Unsupported Media Type',
    422: 'Unprocessable Entity',
    500: 'Internal Server Error',
    503: 'Service Unavailable',
  };
  return names[statusCode] || 'Error';
}

function formatBaseError(error: BaseError, requestId: string): ErrorResponse {
  return {
    statusCode: error.statusCode,
    error: getHttpErrorName(error.statusCode),
    message: error.message,
    code: error.code,
    details: error.context.details,
    requestId,
    timestamp: error.timestamp.toISOString(),
  };
}

/**
 * Format error for response
 */
export function formatError(error: FastifyError | Error, requestId: string, isProduction = false): ErrorResponse {
  if (isBaseError(error)) {
    return formatBaseError(error, requestId);
  }

  // Schema validation failures
  if ('validation' in error && error.validation) {
    return {
      statusCode: 400,
      error: 'Bad Request',
      message: error.message,
      code: 'VALIDATION_ERROR',
      details: error.validation,
      requestId,
      timestamp: new Date().toISOString(),
    };
  }

  // Fastify errors (body too large, bad content type, ...)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return {
      statusCode: error.statusCode,
      error: getHttpErrorName(error.statusCode),
      message: error.message,
      code: 'code' in error && typeof error.code === 'string' ? error.code : 'BAD_REQUEST',
      requestId,
      timestamp: new Date().toISOString(),
    };
  }

  return {
    statusCode: 500,
    error: 'Internal Server Error',
    message: isProduction ? 'An unexpected error occurred' : error.message,
    code: 'INTERNAL_ERROR',
    requestId,
    timestamp: new Date().toISOString(),
  };
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

export interface ErrorHandlerOptions {
  /** Include stack traces in 5xx responses */
  includeStackTraces?: boolean;
  /** Hide internal error messages */
  production?: boolean;
}

async function errorHandlerPlugin(
  fastify: FastifyInstance,
  options: ErrorHandlerOptions
): Promise<void> {
  const logger = getModuleLogger('error-handler');

  fastify.setErrorHandler(
    async (error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) => {
      const response = formatError(error, request.id, options.production ?? false);

      const logContext = {
        err: error,
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode: response.statusCode,
        code: response.code,
      };

      if (response.statusCode >= 500 && !isOperationalError(error)) {
        logger.error(logContext, 'Non-operational server error');
      } else if (response.statusCode >= 500) {
        logger.error(logContext, 'Server error');
      } else {
        logger.warn(logContext, 'Client error');
      }

      if (options.includeStackTraces && response.statusCode >= 500) {
        response.stack = error.stack;
      }

      return reply.status(response.statusCode).send(response);
    }
  );

  fastify.setNotFoundHandler(async (request: FastifyRequest, reply: FastifyReply) => {
    logger.warn({ method: request.method, url: request.url, requestId: request.id }, 'Route not found');

    return reply.status(404).send({
      statusCode: 404,
      error: 'Not Found',
      message: `Route ${request.method} ${request.url} not found`,
      code: 'ROUTE_NOT_FOUND',
      requestId: request.id,
      timestamp: new Date().toISOString(),
    });
  });
}

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
  fastify: '4.x',
});
