/**
 * Error Formatting Tests
 * @module tests/middleware/error-handler
 */

import { describe, it, expect } from 'vitest';
import { formatError } from '../../src/middleware/error-handler.js';
import { UnknownHelperError } from '../../src/errors/index.js';

describe('formatError', () => {
  it('formats engine errors with their code and details', () => {
    const error = new UnknownHelperError('web.labels', { file: 'web/templates/cm.yaml', line: 2 });

    expect(formatError(error, 'req-1')).toEqual({
      statusCode: 422,
      error: 'Unprocessable Entity',
      message: 'Unknown helper template "web.labels" (web/templates/cm.yaml:2)',
      code: 'UNKNOWN_HELPER',
      details: {
        location: { file: 'web/templates/cm.yaml', line: 2 },
        helperName: 'web.labels',
      },
      requestId: 'req-1',
      timestamp: error.timestamp.toISOString(),
    });
  });

  it('formats schema validation failures', () => {
    const validation = [{ instancePath: '/layers', message: 'must NOT have fewer than 1 items' }];
    const error = Object.assign(new Error('body/layers must NOT have fewer than 1 items'), { validation });

    const response = formatError(error, 'req-2');

    expect(response.statusCode).toBe(400);
    expect(response.code).toBe('VALIDATION_ERROR');
    expect(response.details).toEqual(validation);
  });

  it('passes through client errors raised by the framework', () => {
    const error = Object.assign(new Error('Request body is too large'), {
      statusCode: 413,
      code: 'FST_ERR_CTP_BODY_TOO_LARGE',
    });

    const response = formatError(error, 'req-3');

    expect(response.statusCode).toBe(413);
    expect(response.error).toBe('Payload Too Large');
    expect(response.code).toBe('FST_ERR_CTP_BODY_TOO_LARGE');
  });

  it('hides unexpected error messages in production', () => {
    const error = new Error('cannot read properties of undefined');

    expect(formatError(error, 'req-4', true).message).toBe('An unexpected error occurred');
    expect(formatError(error, 'req-4').message).toBe('cannot read properties of undefined');
    expect(formatError(error, 'req-4').code).toBe('INTERNAL_ERROR');
  });
});
