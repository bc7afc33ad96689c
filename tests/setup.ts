/**
 * Vitest Global Test Setup
 * @module tests/setup
 *
 * Silences logging and pins the environment for every test file.
 */

import { vi } from 'vitest';

// ============================================================================
// Environment Setup
// ============================================================================

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

// ============================================================================
// Global Mocks
// ============================================================================

// Mock pino logger to prevent console output during tests
vi.mock('pino', () => {
  const createMockLogger = (): Record<string, unknown> => {
    const mockLogger: Record<string, unknown> = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
      trace: vi.fn(),
      fatal: vi.fn(),
      level: 'silent',
    };
    mockLogger.child = vi.fn(() => createMockLogger());
    return mockLogger;
  };

  const pino = Object.assign(vi.fn(() => createMockLogger()), {
    stdSerializers: { err: vi.fn((err: unknown) => err) },
    stdTimeFunctions: { isoTime: vi.fn(() => ',"time":"1970-01-01T00:00:00.000Z"') },
    transport: vi.fn(() => ({ write: vi.fn() })),
  });

  return { default: pino, pino };
});

// Mock pino-pretty to prevent import errors
vi.mock('pino-pretty', () => ({
  default: vi.fn(() => ({
    write: vi.fn(),
  })),
}));
