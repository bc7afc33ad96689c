/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for validating engine configuration.
 * Provides type-safe configuration with compile-time type inference.
 */

import { z } from 'zod';

// ============================================================================
// Environment Enum
// ============================================================================

/**
 * Valid application environments
 */
export const Environment = z.enum(['development', 'staging', 'production', 'test']);
export type Environment = z.infer<typeof Environment>;

// ============================================================================
// Logging Configuration
// ============================================================================

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  /** Minimum level written */
  level: LogLevel.default('info'),
  /** Pretty-print through pino-pretty (ignored in production) */
  pretty: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Render Configuration
// ============================================================================

/**
 * Template renderer configuration schema
 */
export const RenderConfigSchema = z.object({
  /** Maximum nesting of include/template calls */
  maxIncludeDepth: z.coerce.number().int().min(1).max(10000).default(100),
});

export type RenderConfig = z.infer<typeof RenderConfigSchema>;

/**
 * Manifest emitter configuration schema
 */
export const ManifestConfigSchema = z.object({
  /** Reject documents without apiVersion and kind */
  requireKind: z.boolean().default(true),
});

export type ManifestConfig = z.infer<typeof ManifestConfigSchema>;

// ============================================================================
// Server Configuration
// ============================================================================

/**
 * HTTP server configuration schema
 */
export const ServerConfigSchema = z.object({
  /** Host to bind to */
  host: z.string().default('0.0.0.0'),
  /** Port to listen on */
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  /** Maximum request body size in bytes */
  bodyLimit: z.coerce.number().int().min(1024).default(1024 * 1024),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// ============================================================================
// Application Configuration
// ============================================================================

/**
 * Complete engine configuration schema
 */
export const AppConfigSchema = z.object({
  env: Environment.default('development'),
  version: z.string().default('0.1.0'),
  logging: LoggingConfigSchema.default({}),
  render: RenderConfigSchema.default({}),
  manifest: ManifestConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Unvalidated configuration as produced by a source
 */
export type RawConfig = Record<string, unknown>;
