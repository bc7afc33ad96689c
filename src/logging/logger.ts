/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Structured logging with Pino for the chart render engine.
 * Adds domain-specific logging methods for charts, values and templates.
 */

import { pino, type Logger, type LoggerOptions, type DestinationStream } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  requestId?: string;
  chart?: string;
  release?: string;
  template?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Domain-specific log methods
 */
export interface DomainLogMethods {
  // Chart lifecycle
  chartLoaded(chart: string, templateCount: number, helperCount: number): void;
  renderStarted(chart: string, release: string, layerCount: number): void;
  renderCompleted(chart: string, release: string, documentCount: number, duration: number): void;
  renderFailed(chart: string, release: string, error: Error): void;

  // Values
  valuesMerged(layerCount: number, duration: number): void;

  // Templates and manifests
  templateRendered(template: string, bytes: number, duration: number): void;
  documentRejected(template: string | undefined, index: number, reason: string): void;
}

/**
 * Pino logger extended with domain-specific methods
 */
export type StructuredLogger = Omit<Logger, 'child'> & DomainLogMethods & {
  child(bindings: LogContext): StructuredLogger;
  withContext(context: LogContext): StructuredLogger;
};

// ============================================================================
// Default Configuration
// ============================================================================

const defaultConfig: LoggerConfig = {
  level: process.env.LOG_LEVEL || 'info',
  pretty: process.env.LOG_PRETTY === 'true' || process.env.NODE_ENV === 'development',
  redact: [
    'password',
    'token',
    'authorization',
    'apiKey',
    'secret',
    'rootPassword',
    'replicationPassword',
    'headers.authorization',
  ],
  service: process.env.SERVICE_NAME || 'chart-renderer',
  version: process.env.SERVICE_VERSION || '0.1.0',
  environment: process.env.NODE_ENV || 'development',
};

// ============================================================================
// Redaction Utilities
// ============================================================================

/**
 * Expands redaction paths to cover one level of nesting
 */
function createRedactionPaths(paths: string[]): string[] {
  const expandedPaths: string[] = [];

  for (const path of paths) {
    expandedPaths.push(path);
    expandedPaths.push(`*.${path}`);
  }

  return expandedPaths;
}

/**
 * Reads the engine error code off an error, if it carries one
 */
function errorCodeOf(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

/**
 * Extends a Pino logger with domain-specific methods
 */
function extendWithDomainMethods(logger: Logger): StructuredLogger {
  const methods: DomainLogMethods = {
    chartLoaded(chart, templateCount, helperCount) {
      logger.debug(
        { event: 'chart_loaded', chart, templateCount, helperCount },
        `Chart ${chart} loaded: ${templateCount} templates, ${helperCount} helpers`
      );
    },

    renderStarted(chart, release, layerCount) {
      logger.info(
        { event: 'render_started', chart, release, layerCount },
        `Rendering chart ${chart} for release ${release}`
      );
    },

    renderCompleted(chart, release, documentCount, duration) {
      logger.info(
        { event: 'render_completed', chart, release, documentCount, durationMs: duration },
        `Rendered ${documentCount} documents for ${release} in ${duration}ms`
      );
    },

    renderFailed(chart, release, error) {
      logger.error(
        { event: 'render_failed', chart, release, err: error, errorCode: errorCodeOf(error) },
        `Render of ${chart} failed: ${error.message}`
      );
    },

    valuesMerged(layerCount, duration) {
      logger.debug(
        { event: 'values_merged', layerCount, durationMs: duration },
        `Merged ${layerCount} value layers`
      );
    },

    templateRendered(template, bytes, duration) {
      logger.debug(
        { event: 'template_rendered', template, bytes, durationMs: duration },
        `Template ${template} rendered (${bytes} bytes)`
      );
    },

    documentRejected(template, index, reason) {
      logger.warn(
        { event: 'document_rejected', template, index, reason },
        `Document ${index}${template ? ` of ${template}` : ''} rejected: ${reason}`
      );
    },
  };

  // Keep the original child so the override can still create Pino children
  const originalChild = logger.child.bind(logger);

  return Object.assign(logger, methods, {
    child: (bindings: LogContext): StructuredLogger =>
      extendWithDomainMethods(originalChild(bindings)),
    withContext: (context: LogContext): StructuredLogger =>
      extendWithDomainMethods(originalChild(context)),
  });
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(
  name: string,
  overrides: Partial<LoggerConfig> = {},
  baseContext?: LogContext
): StructuredLogger {
  const config: LoggerConfig = { ...defaultConfig, ...overrides };

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;
  if (config.pretty && config.environment !== 'production') {
    destination = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    });
  }

  const base = destination ? pino(options, destination) : pino(options);
  const logger = extendWithDomainMethods(base);

  return baseContext ? logger.child(baseContext) : logger;
}

// ============================================================================
// Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Returns the process root logger, creating it on first use
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger(defaultConfig.service);
  }
  return rootLogger;
}

/**
 * Replaces the process root logger (used once configuration is loaded)
 */
export function setLogger(logger: StructuredLogger): void {
  rootLogger = logger;
}

/**
 * Creates a child of the root logger bound to a module name
 */
export function getModuleLogger(module: string): StructuredLogger {
  return getLogger().child({ module });
}
