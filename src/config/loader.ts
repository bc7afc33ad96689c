/**
 * Configuration Loader
 * @module config/loader
 *
 * Multi-source configuration loading with validation.
 * Sources are applied lowest priority first; later sources override.
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { extname } from 'path';
import { parse as parseYaml } from 'yaml';
import { AppConfigSchema, type AppConfig, type RawConfig } from './schema.js';
import { ConfigurationError, getErrorMessage } from '../errors/index.js';
import { createLogger } from '../logging/index.js';

const logger = createLogger('config-loader');

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * Configuration source interface
 */
export interface ConfigSource {
  /** Unique name for the source */
  readonly name: string;
  /** Priority level (higher overrides lower) */
  readonly priority: number;
  /** Whether this source is available */
  isAvailable(): boolean;
  /** Load configuration from this source */
  load(): Promise<RawConfig>;
}

// ============================================================================
// Environment Variable Configuration Source
// ============================================================================

function parseBoolean(value: string | undefined): boolean | undefined {
  return value ? value === 'true' : undefined;
}

function parseInteger(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

/**
 * Maps environment variables to the configuration structure
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority = 10;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<RawConfig> {
    const env = this.env;

    return filterUndefined({
      env: env.NODE_ENV,
      version: env.APP_VERSION,
      logging: {
        level: env.LOG_LEVEL,
        pretty: parseBoolean(env.LOG_PRETTY),
      },
      render: {
        maxIncludeDepth: parseInteger(env.RENDER_MAX_INCLUDE_DEPTH),
      },
      manifest: {
        requireKind: parseBoolean(env.MANIFEST_REQUIRE_KIND),
      },
      server: {
        host: env.HOST,
        port: parseInteger(env.PORT),
        bodyLimit: parseInteger(env.BODY_LIMIT),
      },
    });
  }
}

// ============================================================================
// File Configuration Source
// ============================================================================

/**
 * JSON or YAML file configuration source
 */
export class FileConfigSource implements ConfigSource {
  public readonly name: string;
  public readonly priority: number;

  constructor(
    private readonly filePath: string,
    priority = 5
  ) {
    this.name = `file:${filePath}`;
    this.priority = priority;
  }

  isAvailable(): boolean {
    return existsSync(this.filePath);
  }

  async load(): Promise<RawConfig> {
    let parsed: unknown;
    try {
      const content = await readFile(this.filePath, 'utf-8');
      const ext = extname(this.filePath).toLowerCase();
      parsed = ext === '.yaml' || ext === '.yml' ? parseYaml(content) : JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load configuration file ${this.filePath}: ${getErrorMessage(error)}`,
        [],
        { cause: error instanceof Error ? error : undefined }
      );
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigurationError(`Configuration file ${this.filePath} must contain an object`);
    }

    logger.debug({ filePath: this.filePath }, 'Loaded config from file');
    return parsed;
  }
}

// ============================================================================
// Configuration Loader
// ============================================================================

/**
 * Configuration loader options
 */
export interface ConfigLoaderOptions {
  /** Environment to read variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Custom config sources, replacing the defaults */
  sources?: ConfigSource[];
}

/**
 * Multi-source configuration loader with validation
 */
export class ConfigLoader {
  private readonly sources: ConfigSource[];

  constructor(options: ConfigLoaderOptions = {}) {
    const env = options.env ?? process.env;
    this.sources = options.sources ? [...options.sources] : ConfigLoader.defaultSources(env);
    this.sources.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Default sources: optional CONFIG_FILE, then environment variables
   */
  static defaultSources(env: NodeJS.ProcessEnv): ConfigSource[] {
    const sources: ConfigSource[] = [];
    if (env.CONFIG_FILE) {
      sources.push(new FileConfigSource(env.CONFIG_FILE));
    }
    sources.push(new EnvironmentConfigSource(env));
    return sources;
  }

  /**
   * Source names in the order they are applied
   */
  getSourceNames(): string[] {
    return this.sources.map(s => s.name);
  }

  /**
   * Load and validate configuration from all sources
   */
  async load(): Promise<AppConfig> {
    let merged: RawConfig = {};

    for (const source of this.sources) {
      if (!source.isAvailable()) {
        logger.debug({ source: source.name }, 'Config source not available, skipping');
        continue;
      }
      merged = deepMerge(merged, await source.load());
    }

    const result = AppConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      logger.error({ issues }, 'Configuration validation failed');
      throw new ConfigurationError(
        `Configuration validation failed:\n${issues.map(i => `  - ${i}`).join('\n')}`,
        issues
      );
    }

    return result.data;
  }
}

/**
 * Load configuration with the default sources
 */
export async function loadConfig(options: ConfigLoaderOptions = {}): Promise<AppConfig> {
  return new ConfigLoader(options).load();
}

// ============================================================================
// Helpers
// ============================================================================

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively remove undefined values and empty objects
 */
function filterUndefined(obj: RawConfig): RawConfig {
  const result: RawConfig = {};

  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) {
      continue;
    }
    if (isPlainObject(value)) {
      const filtered = filterUndefined(value);
      if (Object.keys(filtered).length > 0) {
        result[key] = filtered;
      }
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Merge source objects; nested objects merge, everything else replaces
 */
function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };

  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value)
      ? deepMerge(existing, value)
      : value;
  }

  return result;
}
