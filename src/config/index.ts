/**
 * Configuration Module
 * @module config
 */

export {
  AppConfigSchema,
  LoggingConfigSchema,
  RenderConfigSchema,
  ManifestConfigSchema,
  ServerConfigSchema,
  Environment,
  LogLevel,
  type AppConfig,
  type LoggingConfig,
  type RenderConfig,
  type ManifestConfig,
  type ServerConfig,
  type RawConfig,
} from './schema.js';

export {
  ConfigLoader,
  EnvironmentConfigSource,
  FileConfigSource,
  loadConfig,
  type ConfigSource,
  type ConfigLoaderOptions,
} from './loader.js';
