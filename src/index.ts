/**
 * Chart Render Engine
 * @module chart-renderer
 *
 * Layered values, Go-template style rendering and manifest emission for
 * Helm-style charts.
 */

export * from './errors/index.js';
export * from './values/index.js';
export * from './template/index.js';
export * from './manifest/index.js';
export * from './chart/index.js';
export {
  loadConfig,
  ConfigLoader,
  AppConfigSchema,
  type AppConfig,
} from './config/index.js';
export {
  createLogger,
  getLogger,
  setLogger,
  type StructuredLogger,
} from './logging/index.js';
export { buildApp, type AppOptions } from './app.js';
