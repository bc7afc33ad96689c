/**
 * Infrastructure Error Classes
 * @module errors/infrastructure
 *
 * Errors raised outside the pure render pipeline: reading charts from
 * disk and loading configuration.
 */

import { BaseError, type ErrorContext } from './base.js';
import { InfrastructureErrorCodes } from './codes.js';

/**
 * A chart directory or one of its files could not be read or validated
 */
export class ChartLoadError extends BaseError {
  public readonly chartPath: string;

  constructor(message: string, chartPath: string, context: ErrorContext = {}) {
    super(`${message}: ${chartPath}`, InfrastructureErrorCodes.CHART_LOAD_ERROR, {
      ...context,
      details: { chartPath, ...context.details },
    });
    this.name = 'ChartLoadError';
    this.chartPath = chartPath;
  }
}

/**
 * Chart metadata failed validation
 */
export class InvalidChartError extends BaseError {
  public readonly issues: readonly string[];

  constructor(chartName: string, issues: readonly string[]) {
    super(
      `Invalid chart "${chartName}": ${issues.join('; ')}`,
      InfrastructureErrorCodes.INVALID_CHART,
      { details: { chartName, issues } }
    );
    this.name = 'InvalidChartError';
    this.issues = issues;
  }
}

/**
 * Configuration failed to load or validate
 */
export class ConfigurationError extends BaseError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], context: ErrorContext = {}) {
    super(message, InfrastructureErrorCodes.CONFIGURATION_ERROR, {
      ...context,
      details: { issues, ...context.details },
    }, false);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
