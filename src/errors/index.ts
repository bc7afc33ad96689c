/**
 * Error Handling Module
 * @module errors
 *
 * Central export point for all error classes and codes.
 */

export {
  ErrorCodes,
  HttpErrorCodes,
  ValuesErrorCodes,
  TemplateErrorCodes,
  ManifestErrorCodes,
  InfrastructureErrorCodes,
  getHttpStatusForCode,
  isErrorCode,
  type ErrorCode,
  type HttpErrorCode,
  type ValuesErrorCode,
  type TemplateErrorCode,
  type ManifestErrorCode,
  type InfrastructureErrorCode,
} from './codes.js';

export {
  BaseError,
  isBaseError,
  isOperationalError,
  hasErrorCode,
  getErrorMessage,
  type ErrorContext,
  type SerializedError,
  type SourceLocation,
} from './base.js';

export {
  TypeMismatchError,
  InvalidValuesError,
  TemplateError,
  TemplateSyntaxError,
  UndefinedReferenceError,
  UnknownHelperError,
  RenderDepthError,
  TemplateFunctionError,
  MalformedDocumentError,
  ManifestAggregateError,
} from './domain.js';

export {
  ChartLoadError,
  InvalidChartError,
  ConfigurationError,
} from './infrastructure.js';
