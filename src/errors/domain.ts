/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Error classes raised by the render pipeline itself: the values store,
 * the template renderer and the manifest emitter.
 */

import { BaseError, type ErrorContext, type SourceLocation } from './base.js';
import {
  type ErrorCode,
  ValuesErrorCodes,
  TemplateErrorCodes,
  ManifestErrorCodes,
} from './codes.js';

/**
 * Append "(template:line)" to a message when a location is known
 */
function withLocation(message: string, location: SourceLocation | null): string {
  return location ? `${message} (${location.file}:${location.line})` : message;
}

// ============================================================================
// Values Errors
// ============================================================================

/**
 * Raised when a layer merges a scalar or sequence into an existing mapping
 * key, or a mapping into an existing non-mapping key.
 */
export class TypeMismatchError extends BaseError {
  /** Dotted path of the conflicting key ("" for the layer root) */
  public readonly path: string;
  /** Index of the layer that introduced the conflict */
  public readonly layerIndex: number;
  public readonly existingKind: string;
  public readonly incomingKind: string;
  public readonly layerName?: string;

  constructor(
    path: string,
    layerIndex: number,
    existingKind: string,
    incomingKind: string,
    layerName?: string,
    context: ErrorContext = {}
  ) {
    const layer = layerName ? `layer "${layerName}"` : `layer ${layerIndex}`;
    const at = path === '' ? 'the root' : `"${path}"`;
    super(
      `Cannot merge ${incomingKind} into ${existingKind} at ${at} (${layer})`,
      ValuesErrorCodes.TYPE_MISMATCH,
      {
        ...context,
        details: { path, layerIndex, layerName, existingKind, incomingKind, ...context.details },
      }
    );
    this.name = 'TypeMismatchError';
    this.path = path;
    this.layerIndex = layerIndex;
    this.existingKind = existingKind;
    this.incomingKind = incomingKind;
    this.layerName = layerName;
  }
}

/**
 * Raised for unreadable values sources: bad YAML, a non-mapping root,
 * or a malformed --set expression.
 */
export class InvalidValuesError extends BaseError {
  public readonly source: string;

  constructor(
    message: string,
    source: string,
    code: ErrorCode = ValuesErrorCodes.INVALID_VALUES,
    context: ErrorContext = {}
  ) {
    super(`${source}: ${message}`, code, {
      ...context,
      details: { source, ...context.details },
    });
    this.name = 'InvalidValuesError';
    this.source = source;
  }

  static invalidSetExpression(expression: string, reason: string): InvalidValuesError {
    return new InvalidValuesError(
      `invalid assignment "${expression}": ${reason}`,
      '--set',
      ValuesErrorCodes.INVALID_SET_EXPRESSION
    );
  }
}

// ============================================================================
// Template Errors
// ============================================================================

/**
 * Base class for errors raised while parsing or rendering a template
 */
export class TemplateError extends BaseError {
  public readonly location: SourceLocation | null;

  constructor(
    message: string,
    code: ErrorCode,
    location: SourceLocation | null = null,
    context: ErrorContext = {}
  ) {
    super(withLocation(message, location), code, {
      ...context,
      details: { location, ...context.details },
    });
    this.name = 'TemplateError';
    this.location = location;
  }
}

/**
 * Template source could not be parsed
 */
export class TemplateSyntaxError extends TemplateError {
  constructor(message: string, location: SourceLocation | null = null) {
    super(message, TemplateErrorCodes.TEMPLATE_SYNTAX, location);
    this.name = 'TemplateSyntaxError';
  }
}

/**
 * A reference expression resolved to an absent path and no inline
 * default was given.
 */
export class UndefinedReferenceError extends TemplateError {
  /** The exact path as written, e.g. ".Values.image.tag" */
  public readonly path: string;

  constructor(path: string, location: SourceLocation | null = null) {
    super(`Undefined reference "${path}"`, TemplateErrorCodes.UNDEFINED_REFERENCE, location, {
      details: { path },
    });
    this.name = 'UndefinedReferenceError';
    this.path = path;
  }
}

/**
 * include/template named a helper that is not registered
 */
export class UnknownHelperError extends TemplateError {
  public readonly helperName: string;

  constructor(helperName: string, location: SourceLocation | null = null) {
    super(`Unknown helper template "${helperName}"`, TemplateErrorCodes.UNKNOWN_HELPER, location, {
      details: { helperName },
    });
    this.name = 'UnknownHelperError';
    this.helperName = helperName;
  }
}

/**
 * Nested include/template calls went deeper than the configured limit
 */
export class RenderDepthError extends TemplateError {
  public readonly helperName: string;
  public readonly maxDepth: number;

  constructor(helperName: string, maxDepth: number, location: SourceLocation | null = null) {
    super(
      `Helper "${helperName}" exceeded the maximum include depth of ${maxDepth}`,
      TemplateErrorCodes.RENDER_DEPTH_EXCEEDED,
      location,
      { details: { helperName, maxDepth } }
    );
    this.name = 'RenderDepthError';
    this.helperName = helperName;
    this.maxDepth = maxDepth;
  }
}

/**
 * A template function was called with arguments it cannot handle,
 * or `required`/`fail` aborted the render.
 */
export class TemplateFunctionError extends TemplateError {
  public readonly functionName: string;

  constructor(functionName: string, message: string, location: SourceLocation | null = null) {
    super(`${functionName}: ${message}`, TemplateErrorCodes.FUNCTION_ERROR, location, {
      details: { functionName },
    });
    this.name = 'TemplateFunctionError';
    this.functionName = functionName;
  }
}

// ============================================================================
// Manifest Errors
// ============================================================================

/**
 * One rendered document could not be parsed into a structured record
 */
export class MalformedDocumentError extends BaseError {
  /** 0-based position among the non-blank documents of one output */
  public readonly index: number;
  /** Template that produced the document, when known */
  public readonly template?: string;
  /** 1-based line within the document, when the parser reports one */
  public readonly line?: number;

  constructor(index: number, reason: string, template?: string, line?: number) {
    const where = template ? `${template} ` : '';
    super(
      `Malformed document ${where}#${index}: ${reason}`,
      ManifestErrorCodes.MALFORMED_DOCUMENT,
      { details: { index, template, line, reason } }
    );
    this.name = 'MalformedDocumentError';
    this.index = index;
    this.template = template;
    this.line = line;
  }
}

/**
 * Every document-level failure of an emit, collected before failing
 */
export class ManifestAggregateError extends BaseError {
  public readonly errors: readonly MalformedDocumentError[];

  constructor(errors: readonly MalformedDocumentError[]) {
    const summary = errors
      .map(e => (e.template ? `${e.template}#${e.index}` : `#${e.index}`))
      .join(', ');
    super(
      `${errors.length} malformed document(s): ${summary}`,
      ManifestErrorCodes.MANIFEST_AGGREGATE,
      {
        details: {
          documents: errors.map(e => ({
            index: e.index,
            template: e.template,
            line: e.line,
            message: e.message,
          })),
        },
      }
    );
    this.name = 'ManifestAggregateError';
    this.errors = errors;
  }

  /** Indices of the failing documents, in source order */
  get indices(): number[] {
    return this.errors.map(e => e.index);
  }
}
