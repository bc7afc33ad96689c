/**
 * Manifest Emitter
 * @module manifest/emitter
 *
 * Splits rendered template output into YAML documents and parses each one
 * into a RenderedDocument. A malformed document does not stop the others
 * from being parsed: every failure is collected and reported together.
 */

import { parseDocument } from 'yaml';
import {
  MalformedDocumentError,
  ManifestAggregateError,
} from '../errors/index.js';
import { getModuleLogger, type StructuredLogger } from '../logging/index.js';
import {
  type MappingNode,
  type PlainValue,
  fromPlain,
  mappingToPlain,
} from '../values/index.js';
import type { EmitOptions, EmitResult, RenderedDocument } from './types.js';

// ============================================================================
// Document splitting
// ============================================================================

/** `---` on its own line, optionally followed by a comment or tag */
const SEPARATOR = /^---(?:[ \t].*)?$/;

/**
 * Source text of one non-blank document
 */
export interface DocumentChunk {
  readonly text: string;
  /** 1-based line of the chunk's first line in the whole output */
  readonly line: number;
}

function isBlankDocument(text: string): boolean {
  return text.split('\n').every(line => {
    const trimmed = line.trim();
    return trimmed === '' || trimmed.startsWith('#');
  });
}

/**
 * Split a YAML stream on document separators, dropping documents that hold
 * only whitespace and comments
 */
export function splitDocuments(text: string): DocumentChunk[] {
  const chunks: DocumentChunk[] = [];
  let current: string[] = [];
  let startLine = 1;

  text.split(/\r?\n/).forEach((line, i) => {
    if (SEPARATOR.test(line)) {
      chunks.push({ text: current.join('\n'), line: startLine });
      current = [];
      startLine = i + 2;
    } else {
      current.push(line);
    }
  });
  chunks.push({ text: current.join('\n'), line: startLine });

  return chunks.filter(chunk => !isBlankDocument(chunk.text));
}

// ============================================================================
// Document parsing
// ============================================================================

let moduleLogger: StructuredLogger | null = null;

function logger(): StructuredLogger {
  if (!moduleLogger) {
    moduleLogger = getModuleLogger('manifest-emitter');
  }
  return moduleLogger;
}

function stringField(value: PlainValue | undefined): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function metadataOf(content: { readonly [key: string]: PlainValue }): { name?: string; namespace?: string } {
  const metadata = content.metadata;
  if (typeof metadata !== 'object' || metadata === null || Array.isArray(metadata)) {
    return {};
  }
  return {
    name: stringField(metadata.name),
    namespace: stringField(metadata.namespace),
  };
}

/**
 * Parse one document; a failure is returned, not thrown
 */
function parseChunk(
  chunk: DocumentChunk,
  index: number,
  options: EmitOptions
): RenderedDocument | MalformedDocumentError {
  const { template } = options;
  const requireKind = options.requireKind ?? true;

  const doc = parseDocument(chunk.text, { uniqueKeys: true });
  const [firstError] = doc.errors;
  if (firstError) {
    const reason = firstError.message.split('\n')[0] ?? firstError.message;
    return new MalformedDocumentError(index, reason, template, firstError.linePos?.[0].line);
  }

  let data: unknown;
  try {
    data = doc.toJS();
  } catch (error) {
    // unresolved aliases and alias-count limits surface only on conversion
    return new MalformedDocumentError(index, error instanceof Error ? error.message : String(error), template);
  }

  const root = fromPlain(data);
  if (root.kind !== 'mapping') {
    const found = root.kind === 'scalar' ? 'a scalar' : 'a sequence';
    return new MalformedDocumentError(index, `expected a mapping at the document root, found ${found}`, template);
  }

  return toRenderedDocument(root, index, chunk, options, requireKind);
}

function toRenderedDocument(
  root: MappingNode,
  index: number,
  chunk: DocumentChunk,
  options: EmitOptions,
  requireKind: boolean
): RenderedDocument | MalformedDocumentError {
  const content = mappingToPlain(root, false);
  const apiVersion = stringField(content.apiVersion);
  const kind = stringField(content.kind);

  if (requireKind && (apiVersion === undefined || kind === undefined)) {
    const absent = [apiVersion === undefined ? 'apiVersion' : null, kind === undefined ? 'kind' : null]
      .filter((field): field is string => field !== null)
      .join(' and ');
    return new MalformedDocumentError(index, `missing ${absent}`, options.template);
  }

  const document: RenderedDocument = {
    index,
    template: options.template,
    apiVersion,
    kind,
    ...metadataOf(content),
    content,
    source: chunk.text.replace(/^\s*\n/, '').trimEnd(),
  };
  return Object.freeze(document);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse every document of a rendered output. Documents keep source order;
 * indices count non-blank documents only.
 */
export function emit(text: string, options: EmitOptions = {}): EmitResult {
  const documents: RenderedDocument[] = [];
  const errors: MalformedDocumentError[] = [];

  splitDocuments(text).forEach((chunk, index) => {
    const parsed = parseChunk(chunk, index, options);
    if (parsed instanceof MalformedDocumentError) {
      logger().documentRejected(options.template, index, parsed.message);
      errors.push(parsed);
    } else {
      documents.push(parsed);
    }
  });

  return { documents, errors };
}

/**
 * Like emit, but fails with a ManifestAggregateError holding every
 * malformed document when there is at least one
 */
export function emitOrThrow(text: string, options: EmitOptions = {}): RenderedDocument[] {
  const { documents, errors } = emit(text, options);
  if (errors.length > 0) {
    throw new ManifestAggregateError(errors);
  }
  return [...documents];
}
