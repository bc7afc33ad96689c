/**
 * Manifest Types
 * @module manifest/types
 */

import type { MalformedDocumentError } from '../errors/index.js';
import type { PlainValue } from '../values/index.js';

/**
 * One Kubernetes object parsed out of rendered template output
 */
export interface RenderedDocument {
  /** 0-based position among the non-blank documents of its source output */
  readonly index: number;
  /** Template that produced the document, when known */
  readonly template?: string;
  readonly apiVersion?: string;
  readonly kind?: string;
  /** metadata.name */
  readonly name?: string;
  /** metadata.namespace */
  readonly namespace?: string;
  /** Full parsed document, keys in source order */
  readonly content: { readonly [key: string]: PlainValue };
  /** Document text as rendered, without its separator */
  readonly source: string;
}

/**
 * Outcome of an emit: every document that parsed and every one that did not
 */
export interface EmitResult {
  readonly documents: readonly RenderedDocument[];
  readonly errors: readonly MalformedDocumentError[];
}

export interface EmitOptions {
  /** Template name recorded on documents and errors */
  template?: string;
  /** Reject documents without apiVersion and kind (default true) */
  requireKind?: boolean;
}
