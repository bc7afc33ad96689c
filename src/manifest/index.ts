/**
 * Manifest Module
 * @module manifest
 */

export { emit, emitOrThrow, splitDocuments, type DocumentChunk } from './emitter.js';
export { serializeManifests } from './serializer.js';
export type { RenderedDocument, EmitResult, EmitOptions } from './types.js';
