/**
 * Manifest Emitter Tests
 * @module tests/manifest/emitter
 *
 * Document splitting, per-document parsing and partial-failure collection.
 */

import { describe, it, expect } from 'vitest';
import { emit, emitOrThrow, splitDocuments } from '../../src/manifest/emitter.js';
import { MalformedDocumentError, ManifestAggregateError } from '../../src/errors/index.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const CONFIG_MAP = 'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: one\n';
const SECRET = 'apiVersion: v1\nkind: Secret\nmetadata:\n  name: two\n  namespace: prod\n';
const DEPLOYMENT = 'apiVersion: apps/v1\nkind: Deployment\nmetadata:\n  name: three\n';
const DUPLICATE_KEYS = 'apiVersion: v1\nkind: Service\nkind: Service\n';

const stream = (...docs: string[]) => docs.join('---\n');

// ============================================================================
// Splitting
// ============================================================================

describe('splitDocuments', () => {
  it('splits on separator lines and records start lines', () => {
    expect(splitDocuments('a: 1\n---\nb: 2\n--- # second\nc: 3')).toEqual([
      { text: 'a: 1', line: 1 },
      { text: 'b: 2', line: 3 },
      { text: 'c: 3', line: 5 },
    ]);
  });

  it('drops documents holding only whitespace and comments', () => {
    expect(splitDocuments('---\n# Source: empty.yaml\n---\n\n  \n---\nkind: A\n')).toEqual([
      { text: 'kind: A\n', line: 7 },
    ]);
  });

  it('does not split on longer dash runs or indented separators', () => {
    expect(splitDocuments('a: |\n  ---\n----\n')).toHaveLength(1);
  });

  it('returns nothing for empty output', () => {
    expect(splitDocuments('')).toEqual([]);
    expect(splitDocuments('\n\n')).toEqual([]);
  });
});

// ============================================================================
// Emit
// ============================================================================

describe('emit', () => {
  it('parses documents in source order', () => {
    const { documents, errors } = emit(stream(CONFIG_MAP, SECRET, DEPLOYMENT));

    expect(errors).toEqual([]);
    expect(documents.map(d => [d.index, d.kind, d.name])).toEqual([
      [0, 'ConfigMap', 'one'],
      [1, 'Secret', 'two'],
      [2, 'Deployment', 'three'],
    ]);
    expect(documents[1]?.namespace).toBe('prod');
    expect(documents[2]?.apiVersion).toBe('apps/v1');
  });

  it('keeps going after a malformed document and reports its index', () => {
    const { documents, errors } = emit(stream(CONFIG_MAP, SECRET, DEPLOYMENT, DUPLICATE_KEYS));

    expect(documents).toHaveLength(3);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(MalformedDocumentError);
    expect(errors[0]?.index).toBe(3);
    expect(errors[0]?.message).toMatch(/^Malformed document #3: Map keys must be unique/);
  });

  it('collects every malformed document, not just the first', () => {
    const { documents, errors } = emit(stream('kind: [a, b\n', CONFIG_MAP, 'plain text\n', SECRET));

    expect(documents.map(d => d.index)).toEqual([1, 3]);
    expect(errors.map(e => e.index)).toEqual([0, 2]);
  });

  it('reports an unresolved alias without losing the surrounding documents', () => {
    const { documents, errors } = emit(
      'apiVersion: v1\nkind: A\n---\napiVersion: v1\nkind: B\nx: *nope\n---\napiVersion: v1\nkind: C\n'
    );

    expect(documents.map(d => [d.index, d.kind])).toEqual([[0, 'A'], [2, 'C']]);
    expect(errors.map(e => e.message)).toEqual([
      'Malformed document #1: Unresolved alias (the anchor must be set before the alias): nope',
    ]);
  });

  it('converts binary and set values', () => {
    const { documents, errors } = emit('apiVersion: v1\nkind: Secret\ndata: !!binary aGVsbG8=\ns: !!set {a, b}\n');

    expect(errors).toEqual([]);
    expect(documents[0]?.content).toEqual({ apiVersion: 'v1', kind: 'Secret', data: 'aGVsbG8=', s: ['a', 'b'] });
  });

  it('rejects non-mapping roots', () => {
    const { errors } = emit('just text\n---\n- a\n- b\n', { template: 'web/templates/bad.yaml' });

    expect(errors.map(e => e.message)).toEqual([
      'Malformed document web/templates/bad.yaml #0: expected a mapping at the document root, found a scalar',
      'Malformed document web/templates/bad.yaml #1: expected a mapping at the document root, found a sequence',
    ]);
    expect(errors[0]?.template).toBe('web/templates/bad.yaml');
  });

  it('requires apiVersion and kind by default', () => {
    const { errors } = emit('apiVersion: v1\nmetadata: {}\n---\nfoo: bar\n');

    expect(errors.map(e => e.message)).toEqual([
      'Malformed document #0: missing kind',
      'Malformed document #1: missing apiVersion and kind',
    ]);
  });

  it('accepts arbitrary mappings when kind is not required', () => {
    const { documents, errors } = emit('foo: bar\n', { requireKind: false });

    expect(errors).toEqual([]);
    expect(documents[0]?.kind).toBeUndefined();
    expect(documents[0]?.content).toEqual({ foo: 'bar' });
  });

  it('keeps content keys in source order', () => {
    const { documents } = emit('kind: Pod\napiVersion: v1\nmetadata:\n  name: p\n');

    expect(Object.keys(documents[0]?.content ?? {})).toEqual(['kind', 'apiVersion', 'metadata']);
  });

  it('records the template and trimmed source text', () => {
    const { documents } = emit(`---\n\n${CONFIG_MAP}\n\n`, { template: 'web/templates/cm.yaml' });

    expect(documents[0]?.template).toBe('web/templates/cm.yaml');
    expect(documents[0]?.source).toBe('apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: one');
  });

  it('returns nothing for empty output', () => {
    expect(emit('')).toEqual({ documents: [], errors: [] });
  });
});

describe('emitOrThrow', () => {
  it('returns documents when all parse', () => {
    expect(emitOrThrow(stream(CONFIG_MAP, SECRET))).toHaveLength(2);
  });

  it('throws one aggregate error holding every failure', () => {
    try {
      emitOrThrow(stream(CONFIG_MAP, SECRET, DEPLOYMENT, DUPLICATE_KEYS));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestAggregateError);
      if (error instanceof ManifestAggregateError) {
        expect(error.indices).toEqual([3]);
        expect(error.errors).toHaveLength(1);
        expect(error.message).toBe('1 malformed document(s): #3');
        expect(error.statusCode).toBe(422);
      }
    }
  });
});
