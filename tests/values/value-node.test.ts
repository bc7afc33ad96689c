/**
 * Value Node Tests
 * @module tests/values/value-node
 */

import { describe, it, expect } from 'vitest';
import {
  emptyMapping,
  fromPlain,
  mapping,
  scalar,
  toPlain,
} from '../../src/values/value-node.js';

describe('fromPlain', () => {
  it('encodes binary data as base64 text', () => {
    expect(fromPlain(new Uint8Array([104, 101, 108, 108, 111]))).toEqual(scalar('aGVsbG8='));
  });

  it('turns sets into sequences in insertion order', () => {
    expect(toPlain(fromPlain(new Set(['b', 'a'])))).toEqual(['b', 'a']);
  });

  it('reads Map keys as strings', () => {
    expect(toPlain(fromPlain(new Map<unknown, unknown>([[1, 'one']])))).toEqual({ '1': 'one' });
  });
});

describe('mapping immutability', () => {
  it('exposes no mutators on the entries', () => {
    const node = mapping([['a', scalar(1)]]);

    expect(Object.isFrozen(node)).toBe(true);
    expect(Object.isFrozen(node.entries)).toBe(true);
    expect('set' in node.entries).toBe(false);
    expect('delete' in node.entries).toBe(false);
    expect([...node.entries.keys()]).toEqual(['a']);
  });

  it('keeps the shared empty mapping empty', () => {
    expect(emptyMapping().entries.size).toBe(0);
    expect('clear' in emptyMapping().entries).toBe(false);
  });
});

describe('toPlain', () => {
  it('keeps a "__proto__" key as data', () => {
    const plain = toPlain(mapping([['__proto__', scalar('x')]]));

    expect(Object.keys(plain ?? {})).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(plain)).toBe(Object.prototype);
  });
});
