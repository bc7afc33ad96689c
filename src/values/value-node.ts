/**
 * Value Node Model
 * @module values/value-node
 *
 * Recursively nested mapping/sequence/scalar structure used for chart
 * values and for every value flowing through a render. Nodes are frozen
 * once built.
 */

// ============================================================================
// Node Types
// ============================================================================

export type ScalarValue = string | number | boolean | null;

export interface ScalarNode {
  readonly kind: 'scalar';
  readonly value: ScalarValue;
}

export interface SequenceNode {
  readonly kind: 'sequence';
  readonly items: readonly ValueNode[];
}

export interface MappingNode {
  readonly kind: 'mapping';
  readonly entries: ReadonlyMap<string, ValueNode>;
}

export type ValueNode = ScalarNode | SequenceNode | MappingNode;

export type ValueKind = ValueNode['kind'];

/**
 * Plain JSON-like data accepted by fromPlain
 */
export type PlainValue = ScalarValue | PlainValue[] | { [key: string]: PlainValue };

// ============================================================================
// Constructors
// ============================================================================

/**
 * Read-only view over a mapping's entries; the backing Map is unreachable
 */
class FrozenEntries implements ReadonlyMap<string, ValueNode> {
  readonly #map: Map<string, ValueNode>;

  constructor(entries: Iterable<readonly [string, ValueNode]>) {
    this.#map = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.#map.size;
  }

  get(key: string): ValueNode | undefined {
    return this.#map.get(key);
  }

  has(key: string): boolean {
    return this.#map.has(key);
  }

  forEach(
    callback: (value: ValueNode, key: string, map: ReadonlyMap<string, ValueNode>) => void,
    thisArg?: unknown
  ): void {
    this.#map.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  entries() {
    return this.#map.entries();
  }

  keys() {
    return this.#map.keys();
  }

  values() {
    return this.#map.values();
  }

  [Symbol.iterator]() {
    return this.#map[Symbol.iterator]();
  }
}

function freezeScalar(value: ScalarValue): ScalarNode {
  const node: ScalarNode = { kind: 'scalar', value };
  return Object.freeze(node);
}

const NULL_NODE = freezeScalar(null);
const EMPTY_MAPPING = mapping([]);

export function scalar(value: ScalarValue): ScalarNode {
  return value === null ? NULL_NODE : freezeScalar(value);
}

export function sequence(items: readonly ValueNode[]): SequenceNode {
  const node: SequenceNode = { kind: 'sequence', items: Object.freeze([...items]) };
  return Object.freeze(node);
}

export function mapping(entries: Iterable<readonly [string, ValueNode]>): MappingNode {
  const node: MappingNode = { kind: 'mapping', entries: new FrozenEntries(entries) };
  return Object.freeze(node);
}

export function emptyMapping(): MappingNode {
  return EMPTY_MAPPING;
}

export function nullNode(): ScalarNode {
  return NULL_NODE;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isMapping(node: ValueNode): node is MappingNode {
  return node.kind === 'mapping';
}

export function isSequence(node: ValueNode): node is SequenceNode {
  return node.kind === 'sequence';
}

export function isScalar(node: ValueNode): node is ScalarNode {
  return node.kind === 'scalar';
}

export function isNull(node: ValueNode): boolean {
  return node.kind === 'scalar' && node.value === null;
}

// ============================================================================
// Conversion
// ============================================================================

/**
 * Build a node tree from plain data (parsed YAML/JSON).
 * Values that are not JSON-like (functions, symbols, undefined) become null.
 * Dates become ISO strings, binary data base64 text and sets sequences.
 */
export function fromPlain(value: unknown): ValueNode {
  if (value === null || value === undefined) {
    return NULL_NODE;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return scalar(value);
  }
  if (typeof value === 'number') {
    return scalar(value);
  }
  if (typeof value === 'bigint') {
    return scalar(Number(value));
  }
  if (value instanceof Date) {
    return scalar(value.toISOString());
  }
  if (Array.isArray(value)) {
    return sequence(value.map(fromPlain));
  }
  if (value instanceof Uint8Array) {
    return scalar(Buffer.from(value).toString('base64'));
  }
  if (value instanceof Set) {
    return sequence([...value].map(fromPlain));
  }
  if (value instanceof Map) {
    const entries: Array<[string, ValueNode]> = [];
    for (const [key, item] of value) {
      entries.push([String(key), fromPlain(item)]);
    }
    return mapping(entries);
  }
  if (typeof value === 'object') {
    return mapping(
      Object.entries(value).map(([key, item]): [string, ValueNode] => [key, fromPlain(item)])
    );
  }
  return NULL_NODE;
}

/**
 * Convert a node tree back to plain data. Mapping keys come out sorted
 * unless `sortKeys` is false, in which case insertion order is kept.
 */
export function toPlain(node: ValueNode, sortKeys = true): PlainValue {
  switch (node.kind) {
    case 'scalar':
      return node.value;
    case 'sequence':
      return node.items.map(item => toPlain(item, sortKeys));
    case 'mapping':
      return mappingToPlain(node, sortKeys);
  }
}

export function mappingToPlain(node: MappingNode, sortKeys = true): { [key: string]: PlainValue } {
  const keys = sortKeys ? sortedKeys(node) : [...node.entries.keys()];
  const pairs: Array<[string, PlainValue]> = [];
  for (const key of keys) {
    const child = node.entries.get(key);
    if (child) {
      pairs.push([key, toPlain(child, sortKeys)]);
    }
  }
  // fromEntries defines "__proto__" as an own key instead of setting the prototype
  return Object.fromEntries(pairs);
}

/**
 * Mapping keys in lexical order, as range and toYaml iterate them
 */
export function sortedKeys(node: MappingNode): string[] {
  return [...node.entries.keys()].sort();
}

// ============================================================================
// Lookup
// ============================================================================

/**
 * Split a dotted path ("service.ports.http") into segments.
 * The empty string is the root.
 */
export function splitPath(path: string): string[] {
  return path === '' ? [] : path.split('.');
}

/**
 * Follow a path of mapping keys; undefined when any step is absent
 * or traverses a non-mapping.
 */
export function lookupPath(node: ValueNode, segments: readonly string[]): ValueNode | undefined {
  let current: ValueNode = node;
  for (const segment of segments) {
    if (current.kind !== 'mapping') {
      return undefined;
    }
    const next = current.entries.get(segment);
    if (!next) {
      return undefined;
    }
    current = next;
  }
  return current;
}

/**
 * Structural equality; mapping key order is ignored
 */
export function nodesEqual(a: ValueNode, b: ValueNode): boolean {
  if (a.kind === 'scalar' && b.kind === 'scalar') {
    return a.value === b.value;
  }
  if (a.kind === 'sequence' && b.kind === 'sequence') {
    return a.items.length === b.items.length && a.items.every((item, i) => {
      const other = b.items[i];
      return other !== undefined && nodesEqual(item, other);
    });
  }
  if (a.kind === 'mapping' && b.kind === 'mapping') {
    if (a.entries.size !== b.entries.size) {
      return false;
    }
    for (const [key, value] of a.entries) {
      const other = b.entries.get(key);
      if (!other || !nodesEqual(value, other)) {
        return false;
      }
    }
    return true;
  }
  return false;
}

/**
 * Human-readable kind name used in error messages
 */
export function describeKind(node: ValueNode): string {
  if (node.kind === 'scalar') {
    return node.value === null ? 'null' : `${typeof node.value} scalar`;
  }
  return node.kind;
}
