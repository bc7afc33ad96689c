/**
 * Runtime Values
 * @module template/runtime-value
 *
 * What an expression evaluates to while rendering: a ValueNode, or a
 * "missing" marker remembering the path that failed to resolve.
 */

import { type ValueNode, toPlain } from '../values/index.js';

/**
 * Result of looking up a path that does not exist
 */
export interface MissingValue {
  readonly kind: 'missing';
  /** The reference as written, e.g. ".Values.image.tag" */
  readonly path: string;
}

export type RuntimeValue = ValueNode | MissingValue;

export function missing(path: string): MissingValue {
  return { kind: 'missing', path };
}

export function isMissing(value: RuntimeValue): value is MissingValue {
  return value.kind === 'missing';
}

/**
 * Text form of a value as written into template output.
 * Null prints as the empty string; collections print as compact JSON.
 */
export function displayString(value: ValueNode): string {
  switch (value.kind) {
    case 'scalar':
      return value.value === null ? '' : String(value.value);
    case 'sequence':
    case 'mapping':
      return JSON.stringify(toPlain(value));
  }
}

/**
 * Field chain lookup. Any absent key, or a step through a non-mapping,
 * yields a missing value carrying the full written path.
 */
export function resolveChain(base: RuntimeValue, chain: readonly string[], path: string): RuntimeValue {
  let current = base;
  for (const key of chain) {
    if (current.kind !== 'mapping') {
      return missing(path);
    }
    const next = current.entries.get(key);
    if (next === undefined) {
      return missing(path);
    }
    current = next;
  }
  return current;
}
