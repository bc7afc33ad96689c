/**
 * Truthiness
 * @module template/truthiness
 */

import type { RuntimeValue } from './runtime-value.js';

/**
 * Condition predicate for if/with/range, and/or/not and default/empty.
 *
 * Falsy: missing, null, false, 0, "", an empty sequence and an empty
 * mapping. Everything else is truthy.
 */
export function isTruthy(value: RuntimeValue): boolean {
  switch (value.kind) {
    case 'missing':
      return false;
    case 'mapping':
      return value.entries.size > 0;
    case 'sequence':
      return value.items.length > 0;
    case 'scalar': {
      const v = value.value;
      if (v === null) return false;
      if (typeof v === 'boolean') return v;
      if (typeof v === 'number') return v !== 0;
      return v !== '';
    }
  }
}
