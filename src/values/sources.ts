/**
 * Values Sources
 * @module values/sources
 *
 * Turns the textual inputs of a render into value layers: values.yaml files,
 * pre-rendered `.j2` values templates and `--set` style assignments.
 */

import { parseDocument } from 'yaml';
import { InvalidValuesError, UndefinedReferenceError } from '../errors/index.js';
import {
  type ScalarValue,
  type ValueNode,
  emptyMapping,
  fromPlain,
} from './value-node.js';

// ============================================================================
// values.yaml
// ============================================================================

/**
 * Parse a values file into a mapping node.
 * An empty file is an empty mapping; any other non-mapping root is rejected.
 */
export function parseValuesYaml(source: string, fileName = 'values.yaml'): ValueNode {
  const doc = parseDocument(source, { uniqueKeys: true });

  const [firstError] = doc.errors;
  if (firstError) {
    throw new InvalidValuesError(firstError.message, fileName);
  }

  let data: unknown;
  try {
    data = doc.toJS();
  } catch (error) {
    // unresolved aliases and alias-count limits surface only on conversion
    throw new InvalidValuesError(error instanceof Error ? error.message : String(error), fileName, undefined, {
      cause: error instanceof Error ? error : undefined,
    });
  }
  if (data === null || data === undefined) {
    return emptyMapping();
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new InvalidValuesError('root must be a mapping', fileName);
  }

  return fromPlain(data);
}

// ============================================================================
// Values templates
// ============================================================================

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

/**
 * Substitute `{{ name }}` placeholders of a values template from a flat
 * context, before the result is parsed as YAML. Unknown names raise
 * UndefinedReferenceError with the line they appear on.
 */
export function renderValuesTemplate(
  source: string,
  context: Readonly<Record<string, ScalarValue>>,
  sourceName = 'values.j2.yaml'
): string {
  return source.replace(PLACEHOLDER_PATTERN, (_match: string, name: string, offset: number) => {
    if (!Object.prototype.hasOwnProperty.call(context, name)) {
      const line = source.slice(0, offset).split('\n').length;
      throw new UndefinedReferenceError(name, { file: sourceName, line });
    }
    const value = context[name];
    return value === null || value === undefined ? '' : String(value);
  });
}

// ============================================================================
// --set assignments
// ============================================================================

type SetTree = Map<string, ScalarValue | SetTree>;

const RESERVED_SEGMENTS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Split on commas that are not escaped with a backslash
 */
function splitAssignments(input: string): string[] {
  const parts: string[] = [];
  let current = '';

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (ch === '\\' && input[i + 1] === ',') {
      current += ',';
      i++;
    } else if (ch === ',') {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);

  return parts;
}

/**
 * Type a --set value: integers, booleans and null are recognised,
 * everything else stays a string
 */
export function parseSetValue(raw: string): ScalarValue {
  if (/^-?\d+$/.test(raw)) {
    const parsed = Number(raw);
    if (Number.isSafeInteger(parsed)) {
      return parsed;
    }
  }
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw === 'null') return null;
  return raw;
}

/**
 * Build an override layer from `key.path=value` assignments. Each entry may
 * hold several comma-separated assignments; later assignments win.
 */
export function parseSetOverrides(assignments: readonly string[]): ValueNode {
  const root: SetTree = new Map();

  for (const entry of assignments) {
    for (const expression of splitAssignments(entry)) {
      if (expression.trim() === '') {
        continue;
      }

      const eq = expression.indexOf('=');
      if (eq <= 0) {
        throw InvalidValuesError.invalidSetExpression(expression, 'expected key=value');
      }

      const segments = expression.slice(0, eq).trim().split('.');
      if (segments.some(s => s === '')) {
        throw InvalidValuesError.invalidSetExpression(expression, 'empty key segment');
      }

      const reserved = segments.find(s => RESERVED_SEGMENTS.has(s));
      if (reserved !== undefined) {
        throw InvalidValuesError.invalidSetExpression(expression, `reserved key segment "${reserved}"`);
      }

      const last = segments.pop();
      if (last === undefined) {
        throw InvalidValuesError.invalidSetExpression(expression, 'missing key');
      }

      let cursor = root;
      for (const segment of segments) {
        const next = cursor.get(segment);
        if (next instanceof Map) {
          cursor = next;
        } else {
          const created: SetTree = new Map();
          cursor.set(segment, created);
          cursor = created;
        }
      }
      cursor.set(last, parseSetValue(expression.slice(eq + 1)));
    }
  }

  return fromPlain(root);
}
