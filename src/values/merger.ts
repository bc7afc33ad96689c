/**
 * Values Merger
 * @module values/merger
 *
 * Depth-first merge of ordered value layers. Later layers take precedence:
 * mappings merge key-wise, scalars and sequences replace, and a null in a
 * later layer removes the key it lands on.
 */

import { TypeMismatchError } from '../errors/index.js';
import {
  type MappingNode,
  type ValueNode,
  describeKind,
  emptyMapping,
  isNull,
  mapping,
} from './value-node.js';

/**
 * Options for mergeValues
 */
export interface MergeOptions {
  /** Layer names used in error messages, parallel to the layers */
  layerNames?: readonly string[];
}

/**
 * Merge ordered layers into a single mapping.
 *
 * Every layer root must be a mapping. Merging a mapping into a non-mapping
 * (or the reverse) at the same key raises TypeMismatchError naming the
 * dotted path and the layer. Inputs are never mutated.
 *
 * `null` is the one scalar that may land on a mapping key: it deletes the
 * key instead of raising, so an override layer can drop a chart default
 * (Helm's rule).
 */
export function mergeValues(layers: readonly ValueNode[], options: MergeOptions = {}): MappingNode {
  let result = emptyMapping();

  layers.forEach((layer, index) => {
    const layerName = options.layerNames?.[index];
    if (layer.kind !== 'mapping') {
      throw new TypeMismatchError('', index, 'mapping', describeKind(layer), layerName);
    }
    result = mergeMappings(result, layer, [], index, layerName);
  });

  return result;
}

function mergeMappings(
  base: MappingNode,
  overlay: MappingNode,
  path: readonly string[],
  layerIndex: number,
  layerName: string | undefined
): MappingNode {
  const entries = new Map(base.entries);

  for (const [key, incoming] of overlay.entries) {
    const keyPath = [...path, key];
    const existing = entries.get(key);

    if (existing === undefined) {
      entries.set(key, incoming);
      continue;
    }

    if (isNull(incoming)) {
      entries.delete(key);
      continue;
    }

    if (isNull(existing)) {
      entries.set(key, incoming);
      continue;
    }

    if (existing.kind === 'mapping' && incoming.kind === 'mapping') {
      entries.set(key, mergeMappings(existing, incoming, keyPath, layerIndex, layerName));
      continue;
    }

    if (existing.kind === 'mapping' || incoming.kind === 'mapping') {
      throw new TypeMismatchError(
        keyPath.join('.'),
        layerIndex,
        describeKind(existing),
        describeKind(incoming),
        layerName
      );
    }

    entries.set(key, incoming);
  }

  return mapping(entries);
}
