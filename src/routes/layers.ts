/**
 * Request Layer Conversion
 * @module routes/layers
 */

import {
  type ValuesLayer,
  fromPlain,
  parseSetOverrides,
  parseValuesYaml,
} from '../values/index.js';
import type { ValuesLayerInput } from './schemas/common.js';

export const SET_LAYER_NAME = '--set';

/**
 * Turn request layers (plus optional --set assignments, applied last)
 * into store layers
 */
export function toValuesLayers(
  layers: readonly ValuesLayerInput[],
  set: readonly string[] = []
): ValuesLayer[] {
  const result: ValuesLayer[] = layers.map(layer => ({
    name: layer.name,
    values: 'yaml' in layer ? parseValuesYaml(layer.yaml, layer.name) : fromPlain(layer.values),
  }));

  if (set.length > 0) {
    result.push({ name: SET_LAYER_NAME, values: parseSetOverrides(set) });
  }
  return result;
}
