/**
 * Values Module
 * @module values
 */

export {
  scalar,
  sequence,
  mapping,
  emptyMapping,
  nullNode,
  isMapping,
  isSequence,
  isScalar,
  isNull,
  fromPlain,
  toPlain,
  mappingToPlain,
  sortedKeys,
  splitPath,
  lookupPath,
  nodesEqual,
  describeKind,
  type ScalarValue,
  type ScalarNode,
  type SequenceNode,
  type MappingNode,
  type ValueNode,
  type ValueKind,
  type PlainValue,
} from './value-node.js';

export { mergeValues, type MergeOptions } from './merger.js';
export { ValuesStore, type ValuesLayer } from './values-store.js';
export {
  parseValuesYaml,
  renderValuesTemplate,
  parseSetOverrides,
  parseSetValue,
} from './sources.js';
