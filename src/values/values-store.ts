/**
 * Values Store
 * @module values/values-store
 *
 * Immutable layered store: chart defaults, environment overrides and user
 * overrides, resolved into one mapping on demand.
 */

import { mergeValues } from './merger.js';
import {
  type MappingNode,
  type ValueNode,
  fromPlain,
  lookupPath,
  splitPath,
} from './value-node.js';

/**
 * One named layer of the store
 */
export interface ValuesLayer {
  readonly name: string;
  readonly values: ValueNode;
}

export class ValuesStore {
  private constructor(private readonly layers: readonly ValuesLayer[]) {}

  /**
   * A store with no layers; resolves to an empty mapping
   */
  static empty(): ValuesStore {
    return new ValuesStore([]);
  }

  /**
   * Build a store from layers in precedence order (lowest first)
   */
  static fromLayers(layers: readonly ValuesLayer[]): ValuesStore {
    return new ValuesStore([...layers]);
  }

  /**
   * Return a new store with one more layer on top
   */
  withLayer(name: string, values: ValueNode): ValuesStore {
    return new ValuesStore([...this.layers, { name, values }]);
  }

  /**
   * Same as withLayer, taking plain data
   */
  withPlainLayer(name: string, values: Record<string, unknown>): ValuesStore {
    return this.withLayer(name, fromPlain(values));
  }

  layerNames(): string[] {
    return this.layers.map(l => l.name);
  }

  get size(): number {
    return this.layers.length;
  }

  /**
   * Merge every layer; TypeMismatchError carries the offending layer name
   */
  resolve(): MappingNode {
    return mergeValues(
      this.layers.map(l => l.values),
      { layerNames: this.layerNames() }
    );
  }

  /**
   * Look up a dotted path in the resolved values
   */
  lookup(path: string): ValueNode | undefined {
    return lookupPath(this.resolve(), splitPath(path));
  }
}
