/**
 * Helper Registry
 * @module template/helper-registry
 *
 * Named sub-templates available to `include` and `template`. A registry is
 * built explicitly (usually from a chart's `_helpers.tpl` files) and handed
 * to a TemplateRenderer; there is no global registry.
 */

import type { HelperDefinition, TemplateFragment } from './ast.js';

/**
 * Read side of a registry, as seen by the renderer
 */
export interface HelperLookup {
  lookup(name: string): HelperDefinition | undefined;
}

export class HelperRegistry implements HelperLookup {
  private readonly helpers = new Map<string, HelperDefinition>();

  /**
   * Collect every `define` of the given fragments. When two fragments
   * define the same name, the later one wins.
   */
  static fromFragments(fragments: Iterable<TemplateFragment>): HelperRegistry {
    const registry = new HelperRegistry();
    for (const fragment of fragments) {
      registry.registerFragment(fragment);
    }
    return registry;
  }

  register(definition: HelperDefinition): this {
    this.helpers.set(definition.name, definition);
    return this;
  }

  registerFragment(fragment: TemplateFragment): this {
    for (const definition of fragment.defines.values()) {
      this.register(definition);
    }
    return this;
  }

  lookup(name: string): HelperDefinition | undefined {
    return this.helpers.get(name);
  }

  has(name: string): boolean {
    return this.helpers.has(name);
  }

  /** Registered names, sorted */
  names(): string[] {
    return [...this.helpers.keys()].sort();
  }

  get size(): number {
    return this.helpers.size;
  }
}

/**
 * Lookup that consults a fragment's own defines before a base registry
 */
export function overlayHelpers(
  defines: ReadonlyMap<string, HelperDefinition>,
  base: HelperLookup
): HelperLookup {
  if (defines.size === 0) {
    return base;
  }
  return {
    lookup: (name: string) => defines.get(name) ?? base.lookup(name),
  };
}
