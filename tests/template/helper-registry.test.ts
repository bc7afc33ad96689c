/**
 * Helper Registry Tests
 * @module tests/template/helper-registry
 */

import { describe, it, expect } from 'vitest';
import { HelperRegistry, overlayHelpers } from '../../src/template/helper-registry.js';
import { parseTemplate } from '../../src/template/parser.js';

describe('HelperRegistry', () => {
  it('collects the defines of every fragment', () => {
    const registry = HelperRegistry.fromFragments([
      parseTemplate('{{ define "b.name" }}b{{ end }}{{ define "a.name" }}a{{ end }}', '_a.tpl'),
      parseTemplate('{{ define "c.name" }}c{{ end }}', '_b.tpl'),
    ]);

    expect(registry.size).toBe(3);
    expect(registry.names()).toEqual(['a.name', 'b.name', 'c.name']);
    expect(registry.has('c.name')).toBe(true);
    expect(registry.lookup('c.name')?.file).toBe('_b.tpl');
  });

  it('lets a later fragment replace an earlier definition', () => {
    const registry = HelperRegistry.fromFragments([
      parseTemplate('{{ define "x" }}first{{ end }}', '_a.tpl'),
      parseTemplate('{{ define "x" }}second{{ end }}', '_b.tpl'),
    ]);

    expect(registry.size).toBe(1);
    expect(registry.lookup('x')?.body).toEqual([{ type: 'text', text: 'second' }]);
  });

  it('returns undefined for unknown names', () => {
    expect(new HelperRegistry().lookup('nope')).toBeUndefined();
  });

  it('registers definitions one at a time', () => {
    const registry = new HelperRegistry().register({ name: 'manual', file: 'inline', body: [] });

    expect(registry.names()).toEqual(['manual']);
  });
});

describe('overlayHelpers', () => {
  const base = HelperRegistry.fromFragments([
    parseTemplate('{{ define "shared" }}base{{ end }}{{ define "only.base" }}b{{ end }}', '_h.tpl'),
  ]);

  it('prefers local defines and falls back to the base', () => {
    const local = parseTemplate('{{ define "shared" }}local{{ end }}', 'deploy.yaml');
    const lookup = overlayHelpers(local.defines, base);

    expect(lookup.lookup('shared')?.file).toBe('deploy.yaml');
    expect(lookup.lookup('only.base')?.file).toBe('_h.tpl');
    expect(lookup.lookup('absent')).toBeUndefined();
  });

  it('returns the base itself when there are no local defines', () => {
    expect(overlayHelpers(new Map(), base)).toBe(base);
  });
});
