/**
 * Manifest Serializer Tests
 * @module tests/manifest/serializer
 */

import { describe, it, expect } from 'vitest';
import { serializeManifests } from '../../src/manifest/serializer.js';
import { emit } from '../../src/manifest/emitter.js';

describe('serializeManifests', () => {
  it('writes each document with a separator and its source template', () => {
    const { documents } = emit('apiVersion: v1\nkind: ConfigMap\n---\napiVersion: v1\nkind: Secret\n', {
      template: 'web/templates/config.yaml',
    });

    expect(serializeManifests(documents)).toBe(
      '---\n# Source: web/templates/config.yaml\napiVersion: v1\nkind: ConfigMap\n' +
      '---\n# Source: web/templates/config.yaml\napiVersion: v1\nkind: Secret\n'
    );
  });

  it('omits the source comment when the template is unknown', () => {
    const { documents } = emit('apiVersion: v1\nkind: ConfigMap\n');

    expect(serializeManifests(documents)).toBe('---\napiVersion: v1\nkind: ConfigMap\n');
  });

  it('writes nothing for no documents', () => {
    expect(serializeManifests([])).toBe('');
  });

  it('round-trips through emit', () => {
    const { documents } = emit('apiVersion: v1\nkind: A\nmetadata:\n  name: x\n---\napiVersion: v1\nkind: B\n');
    const again = emit(serializeManifests(documents));

    expect(again.errors).toEqual([]);
    expect(again.documents.map(d => d.content)).toEqual(documents.map(d => d.content));
  });
});
