/**
 * Manifest Serializer
 * @module manifest/serializer
 */

import type { RenderedDocument } from './types.js';

/**
 * Write documents back as one YAML stream, each preceded by a separator
 * and a `# Source:` comment naming its template
 */
export function serializeManifests(documents: readonly RenderedDocument[]): string {
  return documents
    .map(doc => {
      const header = doc.template ? `---\n# Source: ${doc.template}\n` : '---\n';
      return `${header}${doc.source}\n`;
    })
    .join('');
}
