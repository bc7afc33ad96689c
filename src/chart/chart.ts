/**
 * Chart Model
 * @module chart/chart
 *
 * In-memory chart: validated metadata, default values, parsed templates and
 * the helper registry built from every template's `define` blocks.
 */

import { z } from 'zod';
import { InvalidChartError } from '../errors/index.js';
import { getModuleLogger, type StructuredLogger } from '../logging/index.js';
import {
  HelperRegistry,
  parseTemplate,
  type TemplateFragment,
} from '../template/index.js';
import {
  type ValueNode,
  emptyMapping,
  parseValuesYaml,
} from '../values/index.js';

// ============================================================================
// Chart.yaml
// ============================================================================

export const ChartMetadataSchema = z.object({
  apiVersion: z.string().min(1),
  name: z.string().min(1),
  version: z.union([z.string().min(1), z.number()]).transform(String),
  appVersion: z.union([z.string(), z.number()]).transform(String).optional(),
  description: z.string().optional(),
  type: z.enum(['application', 'library']).optional(),
});

export type ChartMetadata = z.infer<typeof ChartMetadataSchema>;

function rawChartName(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string') {
    return raw.name;
  }
  return '<unnamed>';
}

/**
 * Validate Chart.yaml content
 */
export function validateChartMetadata(raw: unknown): ChartMetadata {
  const result = ChartMetadataSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new InvalidChartError(rawChartName(raw), issues);
  }
  return result.data;
}

// ============================================================================
// Chart
// ============================================================================

export interface Chart {
  readonly metadata: ChartMetadata;
  /** Chart default values (values.yaml) */
  readonly values: ValueNode;
  /** Templates that produce manifests, in path order */
  readonly templates: readonly TemplateFragment[];
  /** Defines from every template file, partials included */
  readonly helpers: HelperRegistry;
}

export interface ChartSource {
  /** Raw Chart.yaml content, validated on creation */
  metadata: unknown;
  /** values.yaml text or an already-parsed node */
  values?: string | ValueNode;
  /** Template sources keyed by path relative to templates/ */
  templates: Readonly<Record<string, string>>;
  logger?: StructuredLogger;
}

const NOTES_FILE = 'NOTES.txt';

function baseName(templatePath: string): string {
  const parts = templatePath.split('/');
  return parts[parts.length - 1] ?? templatePath;
}

/**
 * Build a chart from in-memory sources.
 *
 * Files whose base name starts with `_` only contribute helpers; NOTES.txt
 * is skipped. Template names take the form `<chart>/templates/<path>`.
 */
export function createChart(source: ChartSource): Chart {
  const metadata = validateChartMetadata(source.metadata);
  const logger = source.logger ?? getModuleLogger('chart');

  const values = typeof source.values === 'string'
    ? parseValuesYaml(source.values, `${metadata.name}/values.yaml`)
    : source.values ?? emptyMapping();

  const helpers = new HelperRegistry();
  const templates: TemplateFragment[] = [];

  for (const templatePath of Object.keys(source.templates).sort()) {
    const base = baseName(templatePath);
    const content = source.templates[templatePath];
    if (base === NOTES_FILE || content === undefined) {
      continue;
    }

    const fragment = parseTemplate(content, `${metadata.name}/templates/${templatePath}`);
    helpers.registerFragment(fragment);
    if (!base.startsWith('_')) {
      templates.push(fragment);
    }
  }

  logger.chartLoaded(metadata.name, templates.length, helpers.size);

  return Object.freeze({ metadata, values, templates: Object.freeze(templates), helpers });
}
