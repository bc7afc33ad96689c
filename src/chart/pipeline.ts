/**
 * Chart Render Pipeline
 * @module chart/pipeline
 *
 * Values Store -> Template Renderer -> Manifest Emitter for one chart and
 * one release. The render is atomic: value and template errors propagate
 * as soon as they occur, and malformed documents from every template are
 * reported together in a single ManifestAggregateError.
 */

import {
  ManifestAggregateError,
  type MalformedDocumentError,
} from '../errors/index.js';
import { getModuleLogger, type StructuredLogger } from '../logging/index.js';
import { emit, serializeManifests, type RenderedDocument } from '../manifest/index.js';
import {
  DEFAULT_RELEASE,
  TemplateRenderer,
  type ReleaseInfo,
  type RenderBuiltins,
} from '../template/index.js';
import {
  type MappingNode,
  type ValuesLayer,
  ValuesStore,
} from '../values/index.js';
import type { Chart } from './chart.js';

export interface RenderChartOptions {
  /** Override layers applied over the chart defaults, lowest precedence first */
  layers?: readonly ValuesLayer[];
  release?: Partial<ReleaseInfo>;
  maxIncludeDepth?: number;
  requireKind?: boolean;
  logger?: StructuredLogger;
}

export interface ChartRenderResult {
  /** Merged values the templates were rendered with */
  readonly values: MappingNode;
  readonly documents: readonly RenderedDocument[];
  /** Documents as one YAML stream */
  readonly manifest: string;
}

export const CHART_DEFAULTS_LAYER = 'chart defaults';

function elapsed(since: number): number {
  return Math.round(performance.now() - since);
}

/**
 * Render every template of a chart for one release
 */
export function renderChart(chart: Chart, options: RenderChartOptions = {}): ChartRenderResult {
  const logger = options.logger ?? getModuleLogger('chart-pipeline');
  const release: ReleaseInfo = { ...DEFAULT_RELEASE, ...options.release };
  const chartName = chart.metadata.name;
  const layers: ValuesLayer[] = [
    { name: CHART_DEFAULTS_LAYER, values: chart.values },
    ...(options.layers ?? []),
  ];

  logger.renderStarted(chartName, release.name, layers.length);
  const startTime = performance.now();

  try {
    const mergeStart = performance.now();
    const values = ValuesStore.fromLayers(layers).resolve();
    logger.valuesMerged(layers.length, elapsed(mergeStart));

    const renderer = new TemplateRenderer({
      helpers: chart.helpers,
      maxIncludeDepth: options.maxIncludeDepth,
      logger,
    });
    const builtins: RenderBuiltins = {
      release,
      chart: {
        name: chartName,
        version: chart.metadata.version,
        appVersion: chart.metadata.appVersion,
        description: chart.metadata.description,
        apiVersion: chart.metadata.apiVersion,
      },
    };

    const documents: RenderedDocument[] = [];
    const errors: MalformedDocumentError[] = [];
    for (const fragment of chart.templates) {
      const output = renderer.render(fragment, values, builtins);
      const result = emit(output, { template: fragment.name, requireKind: options.requireKind });
      documents.push(...result.documents);
      errors.push(...result.errors);
    }

    if (errors.length > 0) {
      throw new ManifestAggregateError(errors);
    }

    const manifest = serializeManifests(documents);
    logger.renderCompleted(chartName, release.name, documents.length, elapsed(startTime));

    return { values, documents, manifest };
  } catch (error) {
    logger.renderFailed(chartName, release.name, error instanceof Error ? error : new Error(String(error)));
    throw error;
  }
}
