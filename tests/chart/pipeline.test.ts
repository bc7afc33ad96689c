/**
 * Chart Render Pipeline Tests
 * @module tests/chart/pipeline
 *
 * End-to-end renders: merged values through templates into manifests.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { fileURLToPath } from 'url';
import { loadChart } from '../../src/chart/loader.js';
import { createChart, type Chart } from '../../src/chart/chart.js';
import { renderChart } from '../../src/chart/pipeline.js';
import { fromPlain, toPlain } from '../../src/values/value-node.js';
import { createLogger } from '../../src/logging/index.js';
import {
  ManifestAggregateError,
  TypeMismatchError,
  UndefinedReferenceError,
} from '../../src/errors/index.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const SAMPLE_CHART_DIR = fileURLToPath(new URL('../fixtures/charts/sample-app', import.meta.url));

const EXPECTED_DEPLOYMENT = [
  'apiVersion: apps/v1',
  'kind: Deployment',
  'metadata:',
  '  name: shop-sample-app',
  '  labels:',
  '    app.kubernetes.io/name: sample-app',
  '    app.kubernetes.io/instance: shop',
  'spec:',
  '  replicas: 1',
  '  template:',
  '    spec:',
  '      containers:',
  '        - name: sample-app',
  '          image: "registry.example.com/sample-app:1.8.2"',
  '          imagePullPolicy: IfNotPresent',
].join('\n');

const EXPECTED_SERVICE = [
  'apiVersion: v1',
  'kind: Service',
  'metadata:',
  '  name: shop-sample-app',
  'spec:',
  '  type: ClusterIP',
  '  ports:',
  '    - port: 80',
  '      targetPort: http',
].join('\n');

function inlineChart(templates: Record<string, string>, values = ''): Chart {
  return createChart({
    metadata: { apiVersion: 'v2', name: 'demo', version: '1.0.0' },
    values,
    templates,
  });
}

// ============================================================================
// Tests
// ============================================================================

describe('renderChart', () => {
  let chart: Chart;

  beforeAll(async () => {
    chart = await loadChart(SAMPLE_CHART_DIR);
  });

  describe('rendering', () => {
    it('renders every template with the chart defaults', () => {
      const result = renderChart(chart, { release: { name: 'shop' } });

      expect(result.documents.map(d => [d.template, d.kind, d.name])).toEqual([
        ['sample-app/templates/deployment.yaml', 'Deployment', 'shop-sample-app'],
        ['sample-app/templates/service.yaml', 'Service', 'shop-sample-app'],
      ]);
      expect(result.documents[0]?.source).toBe(EXPECTED_DEPLOYMENT);
    });

    it('writes the manifest stream with source comments', () => {
      const { manifest } = renderChart(chart, { release: { name: 'shop' } });

      expect(manifest).toBe(
        `---\n# Source: sample-app/templates/deployment.yaml\n${EXPECTED_DEPLOYMENT}\n` +
        `---\n# Source: sample-app/templates/service.yaml\n${EXPECTED_SERVICE}\n`
      );
    });

    it('applies override layers over the chart defaults', () => {
      const result = renderChart(chart, {
        release: { name: 'shop' },
        layers: [
          { name: 'production', values: fromPlain({ replicaCount: 3, image: { tag: '2.0.0' } }) },
          { name: '--set', values: fromPlain({ podLabels: { team: 'core' } }) },
        ],
      });

      expect(result.documents[0]?.content).toMatchObject({
        metadata: { labels: { 'app.kubernetes.io/instance': 'shop', team: 'core' } },
        spec: {
          replicas: 3,
          template: { spec: { containers: [{ image: 'registry.example.com/sample-app:2.0.0' }] } },
        },
      });
      expect(toPlain(result.values)).toMatchObject({
        replicaCount: 3,
        image: { repository: 'registry.example.com/sample-app', tag: '2.0.0', pullPolicy: 'IfNotPresent' },
      });
    });

    it('uses the default release name', () => {
      const result = renderChart(chart);

      expect(result.documents[1]?.name).toBe('release-name-sample-app');
    });

    it('renders the same output twice', () => {
      expect(renderChart(chart).manifest).toBe(renderChart(chart).manifest);
    });
  });

  describe('failures', () => {
    it('propagates type mismatches from override layers', () => {
      const attempt = () =>
        renderChart(chart, { layers: [{ name: 'prod', values: fromPlain({ service: 'none' }) }] });

      expect(attempt).toThrow(TypeMismatchError);
      expect(attempt).toThrow('Cannot merge string scalar into mapping at "service" (layer "prod")');
    });

    it('reports the layer that introduced the conflict', () => {
      const simple = inlineChart({}, 'a: 1\n');

      expect(() => renderChart(simple, { layers: [{ name: 'user', values: fromPlain({ a: { b: 1 } }) }] }))
        .toThrow('Cannot merge mapping into number scalar at "a" (layer "user")');
      expect(() => renderChart(simple, { layers: [{ name: 'user', values: fromPlain(['x']) }] }))
        .toThrow('Cannot merge sequence into mapping at the root (layer "user")');
    });

    it('propagates undefined references', () => {
      const broken = inlineChart({ 'cm.yaml': 'apiVersion: v1\nkind: ConfigMap\ndata:\n  x: {{ .Values.missing.key }}\n' });

      expect(() => renderChart(broken)).toThrow(UndefinedReferenceError);
      expect(() => renderChart(broken)).toThrow(
        'Undefined reference ".Values.missing.key" (demo/templates/cm.yaml:4)'
      );
    });

    it('aggregates malformed documents across templates', () => {
      const valid = 'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: {{ . }}\n';
      const first = ['a', 'b', 'c'].map(n => valid.replace('{{ . }}', n)).join('---\n') + '---\nkind: [x\n';
      const broken = inlineChart({
        'a.yaml': first,
        'b.yaml': 'just text\n',
      });

      try {
        renderChart(broken);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ManifestAggregateError);
        if (error instanceof ManifestAggregateError) {
          expect(error.errors.map(e => [e.template, e.index])).toEqual([
            ['demo/templates/a.yaml', 3],
            ['demo/templates/b.yaml', 0],
          ]);
          expect(error.message).toBe('2 malformed document(s): demo/templates/a.yaml#3, demo/templates/b.yaml#0');
        }
      }
    });
  });

  describe('logging', () => {
    it('logs the start and completion of a render', () => {
      const logger = createLogger('pipeline-test');
      renderChart(chart, { release: { name: 'shop' }, logger });

      expect(logger.info).toHaveBeenCalledWith(
        expect.objectContaining({ event: 'render_started', chart: 'sample-app', release: 'shop', layerCount: 1 }),
        'Rendering chart sample-app for release shop'
      );
      expect(logger.info).toHaveBeenCalledWith(
        expect.objectContaining({ event: 'render_completed', documentCount: 2 }),
        expect.stringMatching(/^Rendered 2 documents for shop in \d+ms$/)
      );
    });

    it('logs a failed render with its error code', () => {
      const logger = createLogger('pipeline-test');
      const broken = inlineChart({ 'bad.yaml': 'foo: bar\n' });

      expect(() => renderChart(broken, { logger })).toThrow(ManifestAggregateError);
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ event: 'render_failed', chart: 'demo', errorCode: 'MANIFEST_AGGREGATE' }),
        'Render of demo failed: 1 malformed document(s): demo/templates/bad.yaml#0'
      );
    });
  });
});
