/**
 * Chart Model and Loader Tests
 * @module tests/chart/chart
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { createChart, validateChartMetadata } from '../../src/chart/chart.js';
import { loadChart } from '../../src/chart/loader.js';
import { fromPlain, toPlain } from '../../src/values/value-node.js';
import {
  ChartLoadError,
  InvalidChartError,
  InvalidValuesError,
  TemplateSyntaxError,
} from '../../src/errors/index.js';

const CHARTS_DIR = new URL('../fixtures/charts/', import.meta.url);

const METADATA = { apiVersion: 'v2', name: 'demo', version: '1.0.0' };

// ============================================================================
// Metadata
// ============================================================================

describe('validateChartMetadata', () => {
  it('accepts minimal metadata', () => {
    expect(validateChartMetadata(METADATA)).toEqual(METADATA);
  });

  it('turns numeric versions into strings', () => {
    const metadata = validateChartMetadata({ ...METADATA, version: 2, appVersion: 1.1 });

    expect(metadata.version).toBe('2');
    expect(metadata.appVersion).toBe('1.1');
  });

  it('lists every issue', () => {
    try {
      validateChartMetadata({ apiVersion: 'v2', version: '1.0.0' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidChartError);
      if (error instanceof InvalidChartError) {
        expect(error.issues).toEqual(['name: Required']);
        expect(error.message).toBe('Invalid chart "<unnamed>": name: Required');
        expect(error.code).toBe('INVALID_CHART');
      }
    }
  });

  it('rejects an unknown chart type', () => {
    expect(() => validateChartMetadata({ ...METADATA, type: 'plugin' })).toThrow(InvalidChartError);
  });
});

// ============================================================================
// createChart
// ============================================================================

describe('createChart', () => {
  it('separates helper partials from rendered templates', () => {
    const chart = createChart({
      metadata: METADATA,
      templates: {
        'service.yaml': 'kind: Service',
        '_helpers.tpl': '{{ define "demo.name" }}demo{{ end }}',
        'nested/configmap.yaml': '{{ define "demo.inline" }}x{{ end }}kind: ConfigMap',
        'NOTES.txt': '{{ .Values.not.rendered }}',
      },
    });

    expect(chart.templates.map(t => t.name)).toEqual([
      'demo/templates/nested/configmap.yaml',
      'demo/templates/service.yaml',
    ]);
    expect(chart.helpers.names()).toEqual(['demo.inline', 'demo.name']);
  });

  it('parses values text and accepts parsed values', () => {
    const fromText = createChart({ metadata: METADATA, values: 'replicas: 2\n', templates: {} });
    const fromNode = createChart({ metadata: METADATA, values: fromPlain({ replicas: 3 }), templates: {} });
    const withoutValues = createChart({ metadata: METADATA, templates: {} });

    expect(toPlain(fromText.values)).toEqual({ replicas: 2 });
    expect(toPlain(fromNode.values)).toEqual({ replicas: 3 });
    expect(toPlain(withoutValues.values)).toEqual({});
  });

  it('names the values file in values errors', () => {
    expect(() => createChart({ metadata: METADATA, values: '- a\n', templates: {} })).toThrow(
      new InvalidValuesError('root must be a mapping', 'demo/values.yaml')
    );
  });

  it('reports template syntax errors with the template path', () => {
    expect(() => createChart({ metadata: METADATA, templates: { 'bad.yaml': 'a\n{{ if .x }}' } })).toThrow(
      new TemplateSyntaxError('unclosed {{if}}', { file: 'demo/templates/bad.yaml', line: 2 })
    );
  });
});

// ============================================================================
// loadChart
// ============================================================================

describe('loadChart', () => {
  it('reads Chart.yaml, values.yaml and templates', async () => {
    const chart = await loadChart(fileURLToPath(new URL('sample-app', CHARTS_DIR)));

    expect(chart.metadata).toEqual({
      apiVersion: 'v2',
      name: 'sample-app',
      description: 'A small web application',
      type: 'application',
      version: '0.3.0',
      appVersion: '1.8.2',
    });
    expect(toPlain(chart.values)).toMatchObject({ replicaCount: 1, service: { type: 'ClusterIP', port: 80 } });
    expect(chart.templates.map(t => t.name)).toEqual([
      'sample-app/templates/deployment.yaml',
      'sample-app/templates/service.yaml',
    ]);
    expect(chart.helpers.names()).toEqual(['sample-app.fullname', 'sample-app.labels']);
  });

  it('fails when Chart.yaml is absent', async () => {
    const missingDir = fileURLToPath(new URL('does-not-exist', CHARTS_DIR));

    await expect(loadChart(missingDir)).rejects.toThrow(ChartLoadError);
    await expect(loadChart(missingDir)).rejects.toThrow(`Chart.yaml not found: ${missingDir}`);
  });
});
