/**
 * Chart Module
 * @module chart
 */

export {
  createChart,
  validateChartMetadata,
  ChartMetadataSchema,
  type Chart,
  type ChartMetadata,
  type ChartSource,
} from './chart.js';
export { loadChart } from './loader.js';
export {
  renderChart,
  CHART_DEFAULTS_LAYER,
  type RenderChartOptions,
  type ChartRenderResult,
} from './pipeline.js';
