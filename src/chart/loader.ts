/**
 * Chart Loader
 * @module chart/loader
 *
 * Reads a chart directory (Chart.yaml, values.yaml, templates/**) from disk.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { ChartLoadError } from '../errors/index.js';
import type { StructuredLogger } from '../logging/index.js';
import { type Chart, createChart } from './chart.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readOptional(filePath: string): Promise<string | undefined> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw new ChartLoadError('Failed to read chart file', filePath, {
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Collect template files below `dir`, keyed by posix path relative to `root`
 */
async function collectTemplates(
  root: string,
  dir: string,
  templates: Record<string, string>
): Promise<void> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isMissingFile(error)) {
      return;
    }
    throw new ChartLoadError('Failed to read templates directory', dir, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await collectTemplates(root, fullPath, templates);
    } else if (entry.isFile()) {
      const relative = path.relative(root, fullPath).split(path.sep).join('/');
      templates[relative] = await fs.promises.readFile(fullPath, 'utf-8');
    }
  }
}

/**
 * Load a chart directory
 */
export async function loadChart(chartDir: string, logger?: StructuredLogger): Promise<Chart> {
  const chartFile = path.join(chartDir, 'Chart.yaml');
  const chartYaml = await readOptional(chartFile);
  if (chartYaml === undefined) {
    throw new ChartLoadError('Chart.yaml not found', chartDir);
  }

  let metadata: unknown;
  try {
    metadata = parseYaml(chartYaml);
  } catch (error) {
    throw new ChartLoadError('Chart.yaml is not valid YAML', chartFile, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const values = await readOptional(path.join(chartDir, 'values.yaml'));

  const templatesDir = path.join(chartDir, 'templates');
  const templates: Record<string, string> = {};
  await collectTemplates(templatesDir, templatesDir, templates);

  return createChart({ metadata, values: values ?? '', templates, logger });
}
