/**
 * Configuration Tests
 * @module tests/config
 *
 * Defaults, source precedence and validation errors.
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import {
  AppConfigSchema,
  ConfigLoader,
  EnvironmentConfigSource,
  FileConfigSource,
  loadConfig,
  type ConfigSource,
  type RawConfig,
} from '../src/config/index.js';
import { ConfigurationError } from '../src/errors/index.js';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/config/${name}`, import.meta.url));

class StaticSource implements ConfigSource {
  constructor(
    public readonly name: string,
    public readonly priority: number,
    private readonly config: RawConfig,
    private readonly available = true
  ) {}

  isAvailable(): boolean {
    return this.available;
  }

  async load(): Promise<RawConfig> {
    return this.config;
  }
}

// ============================================================================
// Schema
// ============================================================================

describe('AppConfigSchema', () => {
  it('applies defaults to an empty object', () => {
    expect(AppConfigSchema.parse({})).toEqual({
      env: 'development',
      version: '0.1.0',
      logging: { level: 'info', pretty: false },
      render: { maxIncludeDepth: 100 },
      manifest: { requireKind: true },
      server: { host: '0.0.0.0', port: 3000, bodyLimit: 1048576 },
    });
  });

  it('rejects an unknown environment', () => {
    expect(AppConfigSchema.safeParse({ env: 'qa' }).success).toBe(false);
  });
});

// ============================================================================
// Sources
// ============================================================================

describe('EnvironmentConfigSource', () => {
  it('maps environment variables and drops unset ones', async () => {
    const source = new EnvironmentConfigSource({
      NODE_ENV: 'production',
      PORT: '9000',
      RENDER_MAX_INCLUDE_DEPTH: '10',
      MANIFEST_REQUIRE_KIND: 'false',
    });

    expect(await source.load()).toEqual({
      env: 'production',
      render: { maxIncludeDepth: 10 },
      manifest: { requireKind: false },
      server: { port: 9000 },
    });
  });
});

describe('FileConfigSource', () => {
  it('reads YAML files', async () => {
    const source = new FileConfigSource(fixture('engine.yaml'));

    expect(source.isAvailable()).toBe(true);
    expect(await source.load()).toEqual({
      render: { maxIncludeDepth: 25 },
      server: { port: 8080 },
      logging: { level: 'warn' },
    });
  });

  it('reads JSON files', async () => {
    expect(await new FileConfigSource(fixture('engine.json')).load()).toEqual({
      manifest: { requireKind: false },
    });
  });

  it('reports missing files as unavailable', () => {
    expect(new FileConfigSource(fixture('absent.yaml')).isAvailable()).toBe(false);
  });

  it('rejects a file that does not hold an object', async () => {
    const path = fixture('list.yaml');

    await expect(new FileConfigSource(path).load()).rejects.toThrow(
      `Configuration file ${path} must contain an object`
    );
  });
});

// ============================================================================
// Loader
// ============================================================================

describe('ConfigLoader', () => {
  it('lets environment variables override the config file', async () => {
    const config = await loadConfig({
      env: { CONFIG_FILE: fixture('engine.yaml'), PORT: '4000', NODE_ENV: 'test' },
    });

    expect(config.env).toBe('test');
    expect(config.server.port).toBe(4000);
    expect(config.render.maxIncludeDepth).toBe(25);
    expect(config.logging.level).toBe('warn');
  });

  it('applies sources in priority order', async () => {
    const loader = new ConfigLoader({
      sources: [
        new StaticSource('high', 20, { server: { port: 2 } }),
        new StaticSource('low', 1, { server: { port: 1, host: '127.0.0.1' } }),
        new StaticSource('off', 30, { server: { port: 3 } }, false),
      ],
    });

    expect(loader.getSourceNames()).toEqual(['low', 'high', 'off']);
    const config = await loader.load();
    expect(config.server).toEqual({ host: '127.0.0.1', port: 2, bodyLimit: 1048576 });
  });

  it('lists validation issues in a ConfigurationError', async () => {
    const loader = new ConfigLoader({ sources: [new StaticSource('bad', 1, { server: { port: 70000 } })] });

    try {
      await loader.load();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toEqual(['server.port: Number must be less than or equal to 65535']);
        expect(error.isOperational).toBe(false);
        expect(error.statusCode).toBe(500);
      }
    }
  });

  it('uses only environment variables without CONFIG_FILE', () => {
    expect(new ConfigLoader({ env: {} }).getSourceNames()).toEqual(['environment']);
  });
});
