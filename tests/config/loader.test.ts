/**
 * Configuration Loader Tests
 * @module tests/config/loader
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ConfigLoader,
  EnvironmentConfigSource,
  FileConfigSource,
  deepMerge,
  getConfig,
  initConfig,
  resetConfig,
  validateConfig,
} from '../../src/config/index.js';
import { ConfigurationError } from '../../src/errors/index.js';

describe('validateConfig', () => {
  it('should fill defaults', () => {
    const config = validateConfig({});

    expect(config.env).toBe('development');
    expect(config.server).toEqual({ host: '0.0.0.0', port: 8080 });
    expect(config.controller.namespace).toBe('driftguard');
    expect(config.controller.pollIntervalMs).toBe(180000);
    expect(config.controller.ownershipPolicy).toBe('first-writer-wins');
    expect(config.controller.retry).toEqual({ maxAttempts: 3, delayMs: 500, backoffMultiplier: 2, maxDelayMs: 30000 });
    expect(config.runtime.type).toBe('kubernetes');
    expect(config.history).toEqual({ store: 'memory', maxRunsPerApplication: 50 });
  });

  it('should coerce numeric strings', () => {
    const config = validateConfig({ server: { port: '9090' }, controller: { syncConcurrency: '8' } });

    expect(config.server.port).toBe(9090);
    expect(config.controller.syncConcurrency).toBe(8);
  });

  it('should require a database URL for the postgres store', () => {
    let caught: unknown;
    try {
      validateConfig({ history: { store: 'postgres' } });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError && caught.issues).toEqual([
      'history.databaseUrl: databaseUrl is required when history.store is postgres',
    ]);
  });

  it('should report every invalid field', () => {
    expect(() => validateConfig({ server: { port: 70000 }, runtime: { type: 'docker' } })).toThrow(
      /Configuration validation failed:\n {2}- server\.port: .*\n {2}- runtime\.type: /
    );
  });
});

describe('deepMerge', () => {
  it('should merge nested objects and replace arrays', () => {
    const merged = deepMerge(
      { controller: { namespace: 'a', rootApplications: ['x.yaml'] }, env: 'test' },
      { controller: { rootApplications: ['y.yaml'] }, env: undefined }
    );

    expect(merged).toEqual({ controller: { namespace: 'a', rootApplications: ['y.yaml'] }, env: 'test' });
  });
});

describe('EnvironmentConfigSource', () => {
  it('should map set variables only', async () => {
    const source = new EnvironmentConfigSource({
      PORT: '9090',
      LOG_PRETTY: 'true',
      ROOT_APPLICATIONS: 'apps/root.yaml, apps/extra.yaml,',
      WATCH_ENABLED: '0',
    });

    expect(await source.load()).toEqual({
      server: { port: '9090' },
      logging: { pretty: true },
      controller: {
        rootApplications: ['apps/root.yaml', 'apps/extra.yaml'],
        watch: { enabled: false },
      },
    });
  });
});

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'driftguard-config-'));
  });

  afterEach(async () => {
    resetConfig();
    await rm(dir, { recursive: true, force: true });
  });

  it('should let the environment override the file', async () => {
    const file = join(dir, 'config.yaml');
    await writeFile(file, 'server:\n  port: 7000\ncontroller:\n  namespace: ops\n', 'utf-8');

    const config = await new ConfigLoader({ env: { DRIFTGUARD_CONFIG: file, PORT: '9090' } }).load();

    expect(config.server.port).toBe(9090);
    expect(config.controller.namespace).toBe('ops');
  });

  it('should read JSON files', async () => {
    const file = join(dir, 'config.json');
    await writeFile(file, JSON.stringify({ runtime: { type: 'memory', name: 'local' } }), 'utf-8');

    const config = await new ConfigLoader({ sources: [new FileConfigSource(file)] }).load();

    expect(config.runtime).toEqual({ type: 'memory', name: 'local' });
  });

  it('should fail on a missing file', async () => {
    const file = join(dir, 'absent.yaml');

    await expect(new ConfigLoader({ env: { DRIFTGUARD_CONFIG: file } }).load()).rejects.toThrow(
      `Configuration source file:${file} is not available`
    );
  });

  it('should fail on a file that is not a mapping', async () => {
    const file = join(dir, 'list.yaml');
    await writeFile(file, '- a\n- b\n', 'utf-8');

    await expect(new FileConfigSource(file).load()).rejects.toThrow(
      `Configuration file ${file} must contain a mapping`
    );
  });

  it('should load once through initConfig', async () => {
    expect(() => getConfig()).toThrow('Configuration not loaded. Call initConfig() first.');

    const first = await initConfig({ env: { PORT: '9191' } });
    const second = await initConfig({ env: { PORT: '9292' } });

    expect(second).toBe(first);
    expect(getConfig().server.port).toBe(9191);
  });
});
