/**
 * Configuration Loader
 * @module config/loader
 *
 * Merges configuration sources by priority (defaults, then an optional
 * YAML/JSON file named by DRIFTGUARD_CONFIG, then environment variables)
 * and validates the result against AppConfigSchema.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../errors/index.js';
import { createModuleLogger } from '../logging/logger.js';
import { AppConfig, AppConfigSchema } from './schema.js';

const logger = createModuleLogger('config');

/**
 * Untyped configuration tree; shape is enforced by the schema after merging
 */
export type RawConfig = Record<string, unknown>;

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * Sources are merged lowest priority first
 */
export interface ConfigSource {
  name: string;
  priority: number;
  load(): Promise<RawConfig>;
  isAvailable(): boolean;
}

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Drops undefined leaves and objects left empty
 */
function filterUndefined(value: RawConfig): RawConfig {
  const result: RawConfig = {};
  for (const [key, member] of Object.entries(value)) {
    if (member === undefined) continue;
    if (isRecord(member)) {
      const nested = filterUndefined(member);
      if (Object.keys(nested).length > 0) result[key] = nested;
    } else {
      result[key] = member;
    }
  }
  return result;
}

/**
 * Deep merge with source overwriting target; arrays are replaced
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;
    const targetValue = result[key];
    result[key] = isRecord(sourceValue) && isRecord(targetValue)
      ? deepMerge(targetValue, sourceValue)
      : sourceValue;
  }
  return result;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === 'true' || value === '1';
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}

// ============================================================================
// Environment Variable Source
// ============================================================================

/**
 * Maps environment variables onto the configuration tree
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority = 10;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<RawConfig> {
    const env = this.env;

    return filterUndefined({
      env: env.NODE_ENV,
      server: {
        host: env.HOST,
        port: env.PORT,
        webhookSecret: env.WEBHOOK_SECRET,
      },
      logging: {
        level: env.LOG_LEVEL,
        pretty: parseBoolean(env.LOG_PRETTY),
      },
      controller: {
        namespace: env.DRIFTGUARD_NAMESPACE,
        pollIntervalMs: env.POLL_INTERVAL_MS,
        syncConcurrency: env.SYNC_CONCURRENCY,
        ownershipPolicy: env.OWNERSHIP_POLICY,
        rootApplications: parseList(env.ROOT_APPLICATIONS),
        retry: {
          maxAttempts: env.SYNC_RETRY_MAX_ATTEMPTS,
          delayMs: env.SYNC_RETRY_DELAY_MS,
          backoffMultiplier: env.SYNC_RETRY_BACKOFF_MULTIPLIER,
          maxDelayMs: env.SYNC_RETRY_MAX_DELAY_MS,
        },
        watch: {
          enabled: parseBoolean(env.WATCH_ENABLED),
          restartDelayMs: env.WATCH_RESTART_DELAY_MS,
        },
      },
      source: {
        workDir: env.SOURCE_WORK_DIR,
        gitBinary: env.GIT_BINARY,
        fetchTimeoutMs: env.SOURCE_FETCH_TIMEOUT_MS,
      },
      runtime: {
        type: env.RUNTIME_TYPE,
        name: env.RUNTIME_NAME,
        server: env.RUNTIME_SERVER,
        kubeconfig: env.KUBECONFIG,
        context: env.KUBE_CONTEXT,
      },
      history: {
        store: env.HISTORY_STORE,
        databaseUrl: env.DATABASE_URL,
        maxRunsPerApplication: env.HISTORY_MAX_RUNS,
      },
    });
  }
}

// ============================================================================
// File Source
// ============================================================================

/**
 * YAML or JSON configuration file
 */
export class FileConfigSource implements ConfigSource {
  public readonly name: string;

  constructor(
    private readonly filePath: string,
    public readonly priority = 5
  ) {
    this.name = `file:${filePath}`;
  }

  isAvailable(): boolean {
    return existsSync(this.filePath);
  }

  async load(): Promise<RawConfig> {
    let parsed: unknown;
    try {
      const content = await readFile(this.filePath, 'utf-8');
      parsed = extname(this.filePath) === '.json' ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load configuration file ${this.filePath}: ${getErrorMessage(error)}`,
        [],
        { details: { filePath: this.filePath } }
      );
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(
        `Configuration file ${this.filePath} must contain a mapping`,
        [],
        { details: { filePath: this.filePath } }
      );
    }

    logger.debug({ filePath: this.filePath }, 'Loaded config from file');
    return parsed;
  }
}

// ============================================================================
// Config Loader
// ============================================================================

export interface ConfigLoaderOptions {
  /** Environment to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Replaces the default sources */
  sources?: ConfigSource[];
}

export class ConfigLoader {
  private readonly sources: ConfigSource[];

  constructor(options: ConfigLoaderOptions = {}) {
    const env = options.env ?? process.env;
    this.sources = options.sources ? [...options.sources] : ConfigLoader.defaultSources(env);
    this.sources.sort((a, b) => a.priority - b.priority);
  }

  private static defaultSources(env: NodeJS.ProcessEnv): ConfigSource[] {
    const sources: ConfigSource[] = [new EnvironmentConfigSource(env)];
    if (env.DRIFTGUARD_CONFIG) {
      sources.push(new FileConfigSource(env.DRIFTGUARD_CONFIG));
    }
    return sources;
  }

  /**
   * Merges every available source and validates the result
   */
  async load(): Promise<AppConfig> {
    let merged: RawConfig = {};

    for (const source of this.sources) {
      if (!source.isAvailable()) {
        throw new ConfigurationError(`Configuration source ${source.name} is not available`, [], {
          details: { source: source.name },
        });
      }
      merged = deepMerge(merged, await source.load());
      logger.debug({ source: source.name }, 'Loaded config from source');
    }

    return validateConfig(merged);
  }
}

/**
 * Validates a raw configuration tree, throwing ConfigurationError on failure
 */
export function validateConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(
      `Configuration validation failed:\n${issues.map(i => `  - ${i}`).join('\n')}`,
      issues
    );
  }
  return result.data;
}

export async function loadConfig(options?: ConfigLoaderOptions): Promise<AppConfig> {
  return new ConfigLoader(options).load();
}
