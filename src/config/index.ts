/**
 * Configuration
 * @module config
 *
 * Loads the configuration once per process. Call initConfig() at startup;
 * getConfig() afterwards.
 */

import { ConfigurationError } from '../errors/index.js';
import { ConfigLoaderOptions, loadConfig } from './loader.js';
import type { AppConfig } from './schema.js';

export * from './schema.js';
export * from './loader.js';

let configInstance: AppConfig | null = null;

export async function initConfig(options?: ConfigLoaderOptions): Promise<AppConfig> {
  if (configInstance) {
    return configInstance;
  }
  configInstance = await loadConfig(options);
  return configInstance;
}

export function getConfig(): AppConfig {
  if (!configInstance) {
    throw new ConfigurationError('Configuration not loaded. Call initConfig() first.');
  }
  return configInstance;
}

/**
 * Clears the loaded configuration (for tests)
 */
export function resetConfig(): void {
  configInstance = null;
}
