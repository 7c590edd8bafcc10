/**
 * YAML Configuration Loader
 * ==========================
 * Loads configuration from tradelab.yaml with fallback to environment variables
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { logger } from '../logger.js';

export interface AppConfig {
  backtest?: Record<string, unknown>;
  metrics?: Record<string, unknown>;
  data?: {
    dir?: string;
    cacheTtlMs?: number;
  };
  [key: string]: unknown;
}

let cachedConfig: AppConfig | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Load configuration from tradelab.yaml
 */
export function loadConfigFromYaml(configPath?: string): AppConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const defaultPath = configPath || join(process.cwd(), 'tradelab.yaml');

  if (!existsSync(defaultPath)) {
    logger.debug('tradelab.yaml not found, using environment variables only');
    cachedConfig = {};
    return cachedConfig;
  }

  try {
    const content = readFileSync(defaultPath, 'utf-8');
    const parsed: unknown = load(content);
    cachedConfig = isRecord(parsed) ? parsed : {};
    logger.info('Loaded configuration from tradelab.yaml', { path: defaultPath });
    return cachedConfig;
  } catch (error) {
    logger.warn('Failed to load tradelab.yaml, using environment variables only', {
      path: defaultPath,
      error: error instanceof Error ? error.message : String(error),
    });
    cachedConfig = {};
    return cachedConfig;
  }
}

/**
 * Get a top-level section of the YAML config, or an empty record
 */
export function getConfigSection(section: string, configPath?: string): Record<string, unknown> {
  const value = loadConfigFromYaml(configPath)[section];
  return isRecord(value) ? value : {};
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
