import { readFile } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import type { Config, EngineCredentialsConfig, TransportConfig } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { logger } from '../utils/logger.js';
import { isAccessible } from '../utils/fs-utils.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseCredentials(name: string, value: unknown): EngineCredentialsConfig {
  if (!isRecord(value)) {
    throw new Error(`engines.${name} must be an object`);
  }
  const credentials: EngineCredentialsConfig = {};
  for (const [key, secret] of Object.entries(value)) {
    if (typeof secret !== 'string') {
      throw new Error(`engines.${name}.${key} must be a string`);
    }
    credentials[key] = secret;
  }
  return credentials;
}

function parseTransport(value: unknown): TransportConfig {
  if (!isRecord(value)) {
    throw new Error('transport must be an object');
  }
  const transport: TransportConfig = {};
  if (value.timeoutMs !== undefined) {
    if (typeof value.timeoutMs !== 'number' || value.timeoutMs <= 0) {
      throw new Error('transport.timeoutMs must be a positive number');
    }
    transport.timeoutMs = value.timeoutMs;
  }
  if (value.userAgent !== undefined) {
    if (typeof value.userAgent !== 'string') {
      throw new Error('transport.userAgent must be a string');
    }
    transport.userAgent = value.userAgent;
  }
  return transport;
}

/**
 * Check the shape of a parsed config file
 */
export function parseConfig(raw: unknown): Partial<Config> {
  if (!isRecord(raw)) {
    throw new Error('config must be a JSON object');
  }

  const config: Partial<Config> = {};
  if (raw.engine !== undefined) {
    if (typeof raw.engine !== 'string') {
      throw new Error('engine must be a string');
    }
    config.engine = raw.engine;
  }
  if (raw.engines !== undefined) {
    if (!isRecord(raw.engines)) {
      throw new Error('engines must be an object');
    }
    config.engines = {};
    for (const [name, credentials] of Object.entries(raw.engines)) {
      config.engines[name] = parseCredentials(name, credentials);
    }
  }
  if (raw.transport !== undefined) {
    config.transport = parseTransport(raw.transport);
  }
  if (raw.debug !== undefined) {
    if (typeof raw.debug !== 'boolean') {
      throw new Error('debug must be a boolean');
    }
    config.debug = raw.debug;
  }
  return config;
}

/**
 * Load configuration from file
 */
async function loadConfigFile(path: string): Promise<Partial<Config> | null> {
  if (!(await isAccessible(path))) {
    return null;
  }

  try {
    const content = await readFile(path, 'utf-8');
    const config = parseConfig(JSON.parse(content));
    logger.debug(`Loaded config from: ${path}`);
    return config;
  } catch (error) {
    logger.warn(`Failed to parse config file: ${path}`);
    logger.debug(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

/**
 * Merge configurations with precedence. Credentials merge per engine, so a
 * later file can override one engine's secret without restating the rest.
 */
export function mergeConfigs(...configs: Array<Partial<Config> | null>): Config {
  const merged: Config = {
    ...DEFAULT_CONFIG,
    engines: { ...DEFAULT_CONFIG.engines },
    transport: { ...DEFAULT_CONFIG.transport },
  };

  for (const config of configs) {
    if (!config) continue;

    if (config.engine) merged.engine = config.engine;
    if (config.engines) {
      for (const [name, credentials] of Object.entries(config.engines)) {
        merged.engines[name] = { ...merged.engines[name], ...credentials };
      }
    }
    if (config.transport) {
      merged.transport = {
        ...merged.transport,
        ...config.transport,
      };
    }
    if (config.debug !== undefined) merged.debug = config.debug;
  }

  return merged;
}

/**
 * Load configuration with hierarchy:
 * 1. Explicit config file path (highest priority)
 * 2. ~/.config/web-search/config.json
 * 3. ./web-search.json
 * 4. Default config (lowest priority)
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  const configs: Array<Partial<Config> | null> = [];

  // Try local config
  configs.push(await loadConfigFile('./web-search.json'));

  // Try user config
  const userConfigPath = join(homedir(), '.config', 'web-search', 'config.json');
  configs.push(await loadConfigFile(userConfigPath));

  // Try explicit config path (highest priority)
  if (configPath) {
    const explicitConfig = await loadConfigFile(configPath);
    if (!explicitConfig) {
      throw new Error(`Config file not found or invalid: ${configPath}`);
    }
    configs.push(explicitConfig);
  }

  return mergeConfigs(...configs);
}
