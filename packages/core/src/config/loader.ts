/**
 * Configuration Loader for Plugstead
 *
 * Loading order (later overrides earlier):
 * 1. Default values from schema
 * 2. Config file (explicit path or auto-discovered)
 * 3. Environment variables
 * 4. Programmatic overrides
 *
 * Secrets are only ever referenced by environment variable name.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from '@plugstead/shared';

// Checked in order; the first existing file wins
const DEFAULT_CONFIG_PATHS = [
  './plugstead.yaml',
  './plugstead.yml',
  './config/plugstead.yaml',
  '~/.plugstead/config.yaml',
  '/etc/plugstead/config.yaml',
];

export function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(path);
}

function loadConfigFile(path: string): PartialConfig | null {
  const expandedPath = expandPath(path);

  if (!existsSync(expandedPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(expandedPath, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Failed to load config from ${expandedPath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { cause: error }
    );
  }

  // An empty file parses to null
  const result = PartialConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new Error(`Invalid configuration in ${expandedPath}: ${result.error.message}`);
  }
  return result.data;
}

function loadEnvConfig(env: NodeJS.ProcessEnv): PartialConfig {
  const raw: Record<string, Record<string, unknown>> = {};
  const set = (section: string, key: string, value: unknown) => {
    raw[section] = { ...raw[section], [key]: value };
  };

  if (env.PLUGSTEAD_ENV) set('core', 'environment', env.PLUGSTEAD_ENV);
  if (env.PLUGSTEAD_LOG_LEVEL) set('logging', 'level', env.PLUGSTEAD_LOG_LEVEL);
  if (env.PLUGSTEAD_HOST) set('gateway', 'host', env.PLUGSTEAD_HOST);
  if (env.PLUGSTEAD_PORT) {
    const port = parseInt(env.PLUGSTEAD_PORT, 10);
    if (!isNaN(port)) set('gateway', 'port', port);
  }
  if (env.PLUGSTEAD_EXTENSIONS_DIR) set('extensions', 'directory', env.PLUGSTEAD_EXTENSIONS_DIR);
  if (env.PLUGSTEAD_STATIC_ROOT) set('extensions', 'staticRoot', env.PLUGSTEAD_STATIC_ROOT);

  const result = PartialConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid configuration in environment: ${result.error.message}`);
  }
  return result.data;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two config objects. Arrays and scalars from `override` replace
 * those in `base`.
 */
export function mergeConfigs(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const baseValue = result[key];
    result[key] =
      isPlainObject(value) && isPlainObject(baseValue) ? mergeConfigs(baseValue, value) : value;
  }

  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Override config values */
  overrides?: PartialConfig;
  /** Skip environment variable loading */
  skipEnv?: boolean;
  /** Environment to read instead of process.env */
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  let fileConfig: PartialConfig = {};

  if (options.configPath) {
    const loaded = loadConfigFile(options.configPath);
    if (!loaded) {
      throw new Error(`Config file not found: ${options.configPath}`);
    }
    fileConfig = loaded;
  } else {
    for (const path of DEFAULT_CONFIG_PATHS) {
      const loaded = loadConfigFile(path);
      if (loaded) {
        fileConfig = loaded;
        break;
      }
    }
  }

  const envConfig = options.skipEnv ? {} : loadEnvConfig(options.env ?? process.env);

  let merged = mergeConfigs(fileConfig, envConfig);
  if (options.overrides) {
    merged = mergeConfigs(merged, options.overrides);
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}

export function getSecret(envVarName: string): string | undefined {
  return process.env[envVarName];
}

/** Throws if the secret is not set. */
export function requireSecret(envVarName: string): string {
  const value = getSecret(envVarName);
  if (!value) {
    throw new Error(`Required secret not set: ${envVarName}`);
  }
  return value;
}
