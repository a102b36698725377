/**
 * cvekit Configuration
 *
 * Credentials and connection settings are merged from, lowest to highest
 * precedence:
 * - .cvekitrc / .cvekitrc.json (JSON), or package.json "cvekit" field
 * - environment variables (CVE_USER, CVE_ORG, CVE_API_KEY, CVE_ENVIRONMENT, CVE_API_URL)
 * - command-line options
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { CVE_ENVIRONMENTS, DEFAULT_ENVIRONMENT, isCveEnvironment } from '../api/client.js';
import type { CveApiOptions } from '../api/client.js';
import { CveConfigurationError } from '../errors.js';
import { isJsonObject } from '../record/extract.js';
import type { ProcessEnv } from '../record/augment.js';
import type { JsonObject } from '../types.js';

export interface CvekitConfig {
  username?: string;
  org?: string;
  apiKey?: string;
  env?: string;
  url?: string;
  /** Request timeout in ms */
  timeout?: number;
}

export const CONFIG_FILES = ['.cvekitrc', '.cvekitrc.json'];

/** Environment variable for each setting */
export const CONFIG_ENV_VARS = {
  username: 'CVE_USER',
  org: 'CVE_ORG',
  apiKey: 'CVE_API_KEY',
  env: 'CVE_ENVIRONMENT',
  url: 'CVE_API_URL',
} as const;

function readString(obj: JsonObject, key: string, source: string): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new CveConfigurationError(`${source}: "${key}" must be a string`);
  }
  return value;
}

function parseConfigObject(raw: unknown, source: string): CvekitConfig {
  if (!isJsonObject(raw)) {
    throw new CveConfigurationError(`${source}: configuration must be a JSON object`);
  }

  const timeout = raw.timeout;
  if (timeout !== undefined && typeof timeout !== 'number') {
    throw new CveConfigurationError(`${source}: "timeout" must be a number`);
  }

  return dropUndefined({
    username: readString(raw, 'username', source),
    org: readString(raw, 'org', source),
    apiKey: readString(raw, 'apiKey', source),
    env: readString(raw, 'env', source),
    url: readString(raw, 'url', source),
    timeout,
  });
}

function dropUndefined(config: CvekitConfig): CvekitConfig {
  const out: CvekitConfig = {};
  for (const [key, value] of Object.entries(config)) {
    if (value !== undefined) {
      Reflect.set(out, key, value);
    }
  }
  return out;
}

function readJson(filePath: string): unknown {
  const content = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CveConfigurationError(`${filePath}: invalid JSON (${reason})`);
  }
}

/**
 * Load configuration from a JSON file; null when the file does not exist
 */
export function loadConfigFromFile(filePath: string): CvekitConfig | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  return parseConfigObject(readJson(filePath), filePath);
}

/**
 * Load configuration from package.json "cvekit" field
 */
export function loadConfigFromPackageJson(dir: string): CvekitConfig | null {
  const pkgPath = path.join(dir, 'package.json');
  if (!fs.existsSync(pkgPath)) {
    return null;
  }

  const pkg = readJson(pkgPath);
  if (!isJsonObject(pkg) || pkg.cvekit === undefined) {
    return null;
  }
  return parseConfigObject(pkg.cvekit, `${pkgPath} (cvekit field)`);
}

/**
 * Find and load configuration from a directory.
 * Searches in order: explicit file > config files > package.json
 */
export function loadConfig(dir: string, explicitConfigPath?: string): CvekitConfig | null {
  if (explicitConfigPath) {
    const configPath = path.isAbsolute(explicitConfigPath)
      ? explicitConfigPath
      : path.join(dir, explicitConfigPath);
    const config = loadConfigFromFile(configPath);
    if (!config) {
      throw new CveConfigurationError(`Config file not found: ${configPath}`);
    }
    return config;
  }

  for (const configFile of CONFIG_FILES) {
    const config = loadConfigFromFile(path.join(dir, configFile));
    if (config) {
      return config;
    }
  }

  return loadConfigFromPackageJson(dir);
}

/**
 * Settings taken from CVE_* environment variables. Empty values count as unset.
 */
export function configFromEnv(env: ProcessEnv = process.env): CvekitConfig {
  const config: CvekitConfig = {};
  for (const [key, name] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[name];
    if (value) {
      Reflect.set(config, key, value);
    }
  }
  return config;
}

/**
 * Merge configuration layers; later layers override earlier ones for every
 * setting they define.
 */
export function mergeConfig(...layers: Array<CvekitConfig | null | undefined>): CvekitConfig {
  const merged: CvekitConfig = {};
  for (const layer of layers) {
    if (layer) {
      Object.assign(merged, dropUndefined(layer));
    }
  }
  return merged;
}

/**
 * Validate configuration
 */
export function validateConfig(config: CvekitConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.username) {
    errors.push(`Missing username (--username or ${CONFIG_ENV_VARS.username})`);
  }
  if (!config.org) {
    errors.push(`Missing organization short name (--org or ${CONFIG_ENV_VARS.org})`);
  }
  if (!config.apiKey) {
    errors.push(`Missing API key (--api-key or ${CONFIG_ENV_VARS.apiKey})`);
  }

  const env = config.env ?? DEFAULT_ENVIRONMENT;
  if (!config.url && !isCveEnvironment(env)) {
    errors.push(`Invalid env: ${env}. Valid options: ${Object.keys(CVE_ENVIRONMENTS).join(', ')}`);
  }

  if (config.timeout !== undefined && !(config.timeout > 0)) {
    errors.push('timeout must be a positive number');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Client options from a complete configuration
 */
export function toClientOptions(config: CvekitConfig): CveApiOptions {
  const { errors } = validateConfig(config);
  const { username, org, apiKey } = config;
  if (errors.length > 0 || !username || !org || !apiKey) {
    throw new CveConfigurationError(errors.join('\n'));
  }
  return {
    username,
    org,
    apiKey,
    env: config.env,
    url: config.url,
    timeout: config.timeout,
  };
}
