/**
 * Configuration loading and validation
 */
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { ConfigError, errorMessage } from '../core/errors.js';
import { isLogLevel, type LogLevel } from '../core/Logger.js';
import { configFileSchema, type DdnsConfig } from './schema.js';
import type { DomainParts } from '../types/index.js';

export const DEFAULT_CONFIG_FILE = 'config.json';

/**
 * Read environment variable with optional default
 */
function getEnv(key: string, defaultValue?: string): string | undefined {
  return process.env[key] ?? defaultValue;
}

/**
 * Read environment variable as boolean
 */
function getEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Pick the config file: explicit path, then DDNS_CONFIG, then ./config.json
 */
export function resolveConfigPath(explicitPath?: string): string {
  return resolve(explicitPath ?? getEnv('DDNS_CONFIG') ?? DEFAULT_CONFIG_FILE);
}

/**
 * Validate a parsed config object
 */
export function parseConfig(raw: unknown, source: string = 'config'): DdnsConfig {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw ConfigError.fromZod(result.error, source);
  }

  const config = result.data;
  // Fail here rather than mid-run if the domain cannot be split
  splitDomain(config.domain, config.rootDomain);
  return Object.freeze(config);
}

/**
 * Load and validate the config file. Throws ConfigError on any problem.
 */
export function loadConfig(path: string): DdnsConfig {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(error)}`, [], { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(error)}`, [], { cause: error });
  }

  return parseConfig(raw, path);
}

/**
 * Split a fully qualified name into the provider's RR (subdomain) and zone.
 *
 * - with rootDomain: `home.lab.example.com` / `example.com` → `home.lab`
 * - two labels: `example.com` → `@` (apex)
 * - otherwise the first label is the subdomain: `sub.example.com` → `sub`
 */
export function splitDomain(domain: string, rootDomain?: string): DomainParts {
  const name = domain.toLowerCase().replace(/\.$/, '');
  const labels = name.split('.');

  if (labels.some((label) => label.length === 0)) {
    throw new ConfigError(`Invalid domain: "${domain}"`, [{ field: 'domain', message: 'Empty label' }]);
  }

  if (rootDomain) {
    const zone = rootDomain.toLowerCase().replace(/\.$/, '');
    if (name === zone) {
      return { subdomain: '@', rootDomain: zone };
    }
    if (name.endsWith(`.${zone}`)) {
      return { subdomain: name.slice(0, -(zone.length + 1)), rootDomain: zone };
    }
    throw new ConfigError(`Domain "${domain}" is not inside root domain "${rootDomain}"`, [
      { field: 'root_domain', message: 'Must be a suffix of domain' },
    ]);
  }

  if (labels.length < 2) {
    throw new ConfigError(`Domain "${domain}" must be fully qualified`, [
      { field: 'domain', message: 'Expected at least two labels' },
    ]);
  }

  if (labels.length === 2) {
    return { subdomain: '@', rootDomain: name };
  }

  const firstDot = name.indexOf('.');
  return { subdomain: name.slice(0, firstDot), rootDomain: name.slice(firstDot + 1) };
}

export interface LogSettings {
  level: LogLevel;
  pretty: boolean;
}

/**
 * Log level and format, with LOG_LEVEL / LOG_PRETTY taking precedence over the file
 */
export function resolveLogSettings(config?: Pick<DdnsConfig, 'logLevel'>): LogSettings {
  const envLevel = getEnv('LOG_LEVEL')?.toLowerCase();
  const level: LogLevel = envLevel && isLogLevel(envLevel) ? envLevel : (config?.logLevel ?? 'info');
  return {
    level,
    pretty: getEnvBool('LOG_PRETTY', true),
  };
}
