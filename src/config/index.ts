/**
 * ClaimScout Configuration File Support
 *
 * Supports:
 * - .claimscoutrc (JSON)
 * - .claimscoutrc.json
 * - claimscout.config.json
 * - package.json "claimscout" field
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigurationError, errorMessage } from '../errors.js';
import { isRecord } from '../manifests/base.js';
import { DEFAULT_REGISTRY_URL } from '../registry/client.js';

export interface RegistryConfig {
  url?: string;
  concurrency?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  backoffFactor?: number;
}

export interface ClaimScoutConfig {
  // Extraction options
  ignorePaths?: string[];
  scriptReferences?: boolean;
  extractionConcurrency?: number;
  label?: string;

  // Verification options
  verify?: boolean;
  registry?: RegistryConfig;

  // Risk heuristics (replace the built-in lists)
  risk?: {
    keywords?: string[];
    popularPackages?: string[];
  };
}

export interface ResolvedSettings {
  ignorePaths: string[];
  scriptReferences: boolean;
  extractionConcurrency: number;
  label?: string;
  verify: boolean;
  registry: Required<RegistryConfig>;
  risk: { keywords?: string[]; popularPackages?: string[] };
}

export const DEFAULT_REGISTRY_SETTINGS: Readonly<Required<RegistryConfig>> = {
  url: DEFAULT_REGISTRY_URL,
  concurrency: 10,
  requestsPerMinute: 1000,
  timeoutMs: 10000,
  maxAttempts: 3,
  retryDelayMs: 1000,
  backoffFactor: 2,
};

const CONFIG_FILES = [
  '.claimscoutrc',
  '.claimscoutrc.json',
  'claimscout.config.json',
];

const PACKAGE_JSON_FIELD = 'claimscout';

/**
 * Load configuration from a specific file. Returns null when the file does
 * not exist; throws ConfigurationError when it cannot be used.
 */
export function loadConfigFromFile(filePath: string): ClaimScoutConfig | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Invalid config file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  return readConfig(raw, filePath);
}

/**
 * Load configuration from package.json "claimscout" field
 */
export function loadConfigFromPackageJson(dir: string): ClaimScoutConfig | null {
  const pkg = readPackageJson(dir);
  if (!pkg || pkg[PACKAGE_JSON_FIELD] === undefined) {
    return null;
  }
  return readConfig(pkg[PACKAGE_JSON_FIELD], `${path.join(dir, 'package.json')} (${PACKAGE_JSON_FIELD} field)`);
}

/**
 * Find and load configuration from the project directory
 * Searches in order: explicit file > config files > package.json
 */
export function loadConfig(dir: string, explicitConfigPath?: string): ClaimScoutConfig | null {
  // 1. Explicit config file takes precedence
  if (explicitConfigPath) {
    const configPath = path.isAbsolute(explicitConfigPath)
      ? explicitConfigPath
      : path.join(dir, explicitConfigPath);
    const config = loadConfigFromFile(configPath);
    if (!config) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    return config;
  }

  // 2. Search for config files in order
  for (const configFile of CONFIG_FILES) {
    const config = loadConfigFromFile(path.join(dir, configFile));
    if (config) {
      return config;
    }
  }

  // 3. Check package.json "claimscout" field
  return loadConfigFromPackageJson(dir);
}

/**
 * Merge configurations (CLI options override config file)
 */
export function mergeConfig(
  fileConfig: ClaimScoutConfig | null,
  cliOptions: ClaimScoutConfig
): ClaimScoutConfig {
  const file = fileConfig ?? {};

  return {
    ignorePaths: cliOptions.ignorePaths ?? file.ignorePaths,
    scriptReferences: cliOptions.scriptReferences ?? file.scriptReferences,
    extractionConcurrency: cliOptions.extractionConcurrency ?? file.extractionConcurrency,
    label: cliOptions.label ?? file.label,
    verify: cliOptions.verify ?? file.verify,
    registry: mergeRegistry(file.registry, cliOptions.registry),
    risk: {
      keywords: cliOptions.risk?.keywords ?? file.risk?.keywords,
      popularPackages: cliOptions.risk?.popularPackages ?? file.risk?.popularPackages,
    },
  };
}

function mergeRegistry(base: RegistryConfig = {}, override: RegistryConfig = {}): RegistryConfig {
  return {
    url: override.url ?? base.url,
    concurrency: override.concurrency ?? base.concurrency,
    requestsPerMinute: override.requestsPerMinute ?? base.requestsPerMinute,
    timeoutMs: override.timeoutMs ?? base.timeoutMs,
    maxAttempts: override.maxAttempts ?? base.maxAttempts,
    retryDelayMs: override.retryDelayMs ?? base.retryDelayMs,
    backoffFactor: override.backoffFactor ?? base.backoffFactor,
  };
}

/**
 * Validate configuration values
 */
export function validateConfig(config: ClaimScoutConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const registry = config.registry ?? {};

  if (registry.url !== undefined && !/^https?:\/\//.test(registry.url)) {
    errors.push(`registry.url must be an http(s) URL: ${registry.url}`);
  }

  // Validate positive integers
  const integers: Array<[string, number | undefined]> = [
    ['registry.concurrency', registry.concurrency],
    ['registry.maxAttempts', registry.maxAttempts],
    ['extractionConcurrency', config.extractionConcurrency],
  ];
  for (const [key, value] of integers) {
    if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
      errors.push(`${key} must be a positive integer`);
    }
  }

  if (registry.timeoutMs !== undefined && !(registry.timeoutMs > 0)) {
    errors.push('registry.timeoutMs must be a positive number');
  }

  if (registry.retryDelayMs !== undefined && !(registry.retryDelayMs >= 0)) {
    errors.push('registry.retryDelayMs must not be negative');
  }

  if (registry.backoffFactor !== undefined && !(registry.backoffFactor >= 1)) {
    errors.push('registry.backoffFactor must be at least 1');
  }

  // requestsPerMinute <= 0 disables throttling, so only NaN is rejected
  if (registry.requestsPerMinute !== undefined && Number.isNaN(registry.requestsPerMinute)) {
    errors.push('registry.requestsPerMinute must be a number');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Fill defaults. Throws ConfigurationError when the config is invalid.
 */
export function resolveSettings(config: ClaimScoutConfig = {}): ResolvedSettings {
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConfigurationError(`Invalid configuration:\n  ${validation.errors.join('\n  ')}`);
  }

  const registry = config.registry ?? {};

  return {
    ignorePaths: config.ignorePaths ?? [],
    scriptReferences: config.scriptReferences ?? true,
    extractionConcurrency: config.extractionConcurrency ?? 10,
    label: config.label,
    verify: config.verify ?? true,
    registry: {
      url: registry.url ?? DEFAULT_REGISTRY_SETTINGS.url,
      concurrency: registry.concurrency ?? DEFAULT_REGISTRY_SETTINGS.concurrency,
      requestsPerMinute: registry.requestsPerMinute ?? DEFAULT_REGISTRY_SETTINGS.requestsPerMinute,
      timeoutMs: registry.timeoutMs ?? DEFAULT_REGISTRY_SETTINGS.timeoutMs,
      maxAttempts: registry.maxAttempts ?? DEFAULT_REGISTRY_SETTINGS.maxAttempts,
      retryDelayMs: registry.retryDelayMs ?? DEFAULT_REGISTRY_SETTINGS.retryDelayMs,
      backoffFactor: registry.backoffFactor ?? DEFAULT_REGISTRY_SETTINGS.backoffFactor,
    },
    risk: {
      keywords: config.risk?.keywords,
      popularPackages: config.risk?.popularPackages,
    },
  };
}

/**
 * Generate a sample configuration file
 */
export function generateSampleConfig(): string {
  const sampleConfig: ClaimScoutConfig = {
    ignorePaths: ['**/vendor/**', '**/dist/**'],
    scriptReferences: true,
    verify: true,
    registry: { ...DEFAULT_REGISTRY_SETTINGS },
  };

  return JSON.stringify(sampleConfig, null, 2);
}

/**
 * Find configuration file path (for reporting)
 */
export function findConfigPath(dir: string): string | null {
  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(dir, configFile);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }

  const pkg = readPackageJson(dir);
  if (pkg && pkg[PACKAGE_JSON_FIELD] !== undefined) {
    return `${path.join(dir, 'package.json')} (${PACKAGE_JSON_FIELD} field)`;
  }

  return null;
}

function readPackageJson(dir: string): Record<string, unknown> | null {
  const pkgPath = path.join(dir, 'package.json');
  if (!fs.existsSync(pkgPath)) {
    return null;
  }

  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    return isRecord(pkg) ? pkg : null;
  } catch {
    // A broken package.json is reported by extraction, not here
    return null;
  }
}

// ============================================================
// Shape checks for untyped JSON
// ============================================================

function readConfig(raw: unknown, source: string): ClaimScoutConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Config in ${source} must be a JSON object`);
  }

  const field = new FieldReader(source);
  const registry = field.section(raw, 'registry');
  const risk = field.section(raw, 'risk');

  return {
    ignorePaths: field.stringArray(raw, 'ignorePaths'),
    scriptReferences: field.boolean(raw, 'scriptReferences'),
    extractionConcurrency: field.number(raw, 'extractionConcurrency'),
    label: field.string(raw, 'label'),
    verify: field.boolean(raw, 'verify'),
    registry: registry && {
      url: field.string(registry, 'url', 'registry.'),
      concurrency: field.number(registry, 'concurrency', 'registry.'),
      requestsPerMinute: field.number(registry, 'requestsPerMinute', 'registry.'),
      timeoutMs: field.number(registry, 'timeoutMs', 'registry.'),
      maxAttempts: field.number(registry, 'maxAttempts', 'registry.'),
      retryDelayMs: field.number(registry, 'retryDelayMs', 'registry.'),
      backoffFactor: field.number(registry, 'backoffFactor', 'registry.'),
    },
    risk: risk && {
      keywords: field.stringArray(risk, 'keywords', 'risk.'),
      popularPackages: field.stringArray(risk, 'popularPackages', 'risk.'),
    },
  };
}

class FieldReader {
  constructor(private readonly source: string) {}

  section(obj: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (!isRecord(value)) throw this.invalid(key, 'an object');
    return value;
  }

  string(obj: Record<string, unknown>, key: string, prefix = ''): string | undefined {
    const value = obj[key];
    if (value === undefined || typeof value === 'string') return value;
    throw this.invalid(prefix + key, 'a string');
  }

  number(obj: Record<string, unknown>, key: string, prefix = ''): number | undefined {
    const value = obj[key];
    if (value === undefined || typeof value === 'number') return value;
    throw this.invalid(prefix + key, 'a number');
  }

  boolean(obj: Record<string, unknown>, key: string, prefix = ''): boolean | undefined {
    const value = obj[key];
    if (value === undefined || typeof value === 'boolean') return value;
    throw this.invalid(prefix + key, 'a boolean');
  }

  stringArray(obj: Record<string, unknown>, key: string, prefix = ''): string[] | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value)) throw this.invalid(prefix + key, 'an array of strings');

    const strings: string[] = [];
    for (const item of value) {
      if (typeof item !== 'string') throw this.invalid(prefix + key, 'an array of strings');
      strings.push(item);
    }
    return strings;
  }

  private invalid(key: string, expected: string): ConfigurationError {
    return new ConfigurationError(`Invalid config in ${this.source}: ${key} must be ${expected}`);
  }
}
