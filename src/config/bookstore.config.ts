// ============================================================
// Bookstore API Tests — Configuration Resolver
// defaults → config.properties → config-<env>.properties → process overrides
// ============================================================

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { ConfigurationError } from '../framework/errors.js';
import { createLogger, type Logger } from '../framework/helpers/log.helper.js';
import {
  BookstoreConfigSchema,
  CONFIG_KEYS,
  type BookstoreConfig,
  type ConfigKey,
} from '../types/index.js';

export const CONFIG_DIR_ENV = 'BOOKSTORE_CONFIG_DIR';
export const DEFAULT_ENVIRONMENT = 'dev';

const DEFAULT_PROPERTIES: Record<ConfigKey, string> = {
  'api.base.url': 'https://fakerestapi.azurewebsites.net',
  'api.version': 'v1',
  'api.request.timeout': '30000',
  'api.connection.timeout': '10000',
  'test.environment': DEFAULT_ENVIRONMENT,
  'test.logging.enabled': 'true',
  'test.report.path': 'test-output/reports',
  'debug.mode': 'false',
};

export interface ConfigResolverOptions {
  /** Directory holding config.properties and its overlays; defaults to $BOOKSTORE_CONFIG_DIR, then ./config */
  configDir?: string;
  /** Overlay selector; falls back to $ENV, then "dev" */
  env?: string;
  /** Highest-precedence layer, applied after environment variables */
  overrides?: Record<string, string>;
  processEnv?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export interface ConfigLayer {
  source: string;
  properties: Record<string, string>;
}

/** `api.base.url` → `API_BASE_URL` */
export function envVarName(key: string): string {
  return key.replace(/[.-]/g, '_').toUpperCase();
}

export function readPropertiesFile(filePath: string, logger: Logger): Record<string, string> | null {
  if (!fs.existsSync(filePath)) {
    logger.warn(`Properties file not found: ${filePath}`);
    return null;
  }
  const parsed = dotenv.parse(fs.readFileSync(filePath));
  logger.debug(`Loaded properties from: ${filePath}`);
  return parsed;
}

/** Picks recognised keys out of the process environment, by dotted or upper-snake name. */
export function processOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[key] ?? env[envVarName(key)];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** Key-wise merge; a key in a later layer always wins. */
export function mergeLayers(layers: ConfigLayer[]): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const layer of layers) Object.assign(merged, layer.properties);
  return merged;
}

function parseInteger(properties: Record<string, string>, key: ConfigKey): number {
  const raw = (properties[key] ?? DEFAULT_PROPERTIES[key]).trim();
  if (!/^[+-]?\d+$/.test(raw)) {
    throw new ConfigurationError(`Invalid integer for '${key}': '${raw}'`, key);
  }
  return Number.parseInt(raw, 10);
}

function parseBoolean(properties: Record<string, string>, key: ConfigKey): boolean {
  return (properties[key] ?? DEFAULT_PROPERTIES[key]).trim().toLowerCase() === 'true';
}

function text(properties: Record<string, string>, key: ConfigKey): string {
  return (properties[key] ?? DEFAULT_PROPERTIES[key]).trim();
}

/** Builds the frozen snapshot from merged properties; throws ConfigurationError on bad values. */
export function buildConfig(properties: Record<string, string>): BookstoreConfig {
  const result = BookstoreConfigSchema.safeParse({
    baseUrl: text(properties, 'api.base.url').replace(/\/+$/, ''),
    apiVersion: text(properties, 'api.version'),
    requestTimeout: parseInteger(properties, 'api.request.timeout'),
    connectionTimeout: parseInteger(properties, 'api.connection.timeout'),
    environment: text(properties, 'test.environment'),
    loggingEnabled: parseBoolean(properties, 'test.logging.enabled'),
    reportPath: text(properties, 'test.report.path'),
    debugMode: parseBoolean(properties, 'debug.mode'),
  });

  if (!result.success) {
    const invalid = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new ConfigurationError(`Configuration validation failed. Invalid: ${invalid}`);
  }

  const settings = result.data;
  const apiBaseUrl = `${settings.baseUrl}/api/${settings.apiVersion}`;
  const frozenProperties = Object.freeze({ ...properties });

  return Object.freeze({
    ...settings,
    apiBaseUrl,
    booksEndpoint: `${apiBaseUrl}/Books`,
    authorsEndpoint: `${apiBaseUrl}/Authors`,
    properties: frozenProperties,
    getProperty(key: string, defaultValue?: string): string | undefined {
      return frozenProperties[key] ?? defaultValue;
    },
  });
}

export class ConfigResolver {
  private snapshot: BookstoreConfig | undefined;
  private readonly logger: Logger;

  constructor(private readonly options: ConfigResolverOptions = {}) {
    this.logger = options.logger ?? createLogger('Config');
  }

  /**
   * Resolves on first call and returns the same frozen object afterwards.
   * Resolution is synchronous, so no caller can observe a half-built snapshot.
   */
  resolve(): BookstoreConfig {
    if (!this.snapshot) {
      this.snapshot = buildConfig(mergeLayers(this.layers()));
      this.logger.info(`Configuration loaded for environment: ${this.snapshot.environment}`);
    }
    return this.snapshot;
  }

  layers(): ConfigLayer[] {
    const processEnv = this.options.processEnv ?? process.env;
    const configDir = path.resolve(this.options.configDir ?? processEnv[CONFIG_DIR_ENV] ?? 'config');
    const env = this.options.env ?? processEnv['ENV'] ?? DEFAULT_ENVIRONMENT;

    const layers: ConfigLayer[] = [{ source: 'defaults', properties: { ...DEFAULT_PROPERTIES } }];
    for (const fileName of ['config.properties', `config-${env}.properties`]) {
      const filePath = path.join(configDir, fileName);
      const properties = readPropertiesFile(filePath, this.logger);
      if (properties) layers.push({ source: filePath, properties });
    }
    layers.push({ source: 'environment', properties: processOverrides(processEnv) });
    if (this.options.overrides) {
      layers.push({ source: 'overrides', properties: { ...this.options.overrides } });
    }
    return layers;
  }
}

const defaultResolver = new ConfigResolver();

/** Process-wide configuration, resolved on first use. */
export function resolveConfig(): BookstoreConfig {
  return defaultResolver.resolve();
}
