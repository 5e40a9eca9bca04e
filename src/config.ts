/**
 * Site configuration.
 *
 * Loads lodbook.config.json (or the file named by LODBOOK_CONFIG) and
 * provides typed access to its values.
 */

import fs from 'fs-extra';
import path from 'node:path';
import { ConfigError } from './errors.js';
import { GraphValue, LodContext, SiteSettings, TypeConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = 'lodbook.config.json';

export interface CollectionStyle {
  name: string;
  color: string;
}

export interface DataSourceConfig {
  /** Data file, relative to the project root (.yml, .yaml, .json or .jsonld) */
  data: string;
  /** Overrides the data file's own context */
  context?: LodContext;
}

export interface LodbookConfig extends SiteSettings {
  /** Directory holding the config file; relative paths start here */
  rootDir: string;
  source: DataSourceConfig;
  dataTypes: Record<string, TypeConfig>;
  collections: CollectionStyle[];
  /** Narrative markdown directory */
  contentDir: string;
  outputDir: string;
  port: number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(raw: Record<string, unknown>, key: string, where: string): string {
  const value = raw[key];
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalString(raw: Record<string, unknown>, key: string, fallback: string): string {
  const value = raw[key];
  return typeof value === 'string' ? value : fallback;
}

function parseContext(value: unknown): LodContext | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (isObject(value)) return contextFromObject(value);
  throw new ConfigError('source.context must be a URL or an object');
}

function contextFromObject(raw: Record<string, unknown>): LodContext {
  const context: { [key: string]: GraphValue } = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || value === null) {
      context[key] = value;
    } else if (isObject(value)) {
      context[key] = contextFromObject(value);
    } else {
      throw new ConfigError(`source.context.${key} must be a string, null or an object`);
    }
  }
  return context;
}

function parseDataTypes(value: unknown): Record<string, TypeConfig> {
  if (!isObject(value)) {
    throw new ConfigError('dataTypes must be an object');
  }
  const types: Record<string, TypeConfig> = {};
  for (const [tag, raw] of Object.entries(value)) {
    if (!isObject(raw)) {
      throw new ConfigError(`dataTypes.${tag} must be an object`);
    }
    const type = requireString(raw, 'type', `dataTypes.${tag}`);
    types[tag] = {
      type,
      collection: optionalString(raw, 'collection', tag),
      template: optionalString(raw, 'template', tag)
    };
  }
  return types;
}

function parseCollections(value: unknown): CollectionStyle[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new ConfigError('collections must be an array');
  }
  return value.map((raw, index) => {
    if (!isObject(raw)) {
      throw new ConfigError(`collections[${index}] must be an object`);
    }
    return {
      name: requireString(raw, 'name', `collections[${index}]`),
      color: requireString(raw, 'color', `collections[${index}]`)
    };
  });
}

/**
 * Validate a parsed config file.
 */
export function parseConfig(raw: unknown, rootDir: string): LodbookConfig {
  if (!isObject(raw)) {
    throw new ConfigError('Config must be a JSON object');
  }
  const source = raw['source'];
  if (!isObject(source)) {
    throw new ConfigError('source must be an object');
  }

  const baseUrl = optionalString(raw, 'baseUrl', '').replace(/\/+$/, '');
  const port = raw['port'];

  const config: LodbookConfig = {
    rootDir,
    url: requireString(raw, 'url', 'config').replace(/\/+$/, ''),
    baseUrl,
    source: { data: requireString(source, 'data', 'source') },
    dataTypes: parseDataTypes(raw['dataTypes']),
    collections: parseCollections(raw['collections']),
    contentDir: optionalString(raw, 'contentDir', 'chapters'),
    outputDir: optionalString(raw, 'outputDir', '_site'),
    port: Number(process.env.PORT ?? (typeof port === 'number' ? port : 4000))
  };

  const context = parseContext(source['context']);
  if (context !== undefined) {
    config.source.context = context;
  }
  return config;
}

/**
 * Load configuration from file.
 */
export async function loadConfig(configPath?: string): Promise<LodbookConfig> {
  const file = path.resolve(configPath ?? process.env.LODBOOK_CONFIG ?? DEFAULT_CONFIG_FILE);

  let raw: unknown;
  try {
    raw = await fs.readJson(file);
  } catch (err) {
    throw new ConfigError(`Cannot read config ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const config = parseConfig(raw, path.dirname(file));
  console.log(`Loaded config from ${path.basename(file)}`);
  return config;
}

/**
 * Resolve a config path against the project root.
 */
export function resolvePath(config: LodbookConfig, relative: string): string {
  return path.resolve(config.rootDir, relative);
}
