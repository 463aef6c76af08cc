/**
 * @fileoverview Layered configuration loading for tierq
 */

import { config as dotenvConfig } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { extname, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  BaseConfigSchema,
  ConfigurationError,
  DEFAULT_PREVIEW_LENGTH,
  DEFAULT_PRIORITY_CLASSES,
  LogLevel,
  LogLevelSchema,
  PriorityClassSetSchema,
  ValidationUtils
} from '@tierq/core';
import type { PriorityClassDefinition } from '@tierq/core';

export const DEFAULT_PROCESS_COUNT = 5;
export const ENV_PREFIX = 'TIERQ_';

/**
 * Dispatcher configuration schema
 */
export const DispatcherConfigSchema = BaseConfigSchema.extend({
  logLevel: LogLevelSchema.default(LogLevel.WARN),
  priorityClasses: PriorityClassSetSchema.default(() => DEFAULT_PRIORITY_CLASSES.map(definition => ({ ...definition }))),
  previewLength: z.number().int().positive().default(DEFAULT_PREVIEW_LENGTH),
  processCount: z.number().int().nonnegative().default(DEFAULT_PROCESS_COUNT)
});

export type DispatcherConfig = z.infer<typeof DispatcherConfigSchema>;

type EnvSource = Record<string, string | undefined>;
type EnvTransform = (value: string) => unknown;

export interface EnvOptions {
  /** Only variables starting with this prefix are read; the prefix is stripped */
  readonly prefix?: string;
  /** Defaults to process.env */
  readonly env?: EnvSource;
  /** Per-key parsers, keyed by the camelCase name */
  readonly transforms?: Readonly<Record<string, EnvTransform>>;
}

export interface LayeredLoadOptions extends EnvOptions {
  /** Optional YAML layer; skipped when the file does not exist */
  readonly yamlFile?: string;
  /** Optional JSON layer; skipped when the file does not exist */
  readonly jsonFile?: string;
  /** Explicit JSON or YAML file; must exist */
  readonly configFile?: string;
}

/**
 * LOG_LEVEL -> logLevel
 */
export function toCamelCase(key: string): string {
  return key
    .toLowerCase()
    .replace(/_+([a-z0-9])/g, (_match, next: string) => next.toUpperCase());
}

/**
 * Parse "1:High,2:Medium,3:Low" into class definitions. Malformed entries are
 * passed through so the schema reports them.
 */
export function parsePriorityClasses(value: string): PriorityClassDefinition[] {
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(entry => {
      const separator = entry.indexOf(':');
      const level = separator === -1 ? entry : entry.slice(0, separator);
      const label = separator === -1 ? '' : entry.slice(separator + 1);
      return { level: Number(level.trim()), label: label.trim() };
    });
}

function coerceEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.trim() !== '' && !isNaN(Number(value))) return Number(value);
  return value;
}

/**
 * Configuration manager class
 */
export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private fileCache = new Map<string, unknown>();

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Collect prefixed environment variables as a camelCase object
   */
  readEnv(options: EnvOptions = {}): Record<string, unknown> {
    const prefix = options.prefix ?? '';
    const env = options.env ?? process.env;
    const result: Record<string, unknown> = {};

    for (const [rawKey, value] of Object.entries(env)) {
      if (value === undefined || !rawKey.startsWith(prefix)) continue;

      const key = toCamelCase(rawKey.slice(prefix.length));
      if (key.length === 0) continue;

      const transform = options.transforms?.[key];
      result[key] = transform ? transform(value) : coerceEnvValue(value);
    }

    return result;
  }

  loadFromEnv<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: EnvOptions = {}): T {
    return ValidationUtils.parseConfig(schema, this.readEnv(options), 'environment variables');
  }

  loadFromJsonFile<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, filePath: string): T {
    return ValidationUtils.parseConfig(schema, this.readFile(filePath, 'json'), filePath);
  }

  loadFromYamlFile<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, filePath: string): T {
    return ValidationUtils.parseConfig(schema, this.readFile(filePath, 'yaml'), filePath);
  }

  /**
   * Merge layers in increasing precedence: schema defaults, YAML file, JSON
   * file, explicit config file, environment. Validates the merged result once.
   */
  loadLayered<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: LayeredLoadOptions = {}): T {
    const sources: string[] = ['defaults'];
    let merged: Record<string, unknown> = {};

    const layer = (data: unknown, source: string): void => {
      if (data === null || data === undefined) return;
      if (typeof data !== 'object' || Array.isArray(data)) {
        throw new ConfigurationError(source, ['root: Expected an object']);
      }
      merged = { ...merged, ...data };
      sources.push(source);
    };

    if (options.yamlFile && existsSync(resolve(options.yamlFile))) {
      layer(this.readFile(options.yamlFile, 'yaml'), options.yamlFile);
    }
    if (options.jsonFile && existsSync(resolve(options.jsonFile))) {
      layer(this.readFile(options.jsonFile, 'json'), options.jsonFile);
    }
    if (options.configFile) {
      layer(this.readFile(options.configFile, formatOf(options.configFile)), options.configFile);
    }

    const envData = this.readEnv(options);
    if (Object.keys(envData).length > 0) {
      layer(envData, 'environment variables');
    }

    return ValidationUtils.parseConfig(schema, merged, sources.join(' + '));
  }

  /**
   * Read and parse a JSON or YAML file. Parsed content is cached by path.
   */
  readFile(filePath: string, format: 'json' | 'yaml'): unknown {
    const absolutePath = resolve(filePath);
    const cacheKey = `${format}:${absolutePath}`;

    if (this.fileCache.has(cacheKey)) {
      return this.fileCache.get(cacheKey);
    }

    let content: string;
    try {
      content = readFileSync(absolutePath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(filePath, [`cannot read file: ${describeError(error)}`]);
    }

    let data: unknown;
    try {
      data = format === 'json' ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      throw new ConfigurationError(filePath, [`invalid ${format.toUpperCase()}: ${describeError(error)}`]);
    }

    this.fileCache.set(cacheKey, data);
    return data;
  }

  clearCache(): void {
    this.fileCache.clear();
  }

  getCachedKeys(): string[] {
    return Array.from(this.fileCache.keys());
  }
}

export function formatOf(filePath: string): 'json' | 'yaml' {
  return extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const configManager = ConfigManager.getInstance();

export interface DispatcherConfigOptions {
  readonly configFile?: string;
  /** Injected environment; when given, .env files are not loaded */
  readonly env?: EnvSource;
  /** Directory searched for config/tierq.yaml and config/tierq.json */
  readonly cwd?: string;
}

/**
 * Load the dispatcher configuration from defaults, config/tierq.yaml,
 * config/tierq.json, an explicit file and TIERQ_* variables.
 */
export function loadDispatcherConfig(options: DispatcherConfigOptions = {}): DispatcherConfig {
  if (!options.env) {
    dotenvConfig();
  }

  const cwd = options.cwd ?? process.cwd();

  return configManager.loadLayered(DispatcherConfigSchema, {
    prefix: ENV_PREFIX,
    env: options.env ?? process.env,
    transforms: {
      priorityClasses: parsePriorityClasses,
      version: value => value
    },
    yamlFile: resolve(cwd, 'config', 'tierq.yaml'),
    jsonFile: resolve(cwd, 'config', 'tierq.json'),
    ...(options.configFile ? { configFile: options.configFile } : {})
  });
}
