/**
 * Configuration Loader
 *
 * 1. Read config.toml if it exists
 * 2. Validate it against the partial schema
 * 3. Merge it over the defaults (user values win)
 * 4. Validate the merged result against the full schema
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath, getDbPath, expandHome } from './paths.js';
import { ConfigError } from '../errors/index.js';

export interface LoadConfigOptions {
  /** Config file to read (default ~/.cqa/config.toml) */
  configPath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects, with source values overriding target
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;
    const targetValue = target[key];
    result[key] = isRecord(sourceValue) && isRecord(targetValue) ? deepMerge(targetValue, sourceValue) : sourceValue;
  }

  return result;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Load the merged config (defaults + user overrides).
 *
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath = options.configPath ?? getConfigPath();

  if (!fs.existsSync(configPath)) {
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(`Invalid TOML in config file: ${message}`, `Fix the syntax in ${configPath}`);
  }

  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error.issues)}`,
      `Fix ${configPath} or run: cqa config init --force  to restore defaults`
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(structuredClone(DEFAULT_CONFIG), partial.data));
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(merged.error.issues)}`);
  }

  const config = merged.data;
  if (config.chunking.chunk_overlap >= config.chunking.chunk_size) {
    throw new ConfigError(
      `Invalid configuration: chunking.chunk_overlap (${config.chunking.chunk_overlap}) must be smaller than chunking.chunk_size (${config.chunking.chunk_size})`
    );
  }

  return config;
}

/**
 * Write the commented default config file.
 *
 * @returns false when a file already exists and `force` is not set
 */
export function writeDefaultConfig(configPath: string = getConfigPath(), force = false): boolean {
  if (fs.existsSync(configPath) && !force) {
    return false;
  }
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  return true;
}

/**
 * Database file for a loaded config
 */
export function resolveDbPath(config: Config): string {
  const configured = config.storage?.db_path;
  return configured ? expandHome(configured) : getDbPath();
}

/**
 * Get a config value by dot-notation path.
 * Example: getConfigValue(config, 'search.max_results') => 5
 */
export function getConfigValue(config: Config, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Flatten the config into [dot.path, value] pairs
 */
export function listConfig(config: Config): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix: string): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isRecord(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config, '');
  return entries;
}
