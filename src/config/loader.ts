/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the app directory (~/.sectionpick or $SECTIONPICK_HOME)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getAppDir, getConfigPath } from './paths.js';
import { ConfigError, formatZodIssues } from '../errors/index.js';

type ConfigValue = string | number | boolean;

function ensureAppDir(): void {
  fs.mkdirSync(getAppDir(), { recursive: true });
}

function isJsonMap(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Overlay user values section by section.
 */
export function mergeConfig(base: Config, overrides: PartialConfig): Config {
  return {
    layout: { ...base.layout, ...overrides.layout },
    theme: { ...base.theme, ...overrides.theme },
    text: { ...base.text, ...overrides.text },
    keys: { ...base.keys, ...overrides.keys },
  };
}

function readConfigFile(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: sectionpick config reset --force`
    );
  }
}

/**
 * Validate raw file content and merge it over the defaults.
 */
function resolveConfig(raw: unknown, describe: string): Config {
  const partial = PartialConfigSchema.safeParse(raw);
  if (!partial.success) {
    throw new ConfigError(
      `${describe}:\n${formatZodIssues(partial.error.issues).map((line) => `  - ${line}`).join('\n')}`
    );
  }

  const merged = mergeConfig(DEFAULT_CONFIG, partial.data);
  const full = ConfigSchema.safeParse(merged);
  if (!full.success) {
    throw new ConfigError(
      `${describe}:\n${formatZodIssues(full.error.issues).map((line) => `  - ${line}`).join('\n')}`
    );
  }

  return full.data;
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the commented template on first run
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(createIfMissing: boolean = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureAppDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  return resolveConfig(readConfigFile(configPath), 'Invalid configuration');
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('layout.items_per_page') => 10
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();
  for (const part of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Parse a command-line string into a boolean, number or string.
 */
export function parseConfigValue(value: string): ConfigValue {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a specific config value by dot-notation path
 * Validates the resulting config, then writes the change back to the file
 */
export function setConfigValue(key: string, value: string): void {
  const parts = key.split('.');
  const leaf = parts.pop();
  if (!leaf || parts.some((part) => part === '')) {
    throw new ConfigError(`Invalid config key: '${key}'`);
  }

  const configPath = getConfigPath();
  const config: TOML.JsonMap = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[leaf] = parseConfigValue(value);

  resolveConfig(config, `Invalid value for '${key}'`);

  ensureAppDir();
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Replace the config file with the default template.
 */
export function resetConfig(): void {
  ensureAppDir();
  fs.writeFileSync(getConfigPath(), CONFIG_TEMPLATE, 'utf-8');
}

/**
 * List all config values in a flat format
 * Returns entries like ['layout.items_per_page', 10]
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix: string): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isRecord(value)) {
        flatten(value, fullKey);
      } else if (value !== undefined) {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig(), '');
  return entries;
}
