/**
 * Configuration loader
 *
 * Per-application YAML configuration:
 *   defaults (object, then bundled defaults file) < user config file < environment
 *
 * The user file lives at ~/.config/<app>/config.yaml (or under
 * $XDG_CONFIG_HOME) and is created from the defaults on first load.
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { homedir } from 'node:os';
import { parse, stringify } from 'yaml';
import { APP_ENV_SUFFIXES, envPrefix } from '../cli/env.js';
import { configError, errorMessage } from '../cli/errors.js';
import { Model, toPlain } from '../model/model.js';
import { validateConfig, type ConfigSchema } from './validator.js';

const CONFIG_FILE = 'config.yaml';

const RESERVED_SUFFIXES: readonly string[] = Object.values(APP_ENV_SUFFIXES);

/**
 * A configuration mapping: arbitrary nested key/value pairs
 */
export type ConfigValues = Record<string, unknown>;

export interface ConfigOptions {
  /** Explicit config file; overrides the per-application location */
  configFile?: string;
  /** Directory holding config.yaml (default: getDefaultConfigDir(appName)) */
  configDir?: string;
  /** Default values */
  defaults?: ConfigValues;
  /** YAML file with default values, merged over `defaults` */
  defaultsFile?: string;
  /** Prefix of override variables; false disables overrides (default: envPrefix(appName)) */
  envPrefix?: string | false;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** JSON schema the effective configuration must satisfy */
  schema?: ConfigSchema;
  /** Do not write the defaults when the user file is missing */
  readOnly?: boolean;
}

function isMapping(value: unknown): value is ConfigValues {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Plain deep copy; models become dicts
 */
function copyValues(config: ConfigValues): ConfigValues {
  const copy = toPlain(config);
  return isMapping(copy) ? copy : {};
}

/**
 * Copy of a mapping without null values, which mark deleted keys
 */
function withoutNulls(config: ConfigValues): ConfigValues {
  const result: ConfigValues = {};
  for (const [key, value] of Object.entries(config)) {
    if (value === null) continue;
    result[key] = isMapping(value) ? withoutNulls(value) : value;
  }
  return result;
}

/**
 * ~/.config/<app>, honouring XDG_CONFIG_HOME
 */
export function getDefaultConfigDir(appName: string): string {
  const base = process.env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, appName);
}

/**
 * Load a YAML mapping from a file.
 * Returns an empty object if the file doesn't exist or is empty.
 */
export function loadConfigFile(filePath: string): ConfigValues {
  if (!existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw configError(`Failed to parse config at ${filePath}: ${errorMessage(error)}`, { path: filePath });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isMapping(parsed)) {
    throw configError(`Config at ${filePath} must be a mapping of keys to values`, { path: filePath });
  }
  return parsed;
}

/**
 * Write a mapping as YAML, creating the directory if needed
 */
export function saveConfigFile(config: ConfigValues, filePath: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(filePath, stringify(config, { indent: 2 }), 'utf-8');
}

/**
 * Deep merge two config objects; values of the second win
 */
export function mergeConfigs(base: ConfigValues, override: ConfigValues): ConfigValues {
  const result: ConfigValues = { ...base };

  for (const [key, overrideValue] of Object.entries(override)) {
    // undefined never overrides; null, false, 0 and '' do
    if (overrideValue === undefined) {
      continue;
    }

    const baseValue = base[key];
    if (isMapping(baseValue) && isMapping(overrideValue)) {
      result[key] = mergeConfigs(baseValue, overrideValue);
    } else {
      result[key] = overrideValue;
    }
  }

  return result;
}

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[_-]/g, '');
}

/**
 * Convert an environment string: 'true'/'false' to booleans, numeric strings to numbers
 */
export function coerceEnvValue(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.trim() !== '' && !isNaN(Number(value))) return Number(value);
  return value;
}

/**
 * Apply environment variable overrides.
 *
 * `<PREFIX>_SERVER` -> `server`; `__` separates nesting levels
 * (`<PREFIX>_DB__HOST_NAME` -> `db.hostName` when that key exists). Segments
 * match existing keys ignoring case, `_` and `-`; unknown segments become
 * lower-cased keys. The application's own variables (`<PREFIX>_CONFIG`,
 * `<PREFIX>_QUIET`, ...) are not configuration values and are skipped.
 */
export function applyEnvOverrides(
  config: ConfigValues,
  prefix: string,
  env: NodeJS.ProcessEnv = process.env
): ConfigValues {
  const result = copyValues(config);
  const start = `${prefix}_`;

  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(start) || value === undefined) continue;

    const segments = name.slice(start.length).split('__').filter(Boolean);
    if (segments.length === 0) continue;
    if (segments.length === 1 && RESERVED_SUFFIXES.includes(segments[0])) continue;

    let current = result;
    for (let i = 0; i < segments.length; i++) {
      const wanted = normalizeKey(segments[i]);
      const key = Object.keys(current).find((k) => normalizeKey(k) === wanted) ?? segments[i].toLowerCase();

      if (i === segments.length - 1) {
        current[key] = coerceEnvValue(value);
        break;
      }

      const next = current[key];
      if (isMapping(next)) {
        current = next;
      } else {
        const created: ConfigValues = {};
        current[key] = created;
        current = created;
      }
    }
  }

  return result;
}

/**
 * Get a value by dot-notation path, e.g. 'db.host'
 */
export function getConfigValue(config: ConfigValues, path: string): unknown {
  let current: unknown = config;

  for (const part of path.split('.')) {
    if (!isMapping(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Return a copy of the config with the value set at a dot-notation path
 */
export function setConfigValue(config: ConfigValues, path: string, value: unknown): ConfigValues {
  const result = copyValues(config);
  const parts = path.split('.');
  let current = result;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isMapping(next)) {
      current = next;
    } else {
      const created: ConfigValues = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = toPlain(value);
  return result;
}

/**
 * Return a copy of the config without the value at a dot-notation path
 */
export function deleteConfigValue(config: ConfigValues, path: string): ConfigValues {
  const result = copyValues(config);
  const parts = path.split('.');
  let current: unknown = result;

  for (const part of parts.slice(0, -1)) {
    if (!isMapping(current)) {
      return result;
    }
    current = current[part];
  }

  if (isMapping(current)) {
    delete current[parts[parts.length - 1]];
  }
  return result;
}

/**
 * Configuration of one application
 */
export class Config {
  readonly appName: string;
  readonly configFilePath: string;
  readonly configDir: string;
  private readonly options: ConfigOptions;
  /** Defaults from the options and the defaults file */
  private defaults: ConfigValues = {};
  /** Defaults merged with the user file; what save() writes. Null marks a deleted default. */
  private stored: ConfigValues = {};
  /** stored plus environment overrides; what get() reads */
  private effective: ConfigValues = {};

  constructor(appName: string, options: ConfigOptions = {}) {
    this.appName = appName;
    this.options = options;
    this.configFilePath = options.configFile ?? join(options.configDir ?? getDefaultConfigDir(appName), CONFIG_FILE);
    this.configDir = dirname(this.configFilePath);
    this.load();
  }

  /**
   * Read defaults and the user file, creating the file from the defaults
   * when it is missing, then apply environment overrides
   */
  load(): ConfigValues {
    let defaults: ConfigValues = { ...(this.options.defaults ?? {}) };
    if (this.options.defaultsFile) {
      defaults = mergeConfigs(defaults, loadConfigFile(this.options.defaultsFile));
    }

    if (!existsSync(this.configFilePath) && !this.options.readOnly) {
      saveConfigFile(defaults, this.configFilePath);
    }

    this.defaults = defaults;
    this.apply(mergeConfigs(defaults, loadConfigFile(this.configFilePath)));
    return this.toObject();
  }

  reload(): ConfigValues {
    return this.load();
  }

  /**
   * Adopt new stored values once they pass validation with overrides applied
   */
  private apply(stored: ConfigValues): void {
    const prefix = this.options.envPrefix ?? envPrefix(this.appName);
    const present = withoutNulls(stored);
    const effective = prefix === false ? present : applyEnvOverrides(present, prefix, this.options.env);

    if (this.options.schema) {
      const result = validateConfig(effective, this.options.schema);
      if (!result.valid) {
        throw configError(`Invalid configuration in ${this.configFilePath}`, {
          path: this.configFilePath,
          errors: result.errors,
        });
      }
    }

    this.stored = stored;
    this.effective = effective;
  }

  /**
   * Copy of the value at a dot-notation path, or the default when absent
   */
  get(path: string, defaultValue?: unknown): unknown {
    const value = getConfigValue(this.effective, path);
    return value === undefined ? defaultValue : toPlain(value);
  }

  has(path: string): boolean {
    return getConfigValue(this.effective, path) !== undefined;
  }

  /**
   * Set a value in memory; call save() to persist it
   */
  set(path: string, value: unknown): this {
    this.apply(setConfigValue(this.stored, path, value));
    return this;
  }

  /**
   * Remove a value in memory. A value that comes from the defaults is kept
   * as null in the saved file so it stays deleted on the next load.
   */
  delete(path: string): this {
    const fromDefaults = getConfigValue(this.defaults, path) !== undefined;
    this.apply(fromDefaults ? setConfigValue(this.stored, path, null) : deleteConfigValue(this.stored, path));
    return this;
  }

  /**
   * Write the stored values (without environment overrides) to the config file
   */
  save(): void {
    saveConfigFile(this.stored, this.configFilePath);
  }

  toObject(): ConfigValues {
    return copyValues(this.effective);
  }

  /**
   * The effective configuration with attribute-style access
   */
  toModel(): Model {
    return new Model(this.toObject(), []);
  }
}
