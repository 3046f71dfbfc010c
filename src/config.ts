/**
 * Configuration Loader
 * Loads and validates .tokenfront.yaml / .tokenfront.json files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';

import { ConfigError } from './error-classes.js';
import { DEFAULT_MAX_DISPLAYED_ERRORS } from './errors/error-list.js';

// ============================================================
// TYPES
// ============================================================

/** Options controlling how tokenize() collects and reports diagnostics */
export interface TokenfrontConfig {
  /** Keep COMMENT tokens in the output */
  readonly includeComments: boolean;
  /** Sort diagnostics by position before returning them */
  readonly sortErrors: boolean;
  /** Keep only the first diagnostic per line (applied after sorting) */
  readonly removeMultiples: boolean;
  /** Entries shown by ErrorList.summarize() */
  readonly maxDisplayedErrors: number;
}

// ============================================================
// CONSTANTS
// ============================================================

/** Searched in order; the first file found wins */
export const CONFIG_FILE_NAMES = ['.tokenfront.yaml', '.tokenfront.json'];

const BOOLEAN_KEYS = ['includeComments', 'sortErrors', 'removeMultiples'];

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): TokenfrontConfig {
  return {
    includeComments: false,
    sortErrors: true,
    removeMultiples: false,
    maxDisplayedErrors: DEFAULT_MAX_DISPLAYED_ERRORS,
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalBoolean(
  data: Record<string, unknown>,
  key: string,
  path: string
): boolean | undefined {
  const value = data[key];
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  throw new ConfigError(path, `${key} must be a boolean`);
}

/**
 * Validate parsed file content and merge it onto the defaults.
 * An empty document yields the defaults.
 */
export function parseConfig(data: unknown, path: string): TokenfrontConfig {
  const defaults = createDefaultConfig();
  if (data === null || data === undefined) {
    return defaults;
  }
  if (!isRecord(data)) {
    throw new ConfigError(path, 'must be an object');
  }

  for (const key of Object.keys(data)) {
    if (!BOOLEAN_KEYS.includes(key) && key !== 'maxDisplayedErrors') {
      throw new ConfigError(path, `unknown option ${key}`);
    }
  }

  const maxDisplayedErrors = data['maxDisplayedErrors'];
  if (
    maxDisplayedErrors !== undefined &&
    (typeof maxDisplayedErrors !== 'number' ||
      !Number.isInteger(maxDisplayedErrors) ||
      maxDisplayedErrors < 0)
  ) {
    throw new ConfigError(
      path,
      'maxDisplayedErrors must be a non-negative integer'
    );
  }

  return {
    includeComments:
      optionalBoolean(data, 'includeComments', path) ??
      defaults.includeComments,
    sortErrors:
      optionalBoolean(data, 'sortErrors', path) ?? defaults.sortErrors,
    removeMultiples:
      optionalBoolean(data, 'removeMultiples', path) ??
      defaults.removeMultiples,
    maxDisplayedErrors:
      typeof maxDisplayedErrors === 'number'
        ? maxDisplayedErrors
        : defaults.maxDisplayedErrors,
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from the specified directory.
 *
 * @param cwd - Directory to search for a configuration file
 * @returns The merged configuration, or null if no file exists
 * @throws ConfigError if the file cannot be read, parsed or validated
 */
export function loadConfig(cwd: string): TokenfrontConfig | null {
  const configPath = CONFIG_FILE_NAMES.map((name) => join(cwd, name)).find(
    (candidate) => existsSync(candidate)
  );
  if (configPath === undefined) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      configPath,
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  // YAML 1.2 is a superset of JSON, so one parser covers both names
  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new ConfigError(
      configPath,
      `invalid syntax (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(parsedData, configPath);
}
