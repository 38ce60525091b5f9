/**
 * @module config-loader
 * Loads Verfold configuration from files and environment variables.
 *
 * Configuration is loaded in order of precedence (highest first):
 * 1. CLI flags (passed directly)
 * 2. Environment variables
 * 3. Config file (verfold.json or verfold.config.json)
 * 4. .env file (via dotenv)
 * 5. Built-in defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { IsScriptEncoding } from '@verfold/core';
import type { NameFilter, ResolutionRequest, ScriptEncoding } from '@verfold/core';

/**
 * Configuration file names searched in order.
 */
const CONFIG_FILE_NAMES = ['verfold.json', 'verfold.config.json'];

/**
 * CLI options that can override config file settings.
 */
export interface CLIOptions {
  /** Directory containing the version folders */
  Root?: string;

  /** Inclusive upper bound on folder versions */
  TargetVersion?: string;

  /** Regular expression that folder and script names must match */
  Filter?: string;

  /** Encoding for script files without a byte-order mark */
  Encoding?: string;

  /** Path to config file */
  Config?: string;
}

/**
 * Settings a config file may provide. Keys may be camelCase or PascalCase.
 */
export interface FileConfig {
  RootPath?: string;
  TargetVersion?: string;
  Filter?: string;
  Encoding?: string;
}

/**
 * Loads and merges configuration from all sources.
 *
 * @param cliOptions - Options passed via CLI flags
 * @param cwd - Working directory for config file discovery and relative paths
 * @returns Resolution request ready for the resolver
 * @throws Error if a config file is missing or invalid, the filter is not a valid
 *   regular expression, or the encoding is unknown
 */
export function LoadConfig(cliOptions: CLIOptions, cwd: string = process.cwd()): ResolutionRequest {
  // Load .env file if present; existing environment variables win
  dotenv.config({ path: path.join(cwd, '.env') });

  const fileConfig = loadConfigFile(cliOptions.Config, cwd);

  // Merge: CLI > env > file > defaults
  const root = cliOptions.Root
    ?? process.env.VERFOLD_ROOT
    ?? fileConfig?.RootPath
    ?? './migrations';

  const targetVersion = cliOptions.TargetVersion
    ?? process.env.VERFOLD_TARGET_VERSION
    ?? fileConfig?.TargetVersion;

  const filter = cliOptions.Filter
    ?? process.env.VERFOLD_FILTER
    ?? fileConfig?.Filter;

  const encoding = cliOptions.Encoding
    ?? process.env.VERFOLD_ENCODING
    ?? fileConfig?.Encoding
    ?? 'utf-8';

  return {
    RootPath: path.resolve(cwd, root),
    TargetVersion: targetVersion || null,
    Filter: filter ? CompileFilter(filter) : null,
    Encoding: parseEncoding(encoding),
  };
}

/**
 * Compiles a regular-expression source into a name filter.
 *
 * @example
 * ```typescript
 * const filter = CompileFilter('^\\d');
 * filter('1.0/init.sql'); // true
 * filter('drafts');       // false
 * ```
 */
export function CompileFilter(pattern: string): NameFilter {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid filter pattern "${pattern}": ${message}`);
  }
  return (name) => regex.test(name);
}

function parseEncoding(encoding: string): ScriptEncoding {
  if (!IsScriptEncoding(encoding)) {
    throw new Error(`Unsupported encoding "${encoding}". Use a text encoding such as utf-8, utf16le or latin1.`);
  }
  return encoding;
}

/**
 * Searches for and loads a config file.
 */
function loadConfigFile(explicitPath: string | undefined, cwd: string): FileConfig | null {
  if (explicitPath) {
    const fullPath = path.resolve(cwd, explicitPath);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
    throw new Error(`Config file not found: ${fullPath}`);
  }

  // Search for config files
  for (const name of CONFIG_FILE_NAMES) {
    const fullPath = path.join(cwd, name);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
  }

  return null;
}

/**
 * Known config keys in camelCase, mapped to their PascalCase form.
 */
const KEY_MAP = new Map<string, keyof FileConfig>([
  ['rootPath', 'RootPath'],
  ['root', 'RootPath'],
  ['targetVersion', 'TargetVersion'],
  ['filter', 'Filter'],
  ['encoding', 'Encoding'],
]);

const FILE_CONFIG_KEYS: ReadonlyArray<keyof FileConfig> = ['RootPath', 'TargetVersion', 'Filter', 'Encoding'];

/**
 * Loads a single JSON config file, accepting camelCase or PascalCase keys.
 * Unknown keys are ignored.
 */
function loadFile(filePath: string): FileConfig {
  const content = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Config file ${filePath} is not valid JSON: ${message}`);
  }

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new Error(`Config file ${filePath} must contain a JSON object`);
  }

  const config: FileConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    const mappedKey = KEY_MAP.get(key) ?? FILE_CONFIG_KEYS.find((k) => k === key);
    if (mappedKey === undefined) {
      continue;
    }
    if (typeof value !== 'string') {
      throw new Error(`Config file ${filePath}: "${key}" must be a string`);
    }
    config[mappedKey] = value;
  }
  return config;
}
