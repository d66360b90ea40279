/**
 * Configuration loader for partition-distance.
 *
 * Resolves every option with the precedence:
 * CLI flag > environment variable > settings file > default.
 *
 * The settings file is YAML with support for environment variable
 * substitution (${VAR_NAME} and ${VAR_NAME:-default}).
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';
import { COST_FUNCTION_NAMES } from '../distance/costFunctions.js';
import type { AppConfig, ConfigKey, ConfigValues } from './types.js';
import {
  CONFIG_KEYS,
  CONFIG_LOCATOR,
  DEFAULT_CONFIG,
  SETTINGS_FILE_ENV,
  SETTINGS_FILE_NAME,
} from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Values given on the command line, keyed by option name */
  cli?: ConfigValues;
  /** Settings file path (default: process.env.PARTITION_DISTANCE_CONFIG, then the search paths) */
  configPath?: string | undefined;
  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Candidate settings files, first existing wins (default: defaultSettingsSearchPaths()) */
  searchPaths?: readonly string[];
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  readonly code = 'CONFIG_INVALID';

  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * A required option has no value from any source.
 */
export class MissingOptionError extends Error {
  readonly code = 'CONFIG_MISSING';

  constructor(public readonly key: ConfigKey) {
    const locator = CONFIG_LOCATOR[key];
    super(`Missing required option '${key}' (--${locator.cli} or ${locator.env})`);
    this.name = 'MissingOptionError';
  }
}

const layerSchema = z
  .object({
    csvFile: z.string().min(1),
    priorCsvFile: z.string().min(1),
    currentCsvFile: z.string().min(1),
    logLevel: z.enum(LOG_LEVELS),
    unknownMembers: z.enum(['shared', 'singleton']),
    mergeCost: z.enum(COST_FUNCTION_NAMES),
    splitCost: z.enum(COST_FUNCTION_NAMES),
    delimiter: z.string().min(1),
    quote: z.string().length(1),
  })
  .partial()
  .strict();

const configSchema = z.object({
  csvFile: z.string().optional(),
  priorCsvFile: z.string().optional(),
  currentCsvFile: z.string().optional(),
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_CONFIG.logLevel),
  unknownMembers: z.enum(['shared', 'singleton']).default(DEFAULT_CONFIG.unknownMembers),
  mergeCost: z.enum(COST_FUNCTION_NAMES).default(DEFAULT_CONFIG.mergeCost),
  splitCost: z.enum(COST_FUNCTION_NAMES).default(DEFAULT_CONFIG.splitCost),
  delimiter: z.string().default(DEFAULT_CONFIG.delimiter),
  quote: z.string().default(DEFAULT_CONFIG.quote),
});

type ConfigLayer = z.infer<typeof layerSchema>;

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

function substituteEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    return defaultValue ?? '';
  });
}

function substituteEnvVarsRecursive(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVarsRecursive(item, env));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, env);
    }
    return result;
  }
  return obj;
}

/**
 * Validate one source of values.
 *
 * @param raw - Values from the source
 * @param describe - Maps an option name to how the source spells it
 */
function parseLayer(raw: unknown, describe: (key: string) => string): ConfigLayer {
  const result = layerSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  if (issue === undefined) {
    throw new ConfigValidationError(result.error.message, describe(''), raw);
  }
  if (issue.code === 'unrecognized_keys') {
    const key = issue.keys[0] ?? '';
    throw new ConfigValidationError('unknown option', describe(key), undefined);
  }
  const key = issue.path.map(String).join('.');
  const value = raw !== null && typeof raw === 'object' ? (raw as Record<string, unknown>)[key] : raw;
  throw new ConfigValidationError(issue.message, describe(key), value);
}

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

function envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  const raw: Record<string, string> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[CONFIG_LOCATOR[key].env];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }
  return parseLayer(raw, (key) => (isConfigKey(key) ? CONFIG_LOCATOR[key].env : key));
}

function cliLayer(values: ConfigValues): ConfigLayer {
  const raw: Record<string, string> = {};
  for (const key of CONFIG_KEYS) {
    const value = values[key];
    if (value !== undefined) {
      raw[key] = value;
    }
  }
  return parseLayer(raw, (key) => (isConfigKey(key) ? `--${CONFIG_LOCATOR[key].cli}` : key));
}

/**
 * Default settings file locations: the working directory, the directory of
 * the running program, then /etc.
 */
export function defaultSettingsSearchPaths(
  cwd: string = process.cwd(),
  program: string | undefined = process.argv[1],
): string[] {
  const paths = [resolve(cwd, SETTINGS_FILE_NAME)];
  if (program !== undefined) {
    paths.push(join(dirname(resolve(program)), SETTINGS_FILE_NAME));
  }
  paths.push(join('/etc', SETTINGS_FILE_NAME));
  return paths;
}

/**
 * Find the settings file to read.
 *
 * An explicitly named file must exist; the search paths are optional.
 */
export function findSettingsFile(options: LoadConfigOptions = {}): string | undefined {
  const env = options.env ?? process.env;
  const explicit = options.configPath ?? env[SETTINGS_FILE_ENV];

  if (explicit !== undefined && explicit !== '') {
    const absolutePath = resolve(explicit);
    if (!existsSync(absolutePath)) {
      const source = options.configPath !== undefined ? '--config' : SETTINGS_FILE_ENV;
      throw new ConfigValidationError('settings file not found', source, absolutePath);
    }
    return absolutePath;
  }

  const searchPaths = options.searchPaths ?? defaultSettingsSearchPaths();
  return searchPaths.map((p) => resolve(p)).find((p) => existsSync(p));
}

/**
 * Read and validate a YAML settings file.
 */
export async function loadSettingsFile(
  path: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ConfigLayer> {
  const content = await readFile(path, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigValidationError(
      `failed to parse settings file: ${err instanceof Error ? err.message : String(err)}`,
      path,
      undefined,
    );
  }

  // An empty document parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigValidationError('must be a mapping of option names to values', path, parsed);
  }

  return parseLayer(substituteEnvVarsRecursive(parsed, env), (key) => `${path}#${key}`);
}

/**
 * Load configuration from every source.
 *
 * @param options - Loading options
 * @returns Resolved configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const settingsFile = findSettingsFile(options);
  const fileValues = settingsFile !== undefined ? await loadSettingsFile(settingsFile, env) : {};

  const resolved = configSchema.parse({
    ...fileValues,
    ...envLayer(env),
    ...cliLayer(options.cli ?? {}),
  });

  return { ...resolved, settingsFile };
}

/**
 * Get an option that the current command cannot run without.
 */
export function requireOption(config: AppConfig, key: 'csvFile' | 'priorCsvFile' | 'currentCsvFile'): string {
  const value = config[key];
  if (value === undefined || value === '') {
    throw new MissingOptionError(key);
  }
  return value;
}
