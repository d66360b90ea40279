/**
 * Configuration types for partition-distance.
 *
 * Every option can come from a CLI flag, an environment variable, the YAML
 * settings file or a built-in default, in that order of precedence.
 */

import type { LogLevel } from '../logging/logger.js';
import type { CostFunctionName } from '../distance/costFunctions.js';
import type { UnknownMemberPolicy } from '../distance/types.js';

/**
 * Resolved configuration.
 */
export interface AppConfig {
  /** Partitioning to inspect */
  csvFile?: string | undefined;
  /** Earlier partitioning to compare */
  priorCsvFile?: string | undefined;
  /** Later partitioning to compare */
  currentCsvFile?: string | undefined;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** Unknown member bucketing (default: 'shared') */
  unknownMembers: UnknownMemberPolicy;
  /** Merge cost function (default: 'max') */
  mergeCost: CostFunctionName;
  /** Split cost function (default: 'max') */
  splitCost: CostFunctionName;
  /** CSV field delimiter (default: ',') */
  delimiter: string;
  /** CSV quote character (default: '|') */
  quote: string;
  /** Settings file the configuration was read from, if any */
  settingsFile?: string | undefined;
}

/**
 * Options that can be set from every source.
 */
export type ConfigKey = Exclude<keyof AppConfig, 'settingsFile'>;

/**
 * Raw string values, e.g. from the command line.
 */
export type ConfigValues = Partial<Record<ConfigKey, string>>;

/**
 * Where an option is looked up outside the settings file.
 */
export interface OptionLocator {
  /** CLI flag without leading dashes */
  cli: string;
  /** Environment variable */
  env: string;
}

export const CONFIG_LOCATOR: Record<ConfigKey, OptionLocator> = {
  csvFile: { cli: 'csv-file', env: 'PARTITION_DISTANCE_CSV_FILE' },
  priorCsvFile: { cli: 'prior-csv-file', env: 'PARTITION_DISTANCE_PRIOR_CSV_FILE' },
  currentCsvFile: { cli: 'current-csv-file', env: 'PARTITION_DISTANCE_CURRENT_CSV_FILE' },
  logLevel: { cli: 'log-level', env: 'PARTITION_DISTANCE_LOG_LEVEL' },
  unknownMembers: { cli: 'unknown-members', env: 'PARTITION_DISTANCE_UNKNOWN_MEMBERS' },
  mergeCost: { cli: 'merge-cost', env: 'PARTITION_DISTANCE_MERGE_COST' },
  splitCost: { cli: 'split-cost', env: 'PARTITION_DISTANCE_SPLIT_COST' },
  delimiter: { cli: 'delimiter', env: 'PARTITION_DISTANCE_DELIMITER' },
  quote: { cli: 'quote', env: 'PARTITION_DISTANCE_QUOTE' },
};

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'csvFile',
  'priorCsvFile',
  'currentCsvFile',
  'logLevel',
  'unknownMembers',
  'mergeCost',
  'splitCost',
  'delimiter',
  'quote',
];

/** Environment variable naming the settings file */
export const SETTINGS_FILE_ENV = 'PARTITION_DISTANCE_CONFIG';

/** File name looked for in the default search locations */
export const SETTINGS_FILE_NAME = 'partition-distance.yaml';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  logLevel: 'info',
  unknownMembers: 'shared',
  mergeCost: 'max',
  splitCost: 'max',
  delimiter: ',',
  quote: '|',
};
