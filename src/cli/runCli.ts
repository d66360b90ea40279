/**
 * Command-line driver.
 *
 * Usage: partition-distance <command> [options]
 *
 * Returns the process exit status instead of exiting, so callers decide how
 * to terminate.
 */

import minimist from 'minimist';
import { loadConfig } from '../config/loader.js';
import { CONFIG_KEYS, CONFIG_LOCATOR, type AppConfig, type ConfigValues } from '../config/types.js';
import { createLogger, type LogLevel, type Logger } from '../logging/logger.js';
import { COMMANDS, COMMAND_NAMES, isCommandName } from './commands.js';

/** Environment variable naming the command when none is given on the command line */
export const COMMAND_ENV = 'PARTITION_DISTANCE_COMMAND';

export interface RunCliOptions {
  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Command output (default: stdout) */
  out?: (line: string) => void;
  /** Usage and error messages (default: stderr) */
  err?: (line: string) => void;
  /** Logger factory (default: pino on stderr) */
  createLogger?: (level: LogLevel) => Logger;
  /** Settings file search locations (default: see loadConfig) */
  searchPaths?: readonly string[];
}

export function usage(): string {
  const width = Math.max(...COMMAND_NAMES.map((name) => name.length));
  const commands = COMMAND_NAMES.map((name) => `  ${name.padEnd(width)}  ${COMMANDS[name].summary}`);
  const options = CONFIG_KEYS.map((key) => {
    const locator = CONFIG_LOCATOR[key];
    return `  --${locator.cli} <value>  (${locator.env})`;
  });
  return [
    'Usage: partition-distance <command> [options]',
    '',
    'Commands:',
    ...commands,
    '',
    'Options:',
    ...options,
    '  --config <path>  (PARTITION_DISTANCE_CONFIG)',
    '  --json           print the full report (compare)',
    '  -h, --help',
  ].join('\n');
}

function stringFlag(args: minimist.ParsedArgs, name: string): string | undefined {
  const value: unknown = args[name];
  if (Array.isArray(value)) {
    const last: unknown = value[value.length - 1];
    return typeof last === 'string' ? last : undefined;
  }
  return typeof value === 'string' ? value : undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function runCli(argv: readonly string[], options: RunCliOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const out = options.out ?? ((line: string) => process.stdout.write(`${line}\n`));
  const err = options.err ?? ((line: string) => process.stderr.write(`${line}\n`));
  const makeLogger = options.createLogger ?? createLogger;

  const flags = CONFIG_KEYS.map((key) => CONFIG_LOCATOR[key].cli);
  const args = minimist([...argv], {
    string: [...flags, 'config'],
    boolean: ['help', 'json'],
    alias: { h: 'help' },
  });

  if (args.help === true) {
    err(usage());
    return 0;
  }

  const commandName = args._[0] ?? env[COMMAND_ENV];
  if (commandName === undefined || commandName === '') {
    err(usage());
    return 1;
  }
  if (!isCommandName(commandName)) {
    err(`Unknown command: ${commandName}`);
    err(usage());
    return 1;
  }

  const cli: ConfigValues = {};
  for (const key of CONFIG_KEYS) {
    const value = stringFlag(args, CONFIG_LOCATOR[key].cli);
    if (value !== undefined) {
      cli[key] = value;
    }
  }

  let config: AppConfig;
  try {
    config = await loadConfig({
      cli,
      configPath: stringFlag(args, 'config'),
      env,
      ...(options.searchPaths !== undefined ? { searchPaths: options.searchPaths } : {}),
    });
  } catch (error) {
    err(`Error: ${errorMessage(error)}`);
    return 1;
  }

  const logger = makeLogger(config.logLevel);
  const startedAt = Date.now();
  logger.info({ command: commandName, config }, 'starting');

  try {
    await COMMANDS[commandName].run({ config, logger, out, json: args.json === true });
  } catch (error) {
    logger.error({ err: error, command: commandName }, 'command failed');
    err(`Error: ${errorMessage(error)}`);
    return 1;
  }

  logger.info({ command: commandName, elapsedMs: Date.now() - startedAt }, 'finished');
  return 0;
}
