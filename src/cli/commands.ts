/**
 * CLI commands.
 *
 * The command set is closed: COMMANDS must hold a handler for every name in
 * COMMAND_NAMES, which the compiler checks through the Record type.
 */

import type { AppConfig } from '../config/types.js';
import { requireOption } from '../config/loader.js';
import { computePartitionDistanceReport } from '../distance/PartitionDistance.js';
import { resolveCostFunction } from '../distance/costFunctions.js';
import type { Logger } from '../logging/logger.js';
import { createCsvPartitionSource } from '../partition/CsvPartitionSource.js';
import type { CsvSourceOptions } from '../partition/types.js';

export const COMMAND_NAMES = ['inspect', 'compare'] as const;
export type CommandName = (typeof COMMAND_NAMES)[number];

export interface CommandContext {
  config: AppConfig;
  logger: Logger;
  /** Writes one line of command output */
  out: (line: string) => void;
  /** Print machine-readable output */
  json: boolean;
}

export interface Command {
  summary: string;
  run: (ctx: CommandContext) => Promise<void>;
}

function csvOptions(config: AppConfig): CsvSourceOptions {
  return { delimiter: config.delimiter, quote: config.quote };
}

async function inspect(ctx: CommandContext): Promise<void> {
  const path = requireOption(ctx.config, 'csvFile');
  const source = createCsvPartitionSource(path, csvOptions(ctx.config));

  let count = 0;
  for await (const group of source()) {
    count += 1;
    ctx.logger.debug({ group: count, size: group.length }, 'group read');
    ctx.out(`Group ${count}: ${group.join(', ')}`);
  }
  ctx.out(`Groups: ${count}`);
}

async function compare(ctx: CommandContext): Promise<void> {
  const priorPath = requireOption(ctx.config, 'priorCsvFile');
  const currentPath = requireOption(ctx.config, 'currentCsvFile');
  const options = csvOptions(ctx.config);

  const report = await computePartitionDistanceReport(
    createCsvPartitionSource(priorPath, options),
    createCsvPartitionSource(currentPath, options),
    resolveCostFunction(ctx.config.mergeCost),
    resolveCostFunction(ctx.config.splitCost),
    { unknownMembers: ctx.config.unknownMembers, logger: ctx.logger },
  );

  ctx.out(ctx.json ? JSON.stringify(report, null, 2) : `Distance: ${report.cost}`);
}

export const COMMANDS: Record<CommandName, Command> = {
  inspect: {
    summary: 'List the groups of one partitioning (--csv-file)',
    run: inspect,
  },
  compare: {
    summary: 'Distance from a prior to a current partitioning (--prior-csv-file, --current-csv-file)',
    run: compare,
  },
};

export function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some((n) => n === name);
}
