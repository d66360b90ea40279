/**
 * CSV-backed partition source.
 *
 * Field 0 of each data row is the group key and field 1 the member id; any
 * further fields are ignored. The header line is skipped.
 */

import { createReadStream } from 'node:fs';
import { parse } from 'csv-parse';
import { MalformedRowError, PartitionReadError } from './errors.js';
import { createPartitionSource } from './PartitionSource.js';
import type { CsvSourceOptions, PartitionRow, PartitionSource } from './types.js';

export const DEFAULT_CSV_OPTIONS: Required<CsvSourceOptions> = {
  delimiter: ',',
  quote: '|',
};

type ParsedRecord = {
  record: string[];
  info: { lines: number };
};

function isParsedRecord(value: unknown): value is ParsedRecord {
  if (!value || typeof value !== 'object') return false;
  const v = value as Record<string, unknown>;
  const info = v.info as Record<string, unknown> | undefined;
  return (
    Array.isArray(v.record) &&
    v.record.every((field) => typeof field === 'string') &&
    typeof info === 'object' &&
    info !== null &&
    typeof info.lines === 'number'
  );
}

/**
 * Stream the data rows of a CSV file.
 */
export async function* readCsvRows(
  path: string,
  options: CsvSourceOptions = {},
): AsyncGenerator<PartitionRow> {
  const opts = { ...DEFAULT_CSV_OPTIONS, ...options };
  const input = createReadStream(path);
  const parser = parse({
    delimiter: opts.delimiter,
    quote: opts.quote,
    from_line: 2,
    skip_empty_lines: true,
    relax_column_count: true,
    // quote characters inside an unquoted field are kept literally
    relax_quotes: true,
    info: true,
  });
  // pipe() does not forward source errors
  input.on('error', (err) => parser.destroy(err));
  input.pipe(parser);

  try {
    for await (const chunk of parser) {
      if (!isParsedRecord(chunk)) {
        throw new PartitionReadError(path, new Error('unexpected record shape from CSV parser'));
      }
      const [groupKey, member] = chunk.record;
      if (groupKey === undefined || member === undefined) {
        throw new MalformedRowError(path, chunk.info.lines, chunk.record.length);
      }
      yield { groupKey, member };
    }
  } catch (err) {
    if (err instanceof MalformedRowError || err instanceof PartitionReadError) {
      throw err;
    }
    throw new PartitionReadError(path, err);
  } finally {
    input.destroy();
  }
}

/**
 * Restartable partition source over a CSV file.
 *
 * Only the path and options are captured; the file is opened anew on every
 * call of the returned source.
 */
export function createCsvPartitionSource(
  path: string,
  options: CsvSourceOptions = {},
): PartitionSource {
  return createPartitionSource(() => readCsvRows(path, options));
}
