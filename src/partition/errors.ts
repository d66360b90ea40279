export class PartitionReadError extends Error {
  readonly code = 'READ_FAILED';

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Cannot read ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'PartitionReadError';
  }
}

export class MalformedRowError extends Error {
  readonly code = 'MALFORMED_ROW';

  constructor(
    readonly path: string,
    readonly line: number,
    readonly fieldCount: number,
  ) {
    super(`${path}:${line}: expected a group key and a member id, found ${fieldCount} field(s)`);
    this.name = 'MalformedRowError';
  }
}
