/**
 * Partition sources — group contiguous rows into member lists.
 *
 * Rows are expected to arrive already grouped: every row of one group key
 * is adjacent to the others. Nothing is sorted. A key that reappears after
 * a different key starts a new group.
 */

import type { Group, PartitionRow, PartitionSource, RowSequence } from './types.js';

/**
 * Yield the members of each run of equal group keys.
 */
export async function* groupRows<M>(rows: RowSequence<M>): AsyncGenerator<Group<M>> {
  let currentKey: string | undefined;
  let members: M[] = [];

  for await (const row of rows) {
    if (row.groupKey === currentKey) {
      members.push(row.member);
      continue;
    }
    if (members.length > 0) {
      yield members;
    }
    currentKey = row.groupKey;
    members = [row.member];
  }

  if (members.length > 0) {
    yield members;
  }
}

/**
 * Wrap a row factory into a restartable partition source.
 *
 * `openRows` is called once per pass, so each call of the returned source
 * reads from the beginning.
 */
export function createPartitionSource<M>(openRows: () => RowSequence<M>): PartitionSource<M> {
  return () => groupRows(openRows());
}

/**
 * Partition source over rows held in memory.
 */
export function createArrayPartitionSource<M>(rows: readonly PartitionRow<M>[]): PartitionSource<M> {
  return createPartitionSource(() => rows);
}

/**
 * Build rows from a list of groups, keyed by their 1-based position.
 */
export function rowsFromGroups<M>(groups: readonly (readonly M[])[]): PartitionRow<M>[] {
  return groups.flatMap((members, index) =>
    members.map((member) => ({ groupKey: String(index + 1), member })),
  );
}

/**
 * Drain a source into an array.
 */
export async function collectGroups<M>(source: PartitionSource<M>): Promise<Group<M>[]> {
  const groups: Group<M>[] = [];
  for await (const group of source()) {
    groups.push(group);
  }
  return groups;
}
