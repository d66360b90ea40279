/**
 * Types for partition sources.
 *
 * A partitioning is read as a sequence of groups. Each group is the list of
 * member ids that share a group key in one snapshot.
 */

/**
 * Opaque record identifier. Compared by equality only.
 */
export type MemberId = string;

/**
 * One input row: the group key and the member assigned to it.
 */
export interface PartitionRow<M = MemberId> {
  groupKey: string;
  member: M;
}

/**
 * Members of one group, in source order.
 */
export type Group<M = MemberId> = readonly M[];

/**
 * Rows in source order, from memory or from a stream.
 */
export type RowSequence<M = MemberId> = Iterable<PartitionRow<M>> | AsyncIterable<PartitionRow<M>>;

/**
 * Restartable group factory.
 *
 * Every call opens a fresh pass over the underlying data and yields the
 * groups in first-appearance order of their key.
 */
export type PartitionSource<M = MemberId> = () => AsyncIterable<Group<M>>;

/**
 * CSV reading options.
 */
export interface CsvSourceOptions {
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '|') */
  quote?: string;
}
