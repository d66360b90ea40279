/**
 * Types for the partition-distance engine.
 */

import type { Logger } from '../logging/logger.js';

/**
 * Cost of one split or merge, given two non-negative member counts.
 *
 * For a split the counts are the members taken by the current group and the
 * members of the prior group left behind. For a merge they are the members
 * contributed by the incoming prior group and the members already gathered
 * in the current group.
 */
export type CostFunction = (a: number, b: number) => number;

/**
 * How members missing from the prior partitioning are bucketed.
 *
 * - shared: all of a current group's unknown members form one bucket
 * - singleton: every unknown member is a bucket of its own
 */
export type UnknownMemberPolicy = 'shared' | 'singleton';

export interface PartitionDistanceOptions {
  /** Unknown member bucketing (default: 'shared') */
  unknownMembers?: UnknownMemberPolicy;
  /** Progress and diagnostics (default: silent) */
  logger?: Logger;
}

export interface PartitionDistanceReport {
  /** splitCost + mergeCost */
  cost: number;
  splitCost: number;
  mergeCost: number;
  priorGroupCount: number;
  currentGroupCount: number;
  /** Rows read from the prior partitioning */
  priorMemberCount: number;
  /** Current members with no prior group */
  unknownMemberCount: number;
  /** Prior members whose group was overwritten by a later occurrence */
  reassignedMemberCount: number;
}
