/**
 * PartitionDistance — cost of turning one partitioning into another.
 *
 * The prior partitioning is drained first into a member index and a table
 * of remaining group sizes. Current groups are then read one at a time; for
 * each, the members are bucketed by prior group and every bucket is charged
 * a split cost (the prior group still has members elsewhere) and, after the
 * first bucket, a merge cost (the current group absorbs another prior
 * group).
 *
 * Buckets are visited in the order their first member appears in the
 * current group. That order decides which bucket is charged no merge cost
 * and which running total each merge is charged against, so the result
 * depends on member order within a current group.
 */

import type { Group, PartitionSource } from '../partition/types.js';
import { silentLogger } from '../logging/logger.js';
import { PartitionIntegrityError } from './errors.js';
import type {
  CostFunction,
  PartitionDistanceOptions,
  PartitionDistanceReport,
  UnknownMemberPolicy,
} from './types.js';

/**
 * Bucket for current members absent from the prior partitioning.
 * Prior groups are numbered from 1, so 0 and below are free. Singleton
 * unknown buckets count down from -1.
 */
export const UNKNOWN_BUCKET = 0;

function isUnknownBucket(bucket: number): boolean {
  return bucket <= UNKNOWN_BUCKET;
}

interface PriorIndex<M> {
  /** Member -> 1-based arrival index of its prior group */
  groupOf: Map<M, number>;
  /** Prior group -> members not yet attributed to a current group */
  remaining: Map<number, number>;
  groupCount: number;
  memberCount: number;
  reassignedCount: number;
}

async function indexPriorPartitioning<M>(source: PartitionSource<M>): Promise<PriorIndex<M>> {
  const index: PriorIndex<M> = {
    groupOf: new Map(),
    remaining: new Map(),
    groupCount: 0,
    memberCount: 0,
    reassignedCount: 0,
  };

  for await (const group of source()) {
    index.groupCount += 1;
    index.remaining.set(index.groupCount, group.length);
    index.memberCount += group.length;
    for (const member of group) {
      // Last occurrence wins; repeats within one group are not reassignments
      const previous = index.groupOf.get(member);
      if (previous !== undefined && previous !== index.groupCount) {
        index.reassignedCount += 1;
      }
      index.groupOf.set(member, index.groupCount);
    }
  }

  return index;
}

/**
 * Count a current group's members per prior group, keeping first-seen order.
 */
export function buildPartitionMap<M>(
  group: Group<M>,
  groupOf: ReadonlyMap<M, number>,
  unknownMembers: UnknownMemberPolicy = 'shared',
): Map<number, number> {
  const partitionMap = new Map<number, number>();
  let nextSingleton = UNKNOWN_BUCKET - 1;

  for (const member of group) {
    let bucket = groupOf.get(member);
    if (bucket === undefined) {
      bucket = unknownMembers === 'singleton' ? nextSingleton-- : UNKNOWN_BUCKET;
    }
    partitionMap.set(bucket, (partitionMap.get(bucket) ?? 0) + 1);
  }

  return partitionMap;
}

/**
 * Compute the distance together with its breakdown.
 */
export async function computePartitionDistanceReport<M>(
  prior: PartitionSource<M>,
  current: PartitionSource<M>,
  mergeCost: CostFunction,
  splitCost: CostFunction,
  options: PartitionDistanceOptions = {},
): Promise<PartitionDistanceReport> {
  const logger = options.logger ?? silentLogger;
  const unknownMembers = options.unknownMembers ?? 'shared';

  const index = await indexPriorPartitioning(prior);
  logger.debug(
    { priorGroups: index.groupCount, sizes: Object.fromEntries(index.remaining) },
    'indexed prior partitioning',
  );
  if (index.reassignedCount > 0) {
    logger.warn(
      { reassigned: index.reassignedCount },
      'member ids occur in more than one prior group; the last occurrence was kept',
    );
  }

  const report: PartitionDistanceReport = {
    cost: 0,
    splitCost: 0,
    mergeCost: 0,
    priorGroupCount: index.groupCount,
    currentGroupCount: 0,
    priorMemberCount: index.memberCount,
    unknownMemberCount: 0,
    reassignedMemberCount: index.reassignedCount,
  };

  for await (const group of current()) {
    report.currentGroupCount += 1;
    const groupNumber = report.currentGroupCount;
    const partitionMap = buildPartitionMap(group, index.groupOf, unknownMembers);
    logger.debug({ group: groupNumber, partitionMap: Object.fromEntries(partitionMap) }, 'partition map');

    let groupSplit = 0;
    let groupMerge = 0;
    let gathered = 0;

    for (const [bucket, value] of partitionMap) {
      let remaining = value;
      if (isUnknownBucket(bucket)) {
        report.unknownMemberCount += value;
      } else {
        remaining = index.remaining.get(bucket) ?? 0;
        if (value > remaining) {
          throw new PartitionIntegrityError(bucket, groupNumber, value, remaining);
        }
        index.remaining.set(bucket, remaining - value);
      }

      if (remaining > value) {
        groupSplit += splitCost(value, remaining - value);
      }
      if (gathered !== 0) {
        groupMerge += mergeCost(value, gathered);
      }
      gathered += value;

      logger.debug(
        { group: groupNumber, bucket, value, remaining: remaining - value, gathered, groupSplit, groupMerge },
        'bucket charged',
      );
    }

    report.splitCost += groupSplit;
    report.mergeCost += groupMerge;
    report.cost += groupSplit + groupMerge;
  }

  logger.info(
    {
      priorGroups: report.priorGroupCount,
      currentGroups: report.currentGroupCount,
      unknownMembers: report.unknownMemberCount,
      cost: report.cost,
    },
    'partition distance computed',
  );
  return report;
}

/**
 * Distance between a prior and a current partitioning.
 *
 * Each source is called exactly once. The prior one is drained completely
 * before the first current group is read.
 */
export async function computePartitionDistance<M>(
  prior: PartitionSource<M>,
  current: PartitionSource<M>,
  mergeCost: CostFunction,
  splitCost: CostFunction,
  options: PartitionDistanceOptions = {},
): Promise<number> {
  const report = await computePartitionDistanceReport(prior, current, mergeCost, splitCost, options);
  return report.cost;
}
