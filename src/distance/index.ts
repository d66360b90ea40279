/**
 * Partition-distance module exports.
 */

export * from './types.js';
export * from './errors.js';
export * from './costFunctions.js';
export * from './PartitionDistance.js';
