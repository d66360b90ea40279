/**
 * Partition source module exports.
 */

export * from './types.js';
export * from './errors.js';
export * from './PartitionSource.js';
export * from './CsvPartitionSource.js';
