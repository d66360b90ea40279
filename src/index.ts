/**
 * partition-distance — split/merge distance between two entity partitionings.
 *
 * This is the main entry point for the library.
 */

// Partition sources
export * from './partition/index.js';

// Distance engine and cost functions
export * from './distance/index.js';

// Configuration
export * from './config/types.js';
export * from './config/loader.js';

// Logging
export * from './logging/index.js';

// Command line
export * from './cli/index.js';
