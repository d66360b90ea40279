#!/usr/bin/env node
/**
 * partition-distance executable.
 *
 * Usage: partition-distance <command> [options]
 */

import { runCli } from './cli/runCli.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    process.stderr.write(`Fatal: ${err}\n`);
    process.exit(1);
  });
