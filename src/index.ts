#!/usr/bin/env node
import { run } from './cli.js';
import { logger } from './utils/logger.js';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.fatal(err, 'Failed to run');
    process.exitCode = 1;
  });
