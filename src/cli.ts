#!/usr/bin/env node
import { runCli } from './cli/run';
import { logger } from './dev/logger';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error(err);
    process.exitCode = 1;
  }
);
