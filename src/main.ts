#!/usr/bin/env node
import 'dotenv/config';
import { run } from './cli.js';
import { getErrorMessage } from './errors.js';
import { logger } from './logger.js';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ error: getErrorMessage(err) }, 'Unexpected error');
    process.exitCode = 1;
  });
