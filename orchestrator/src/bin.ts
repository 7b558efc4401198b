#!/usr/bin/env node
import { runCli } from './cli.js';
import { loadEnvFiles } from './config.js';
import { logger } from './logger.js';

loadEnvFiles();

runCli(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((error) => {
    logger.fatal({ error }, 'Fatal error in clipforge');
    process.exit(1);
  });
