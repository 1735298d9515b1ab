#!/usr/bin/env node
import { runCli } from './index.js';
import { logger } from '../utils/logger.js';

runCli(process.argv.slice(2)).catch((error: unknown) => {
  logger.fail(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
