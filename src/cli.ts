#!/usr/bin/env node
import { createProgram } from './cli/program.js';
import logger from './config/logger.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Command failed');
    process.exitCode = 1;
  });
