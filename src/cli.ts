#!/usr/bin/env node
import { createProgram } from './cli/program';
import { nodeIo } from './cli/io';
import { errorReason } from './errors';
import { logger } from './utils/logger';

createProgram(nodeIo)
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logger.error(errorReason(err));
    process.exitCode = 1;
  });
