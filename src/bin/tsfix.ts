#!/usr/bin/env node
import { main } from '../cli/index.js';
import { logger } from '../cli/utils/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';

main().catch((error: unknown) => {
  logger.error(getErrorMessage(error));
  process.exitCode = 1;
});
