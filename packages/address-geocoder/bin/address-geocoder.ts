#!/usr/bin/env tsx
/**
 * Address Geocoder CLI Entry Point
 *
 * @module address-geocoder-cli
 */

import { createProgram } from '../src/cli/index.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { createLogger } from '../src/core/utils/logger.js';

const logger = createLogger('cli');

createProgram(logger)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Unexpected error', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = EXIT_CODES.UNKNOWN_ERROR;
  });
