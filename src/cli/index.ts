#!/usr/bin/env node

/**
 * typecensus CLI - per-property type discovery for semi-structured records
 */

import { createProgram } from './program.js';
import { describeCause } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : describeCause(error);
  logger.error('Unexpected error', { error: message });
  console.error(JSON.stringify({
    status: 'error',
    error: {
      code: 'UNEXPECTED_ERROR',
      message,
    },
  }, null, 2));
  process.exit(1);
});
