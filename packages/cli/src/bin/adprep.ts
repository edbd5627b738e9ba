#!/usr/bin/env node

/**
 * adprep CLI Entry Point
 */

import 'dotenv/config';
import { logger } from '@adprep/utils';
import { createProgram } from '../program.js';
import { handleError } from '../core/error-handler.js';

const program = createProgram();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const message = handleError(error);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exit(1);
});

export { program };
