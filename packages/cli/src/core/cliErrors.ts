/**
 * Terminal error path for commands: log, print a sanitized message, exit 1
 */

import { handleError } from './error-handler.js';

export function die(error: unknown): never {
  const message = handleError(error);
  console.error(`Error: ${message}`);
  process.exit(1);
}
