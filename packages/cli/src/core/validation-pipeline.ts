/**
 * Unified Validation Pipeline
 *
 * Single path for CLI argument validation:
 * 1. Normalize options (Commander.js → flat object)
 * 2. Validate with Zod schema
 * 3. Return typed, validated arguments
 */

import type { z } from 'zod';
import { normalizeOptions, parseArguments } from './argument-parser.js';

/**
 * @throws ValidationError if validation fails
 */
export function validateAndCoerceArgs<T extends z.ZodTypeAny>(
  schema: T,
  rawOptions: Record<string, unknown>
): z.output<T> {
  return parseArguments(schema, normalizeOptions(rawOptions));
}
