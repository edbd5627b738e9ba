/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@adprep/utils';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.output<T> {
  const parsed = schema.safeParse(rawArgs);
  if (!parsed.success) {
    // Format Zod errors into user-friendly messages
    const messages = parsed.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `  ${path}: ${issue.message}`;
    });

    throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
      issues: parsed.error.issues,
      formattedMessages: messages,
    });
  }
  return parsed.data;
}

/**
 * Normalize Commander.js options to a flat object
 *
 * IMPORTANT: Do NOT rename keys. Commander.js already converts --json-dir to jsonDir.
 * Values are not reinterpreted either: paths and dataset names such as "2024"
 * or "true" must reach the schema as the strings the user typed.
 */
export function normalizeOptions(options: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(options)) {
    if (value === undefined || value === null) {
      continue;
    }
    normalized[key] = value;
  }

  return normalized;
}
