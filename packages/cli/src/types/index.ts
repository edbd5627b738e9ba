/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context.js';

/**
 * Command definition structure
 */
export interface CommandDefinition {
  /**
   * Command name (e.g., 'materialize', 'register')
   */
  name: string;

  /**
   * Command description for help text
   */
  description: string;

  /**
   * Zod schema for argument validation
   */
  schema: z.ZodTypeAny;

  /**
   * Command handler function. Receives arguments already validated against `schema`.
   */
  handler: (args: unknown, ctx: CommandContext) => Promise<unknown>;

  /**
   * Optional examples for help text
   */
  examples?: string[];
}

/**
 * Package command module structure
 */
export interface PackageCommandModule {
  /**
   * Package name (e.g., 'dataset')
   */
  packageName: string;

  /**
   * Package description
   */
  description: string;

  /**
   * Commands in this package
   */
  commands: CommandDefinition[];
}

/**
 * Output format options
 */
export const OUTPUT_FORMATS = ['json', 'table', 'csv'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
