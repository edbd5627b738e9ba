/**
 * Standard Command Wrapper
 *
 * Provides a mechanical pattern for CLI commands that makes it hard to screw up:
 * - Commander owns flags & parsing
 * - Wrapper owns: canonical option shape (camelCase), config-file merging,
 *   schema validation, error formatting, handler invocation
 *
 * Uses commandDef.schema from the registry as the single source of truth for
 * validation.
 *
 * Invariant: Normalization never renames keys. Ever.
 */

import type { Command } from 'commander';
import { NotFoundError } from '@adprep/utils';
import { executeValidated } from './execute.js';
import { commandRegistry } from './command-registry.js';
import { deepMerge, loadConfigFile } from './config-loader.js';
import { validateAndCoerceArgs } from './validation-pipeline.js';

export type DefineCommandArgs = {
  name: string;
  packageName: string;
  onError?: (e: unknown) => never;
};

/**
 * Build validated arguments from Commander options
 *
 * When `config` names a YAML/JSON file its keys are the base and the flags
 * given on the command line win.
 */
export async function resolveCommandOptions(
  rawOpts: Record<string, unknown>,
  args: Pick<DefineCommandArgs, 'name' | 'packageName'>
): Promise<Record<string, unknown>> {
  const commandDef = commandRegistry.getCommand(args.packageName, args.name);
  if (!commandDef) {
    throw new NotFoundError('Command', `${args.packageName}.${args.name}`);
  }

  const { config: configPath, ...flags } = rawOpts;
  const merged =
    typeof configPath === 'string' ? deepMerge(await loadConfigFile(configPath), flags) : flags;

  return validateAndCoerceArgs(commandDef.schema, merged);
}

/**
 * Standard command wiring:
 * - Commander parses flags -> camelCase properties
 * - Optional --config file merged under the flags
 * - Validates using commandDef.schema from registry
 * - Uses executeValidated() which handles context, formatting and errors
 */
export function defineCommand(cmd: Command, args: DefineCommandArgs): Command {
  cmd.name(args.name);

  const examples = commandRegistry.getCommand(args.packageName, args.name)?.examples ?? [];
  if (examples.length > 0) {
    cmd.addHelpText('after', `\nExamples:\n  ${examples.join('\n  ')}`);
  }

  cmd.action(async () => {
    try {
      const commandDef = commandRegistry.getCommand(args.packageName, args.name);
      if (!commandDef) {
        throw new NotFoundError('Command', `${args.packageName}.${args.name}`);
      }

      // Commander gives camelCase keys already
      const validated = await resolveCommandOptions(cmd.opts(), args);
      await executeValidated(commandDef, validated);
    } catch (e) {
      if (args.onError) {
        args.onError(e);
      }
      throw e;
    }
  });

  return cmd;
}
