/**
 * Universal Command Executor
 *
 * Handles all the boring universal stuff:
 * - Initialize context (environment defaults)
 * - Call handler
 * - Format output
 * - Error handling
 */

import { logger } from '@adprep/utils';
import { formatOutput } from './output-formatter.js';
import { handleError } from './error-handler.js';
import { CommandContext } from './command-context.js';
import { commandRegistry } from './command-registry.js';
import { formatElapsedTime, getProgressIndicator, resetProgressIndicator } from './progress-indicator.js';
import { OUTPUT_FORMATS, type CommandDefinition, type OutputFormat } from '../types/index.js';

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Find package name for a command by searching the registry
 */
function findPackageName(commandDef: CommandDefinition): string | undefined {
  for (const pkg of commandRegistry.getPackages()) {
    if (pkg.commands.includes(commandDef)) {
      return pkg.packageName;
    }
  }
  return undefined;
}

/**
 * Run a command with validated arguments and return its formatted output
 *
 * Format is a CLI concern: it is taken out of the arguments before the
 * handler sees them.
 */
export async function runCommand(
  commandDef: CommandDefinition,
  validatedArgs: Record<string, unknown>,
  ctx: CommandContext = new CommandContext()
): Promise<string> {
  await ctx.ensureInitialized();

  const { format: rawFormat, ...handlerArgs } = validatedArgs;
  const format: OutputFormat = isOutputFormat(rawFormat) ? rawFormat : 'table';

  const result = await commandDef.handler(handlerArgs, ctx);
  return formatOutput(result, format);
}

/**
 * Execute a command definition with pre-validated arguments
 *
 * Use this when arguments have already been validated (e.g., from defineCommand).
 * Prints the result on stdout; on failure prints `Error: <message>` on
 * stderr and exits with code 1.
 */
export async function executeValidated(
  commandDef: CommandDefinition,
  validatedArgs: Record<string, unknown>,
  ctx?: CommandContext
): Promise<void> {
  const packageName = findPackageName(commandDef);
  const fullCommandName = packageName ? `${packageName}.${commandDef.name}` : commandDef.name;
  const progress = getProgressIndicator();
  const startedAt = Date.now();

  try {
    progress.start(`Running ${fullCommandName}...`);
    const output = await runCommand(commandDef, validatedArgs, ctx);
    progress.stop();
    console.log(output);
    logger.debug(`${fullCommandName} finished in ${formatElapsedTime(Date.now() - startedAt)}`, {
      command: fullCommandName,
    });
  } catch (error) {
    progress.fail('Error occurred');
    const message = handleError(error, { command: fullCommandName });
    console.error(`Error: ${message}`);
    process.exit(1);
  } finally {
    resetProgressIndicator();
  }
}
