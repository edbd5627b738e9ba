/**
 * Command Registry - Dynamic command loading and management
 */

import type { z } from 'zod';
import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import type { CommandContext } from './command-context.js';
import { ConfigurationError, ValidationError } from '@adprep/utils';

/**
 * Build a command definition whose handler sees the schema's output type
 */
export function defineCommandDefinition<TSchema extends z.ZodTypeAny>(definition: {
  name: string;
  description: string;
  schema: TSchema;
  handler: (args: z.output<TSchema>, ctx: CommandContext) => Promise<unknown>;
  examples?: string[];
}): CommandDefinition {
  const { schema, handler } = definition;
  return {
    ...definition,
    handler: async (args, ctx) => handler(schema.parse(args), ctx),
  };
}

/**
 * Command registry for managing CLI commands
 */
export class CommandRegistry {
  private packages: Map<string, PackageCommandModule> = new Map();
  private commands: Map<string, CommandDefinition> = new Map();

  /**
   * Register a package command module
   */
  registerPackage(module: PackageCommandModule): void {
    if (this.packages.has(module.packageName)) {
      throw new ConfigurationError(
        `Package ${module.packageName} is already registered`,
        'packageName',
        { packageName: module.packageName }
      );
    }

    for (const command of module.commands) {
      this.validateCommand(command);
      const fullName = `${module.packageName}.${command.name}`;
      if (this.commands.has(fullName)) {
        throw new ConfigurationError(`Command ${fullName} is already registered`, 'commandName', {
          packageName: module.packageName,
          commandName: command.name,
        });
      }
    }

    this.packages.set(module.packageName, module);
    for (const command of module.commands) {
      this.commands.set(`${module.packageName}.${command.name}`, command);
    }
  }

  /**
   * Get a command by full name (package.command)
   */
  getCommand(packageName: string, commandName: string): CommandDefinition | undefined {
    return this.commands.get(`${packageName}.${commandName}`);
  }

  /**
   * Get all commands for a package
   */
  getPackageCommands(packageName: string): CommandDefinition[] {
    return this.packages.get(packageName)?.commands ?? [];
  }

  getPackages(): PackageCommandModule[] {
    return Array.from(this.packages.values());
  }

  /**
   * Validate command structure
   */
  validateCommand(command: CommandDefinition): void {
    if (command.name.trim() === '') {
      throw new ValidationError('Command name must be a non-empty string', {
        command: command.name,
      });
    }

    if (command.description.trim() === '') {
      throw new ValidationError('Command description must be a non-empty string', {
        command: command.name,
      });
    }
  }
}

/**
 * Global command registry instance
 */
export const commandRegistry = new CommandRegistry();
