/**
 * Command Registry - command lookup and help text
 */

import { ConfigurationError } from '@backtest-lab/utils';
import type {
  CommandDefinition,
  OutputFormat,
  PackageCommandModule,
  RegisteredCommand,
} from '../types/index.js';
import { validateArgs } from './execute.js';
import { formatOutput } from './output-formatter.js';

/**
 * Erase a command's argument type so it can live in the registry
 */
export function createCommand<TArgs extends { format: OutputFormat }, TResult>(
  definition: CommandDefinition<TArgs, TResult>
): RegisteredCommand {
  return {
    name: definition.name,
    description: definition.description,
    examples: definition.examples ?? [],
    async run(rawArgs, ctx) {
      const args = validateArgs(definition.schema, rawArgs);
      const result = await definition.handler(args, ctx);
      return formatOutput(result, args.format);
    },
  };
}

/**
 * Command registry for managing CLI commands
 */
export class CommandRegistry {
  private packages: Map<string, PackageCommandModule> = new Map();
  private commands: Map<string, RegisteredCommand> = new Map();

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

    this.packages.set(module.packageName, module);

    for (const command of module.commands) {
      const fullName = `${module.packageName}.${command.name}`;
      if (this.commands.has(fullName)) {
        throw new ConfigurationError(`Command ${fullName} is already registered`, 'commandName', {
          packageName: module.packageName,
          commandName: command.name,
        });
      }
      this.commands.set(fullName, command);
    }
  }

  /**
   * Get a command by full name (package.command)
   */
  getCommand(packageName: string, commandName: string): RegisteredCommand | undefined {
    return this.commands.get(`${packageName}.${commandName}`);
  }

  getPackageCommands(packageName: string): RegisteredCommand[] {
    return this.packages.get(packageName)?.commands ?? [];
  }

  getPackages(): PackageCommandModule[] {
    return Array.from(this.packages.values());
  }

  /**
   * Generate help text for a package
   */
  generatePackageHelp(packageName: string): string {
    const module = this.packages.get(packageName);
    if (!module) {
      return `Package ${packageName} not found`;
    }

    const lines: string[] = [];
    lines.push(`${module.description}`);
    lines.push('');
    lines.push('Commands:');
    for (const command of module.commands) {
      lines.push(`  ${command.name.padEnd(20)} ${command.description}`);
      for (const example of command.examples) {
        lines.push(`    Example: ${example}`);
      }
    }

    return lines.join('\n');
  }
}

/**
 * Global command registry instance
 */
export const commandRegistry = new CommandRegistry();
