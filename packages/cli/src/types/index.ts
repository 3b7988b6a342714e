/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context.js';

/**
 * Output format options
 */
export type OutputFormat = 'json' | 'table';

/**
 * Command definition structure
 */
export interface CommandDefinition<TArgs extends { format: OutputFormat }, TResult> {
  /**
   * Command name (e.g., 'run', 'sweep')
   */
  name: string;

  /**
   * Command description for help text
   */
  description: string;

  /**
   * Zod schema for argument validation
   */
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;

  /**
   * Receives validated args; never reads process state directly
   */
  handler: (args: TArgs, ctx: CommandContext) => Promise<TResult>;

  /**
   * Optional examples for help text
   */
  examples?: string[];
}

/**
 * A command with its argument type erased, as the registry stores it.
 * `run` validates raw options, calls the handler and formats the result.
 */
export interface RegisteredCommand {
  name: string;
  description: string;
  examples: string[];
  run(rawArgs: Record<string, unknown>, ctx: CommandContext): Promise<string>;
}

/**
 * Package command module structure
 */
export interface PackageCommandModule {
  /**
   * Package name (e.g., 'backtest')
   */
  packageName: string;

  /**
   * Package description
   */
  description: string;

  /**
   * Commands in this package
   */
  commands: RegisteredCommand[];
}
