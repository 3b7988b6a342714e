/**
 * Standard Command Wrapper
 *
 * - Commander owns flags & parsing
 * - Wrapper owns: value coercion, registry lookup, handler invocation, output
 *
 * Invariant: coercion never renames keys.
 */

import type { Command } from 'commander';
import { NotFoundError } from '@backtest-lab/utils';
import { commandRegistry } from './command-registry.js';
import { CommandContext } from './command-context.js';

type CoerceFn = (raw: Record<string, unknown>) => Record<string, unknown>;

export type DefineCommandArgs = {
  name: string;
  packageName: string;
  // Value coercion only (JSON strings), NOT key renaming
  coerce?: CoerceFn;
  context?: () => CommandContext;
  onError?: (e: unknown) => never;
};

export function defineCommand(cmd: Command, args: DefineCommandArgs): Command {
  cmd.name(args.name);

  const registered = commandRegistry.getCommand(args.packageName, args.name);
  if (registered && registered.examples.length > 0) {
    cmd.addHelpText('after', `\nExamples:\n  ${registered.examples.join('\n  ')}`);
  }

  cmd.action(async () => {
    try {
      const command = commandRegistry.getCommand(args.packageName, args.name);
      if (!command) {
        throw new NotFoundError('Command', `${args.packageName}.${args.name}`);
      }

      // Commander gives camelCase keys already
      const rawOpts: Record<string, unknown> = cmd.opts();
      const coerced = args.coerce ? args.coerce(rawOpts) : rawOpts;

      const ctx = args.context ? args.context() : new CommandContext();
      ctx.write(await command.run(coerced, ctx));
    } catch (e) {
      if (args.onError) {
        args.onError(e);
      }
      throw e;
    }
  });

  return cmd;
}
