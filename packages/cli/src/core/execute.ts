/**
 * Argument validation for registered commands
 */

import type { z } from 'zod';
import { ValidationError } from '@backtest-lab/utils';

/**
 * Validate commander options against a command schema.
 * Commander leaves unset options undefined; the schema supplies defaults.
 */
export function validateArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rawArgs: Record<string, unknown>): T {
  const parsed = schema.safeParse(rawArgs);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'arguments';
      return `${path}: ${issue.message}`;
    });
    throw new ValidationError(`Invalid arguments: ${details.join('; ')}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}
