/**
 * Value Coercion Helpers
 *
 * These functions coerce values but NEVER rename keys.
 * Use these in defineCommand's coerce() function.
 */

import { ValidationError } from '@backtest-lab/utils';

/**
 * Coerce a JSON string option to its parsed value.
 * Non-strings pass through; undefined stays undefined.
 */
export function coerceJson(v: unknown, name: string): unknown {
  if (typeof v !== 'string') return v;
  try {
    const parsed: unknown = JSON.parse(v);
    return parsed;
  } catch (e) {
    const preview = v.length > 80 ? `${v.substring(0, 80)}...` : v;
    throw new ValidationError(
      `Invalid JSON for ${name}: ${e instanceof Error ? e.message : String(e)}`,
      {
        name,
        input: preview,
      }
    );
  }
}
