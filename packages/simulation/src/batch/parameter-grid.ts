/**
 * Parameter Grid Generation
 *
 * Cartesian product of per-parameter candidate values, for sweeping a
 * strategy's parameters over one dataset.
 */

export type ParameterValue = string | number | boolean;

export type ParameterGrid = Readonly<Record<string, readonly ParameterValue[]>>;

export type ParameterSet = Record<string, ParameterValue>;

/**
 * Every combination of the grid's values. Keys vary slowest-first in grid key
 * order; an empty grid yields one empty set, an empty axis yields none.
 */
export function generateParameterGrid(grid: ParameterGrid): ParameterSet[] {
  let combinations: ParameterSet[] = [{}];

  for (const [key, values] of Object.entries(grid)) {
    const next: ParameterSet[] = [];
    for (const combination of combinations) {
      for (const value of values) {
        next.push({ ...combination, [key]: value });
      }
    }
    combinations = next;
  }

  return combinations;
}
