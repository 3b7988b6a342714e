/**
 * Clock Port
 *
 * Wall-clock access for timing runs. Simulation state never reads the clock;
 * only durations reported in logs do.
 */

export interface ClockPort {
  nowMs(): number;
}

/**
 * Create a system clock adapter that uses Date.now()
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}
