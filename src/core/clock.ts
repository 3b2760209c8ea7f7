/**
 * Time source used by rate limiting and statement defaults.
 * Tests swap in a manual clock instead of waiting on wall time.
 */

export interface Clock {
  /** Current time in epoch milliseconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export function toEpochSeconds(ms: number): number {
  return Math.floor(ms / 1000);
}
