/**
 * Session clock: wall-clock time for persisted instants, monotonic time for
 * measuring capture durations.
 */

import { performance } from 'perf_hooks';

export interface Clock {
  /** Wall-clock epoch milliseconds */
  now(): number;
  /** Monotonic milliseconds, unaffected by wall-clock jumps */
  monotonic(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  monotonic: () => performance.now(),
};
