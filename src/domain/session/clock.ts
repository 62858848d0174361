/**
 * Monotonic time source in milliseconds, used for elapsed answer time
 */
export interface MonotonicClock {
  now(): number;
}

export const performanceClock: MonotonicClock = {
  now: () => performance.now(),
};
