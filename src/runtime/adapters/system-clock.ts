import type { Clock } from '../ports/clock.js';

/**
 * Millisecond wall clock, with the sub-millisecond digits taken from the
 * monotonic high-resolution timer so two calls within one millisecond differ.
 */
export class SystemClock implements Clock {
  nowNanos(): bigint {
    return BigInt(Date.now()) * 1_000_000n + (process.hrtime.bigint() % 1_000_000n);
  }
}
