/**
 * Port for wall-clock time at nanosecond resolution.
 */
export interface Clock {
  /** Nanoseconds since the Unix epoch. */
  nowNanos(): bigint;
}
