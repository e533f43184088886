/**
 * Abstraction for wall-clock time.
 * Log timestamps, session times and run durations all read it, so tests can
 * pin them.
 */
export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  newDate(): Date;
}
