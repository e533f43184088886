/**
 * Waits `ms` milliseconds, or less when `signal` aborts first; retry backoff
 * goes through it so tests never sleep.
 */
export type DelayFn = (ms: number, signal?: AbortSignal) => Promise<void>;
