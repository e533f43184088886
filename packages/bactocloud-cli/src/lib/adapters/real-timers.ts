import { setTimeout as sleep } from "timers/promises";
import type { DelayFn } from "../ports/timer.js";

export const realDelay: DelayFn = async (ms, signal) => {
  if (ms <= 0 || signal?.aborted) return;
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    // an abort ends the wait early; the caller checks the signal
    if (!signal?.aborted) throw error;
  }
};
