import { setTimeout as sleepFor } from "node:timers/promises";

/**
 * Time source for every suspension point (bucket wait, backoff, attempt
 * timeout). Injected so tests can advance time without real waiting.
 */
export interface Clock {
  now(): number;
  /** Rejects if the signal aborts first. */
  sleep(ms: number, signal?: AbortSignal | undefined): Promise<void>;
  /** Runs `callback` after `ms`; the returned function cancels it. */
  setTimer(ms: number, callback: () => void): () => void;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    signal?.throwIfAborted();
    if (ms <= 0) return;
    await sleepFor(ms, undefined, signal ? { signal } : {});
  },
  setTimer: (ms, callback) => {
    const handle = setTimeout(callback, ms);
    return () => clearTimeout(handle);
  },
};
