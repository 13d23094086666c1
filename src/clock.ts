import { setTimeout as delay } from "node:timers/promises";

/** Time source for health polling and restart back-off; tests swap in a manual one. */
export interface Clock {
  now(): number;
  /** Resolves after `ms`; rejects with an AbortError once `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    await delay(ms, undefined, { signal });
  },
};
