import { setTimeout as delay } from 'timers/promises';

/**
 * Source of time for every wait in the bridge.
 * Tests substitute a fake so that indefinite loops run without real sleeps.
 */
export interface Clock {
  now(): Date;
  /** Rejects with an AbortError if the signal fires before the delay ends. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => new Date(),
  sleep: async (ms, signal) => {
    await delay(ms, undefined, { signal });
  },
};

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
