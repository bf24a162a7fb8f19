import { setTimeout as delay } from "node:timers/promises";

export type Pause = () => Promise<number>;

export interface JitterOptions {
  maxSeconds: number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Pause a random whole number of seconds in [0, maxSeconds] to spread
 * API calls out. Resolves with the seconds slept.
 */
export function createJitter({ maxSeconds, random = Math.random, sleep }: JitterOptions): Pause {
  const max = Math.max(0, Math.floor(maxSeconds));
  const wait = sleep ?? ((ms: number) => delay(ms));
  return async () => {
    if (max === 0) {
      return 0;
    }
    const seconds = Math.min(max, Math.floor(random() * (max + 1)));
    if (seconds > 0) {
      await wait(seconds * 1000);
    }
    return seconds;
  };
}
