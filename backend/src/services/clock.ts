import { setTimeout as delay } from "node:timers/promises";

/** Time source for cooldowns, connection polling and teardown grace delays. */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms: number) {
    await delay(ms);
  }
};
