import { setTimeout as delay } from 'node:timers/promises';

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number): Promise<void> => {
    if (ms > 0) {
      await delay(ms);
    }
  },
};
