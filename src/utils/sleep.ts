import { setTimeout as delay } from 'node:timers/promises';
import type { SleepFn } from '../types.js';

export const sleep: SleepFn = async (ms) => {
  if (ms > 0) {
    await delay(ms);
  }
};
