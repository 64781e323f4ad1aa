import { systemClock, type Clock } from './clock.js';

export interface RetryOptions {
  retries: number;
  delayMs: number;
  factor?: number;
  clock?: Clock;
}

export const withRetry = async <T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> => {
  let attempt = 0;
  const factor = options.factor ?? 1.8;
  const clock = options.clock ?? systemClock;

  while (true) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= options.retries) {
        throw error;
      }

      const delay = Math.floor(options.delayMs * Math.pow(factor, attempt));
      await clock.sleep(delay);
      attempt += 1;
    }
  }
};
