import { InvokeError } from '../errors/index.js';
import { sleep } from './retry.js';

export interface PollOptions {
  intervalMs?: number;
  maxAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Call `fn` until it yields a value. There is no wait before the first call.
 */
export async function pollUntil<T>(fn: () => Promise<T | undefined>, options: PollOptions = {}): Promise<T> {
  const intervalMs = options.intervalMs ?? 1000;
  const maxAttempts = options.maxAttempts ?? 60;
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const result = await fn();
    if (result !== undefined) return result;
    if (attempt < maxAttempts) await wait(intervalMs);
  }

  throw new InvokeError(`Gave up after ${maxAttempts} attempts`);
}
