import { setTimeout as sleep } from 'node:timers/promises';

export interface RetryOptions {
  attempts?: number;
  delayMs?: number;
  isTransient?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number) => void;
}

/**
 * Runs `fn` up to `attempts` times (two by default), pausing `delayMs`
 * between tries. Errors that `isTransient` rejects are rethrown at once.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, opts.attempts ?? 2);
  const delayMs = opts.delayMs ?? 250;
  const isTransient = opts.isTransient ?? (() => true);

  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await fn();
    } catch (err) {
      if (attempt >= attempts || !isTransient(err)) throw err;
      opts.onRetry?.(err, attempt);
      if (delayMs > 0) await sleep(delayMs, undefined, { ref: false });
    }
  }
}
