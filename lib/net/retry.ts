export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions {
  attempts: number; // total attempts, including the first
  delayMs: number; // fixed pause between attempts
  sleep?: Sleep;
  onRetry?: (err: unknown, attempt: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, Math.max(0, Math.floor(ms))));
}

/**
 * Run `fn` until it resolves or `attempts` calls have failed, pausing a fixed
 * `delayMs` between calls. The last error is rethrown.
 */
export async function retryFixed<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const pause = opts.sleep ?? sleep;
  let attempt = 0;
  while (true) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= opts.attempts) throw err;
      opts.onRetry?.(err, attempt);
      await pause(opts.delayMs);
    }
  }
}

export default retryFixed;
