import { CONFIG } from '../config';
import { FetchError } from '../errors';
import logger from '../logger';
import { retryFixed, Sleep } from './retry';

export interface FetchRetryOptions {
  retries?: number; // total attempts
  delayMs?: number; // fixed delay between attempts
  timeoutMs?: number; // per-request timeout, body included
  sleep?: Sleep;
}

export type BodyReader<T> = (res: Response) => Promise<T>;

/**
 * Single request with an abort-based timeout. `read` runs inside the timed
 * section, so a body that stalls after the headers still fails the request.
 */
export async function fetchOnce<T>(
  url: string,
  init: RequestInit | undefined,
  timeoutMs: number,
  read: BodyReader<T>,
): Promise<T> {
  const controller = new AbortController();
  let id: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<never>((_, reject) => {
    id = setTimeout(() => {
      const err = new Error(`request to ${url} timed out after ${timeoutMs}ms`);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fetch(url, { ...(init || {}), signal: controller.signal }).then(read), timedOut]);
  } finally {
    clearTimeout(id);
  }
}

async function readOkText(res: Response): Promise<string> {
  if (!res.ok) {
    await res.body?.cancel();
    throw new Error(`HTTP ${res.status}`);
  }
  return res.text();
}

/**
 * Download a body as text with a fixed-delay retry loop. Network errors,
 * timeouts, non-2xx responses and failures while reading the body all count
 * as failed attempts. Throws `FetchError` once every attempt has failed.
 */
export async function fetchWithRetry(url: string, init?: RequestInit, opts?: FetchRetryOptions): Promise<string> {
  const retries = opts?.retries ?? CONFIG.SOURCE.RETRIES;
  const delayMs = opts?.delayMs ?? CONFIG.SOURCE.RETRY_DELAY_MS;
  const timeoutMs = opts?.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS;

  try {
    return await retryFixed(() => fetchOnce(url, init, timeoutMs, readOkText), {
      attempts: retries,
      delayMs,
      sleep: opts?.sleep,
      onRetry: (err, attempt) => {
        logger.debug({ url, attempt, err, delayMs }, 'fetchWithRetry attempt failed, retrying');
      },
    });
  } catch (err) {
    throw new FetchError(url, retries, err);
  }
}

export default fetchWithRetry;
