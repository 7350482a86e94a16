import { z } from 'zod';
import { CONFIG } from './config';
import { ResolverError } from './errors';
import { fetchOnce } from './net/fetchWithRetry';
import { retryFixed, Sleep } from './net/retry';
import { incResolverFailOpen, incResolverQuery } from './metrics';
import logger from './logger';

/** DNS RCODE 3: the queried name does not exist. */
export const NXDOMAIN = 3;

// DNS-over-HTTPS JSON answer; only the response code matters here.
const ResolverResponseSchema = z.object({
  Status: z.number().int(),
});

export type ExistenceVerifier = (domain: string) => Promise<boolean>;

export interface ResolverQueryOptions {
  endpoint?: string;
  timeoutMs?: number;
}

export interface ResolverOptions extends ResolverQueryOptions {
  retries?: number;
  delayMs?: number;
  sleep?: Sleep;
}

/**
 * One `GET <endpoint>?name=<domain>` round trip. Resolves with the answer's
 * `Status`; anything other than a 200 with a numeric `Status` is a `ResolverError`.
 */
export async function queryResolver(domain: string, opts?: ResolverQueryOptions): Promise<number> {
  const url = new URL(opts?.endpoint ?? CONFIG.RESOLVER.URL);
  url.searchParams.set('name', domain);

  let body: unknown;
  try {
    body = await fetchOnce(
      url.toString(),
      { headers: { accept: 'application/dns-json', 'User-Agent': CONFIG.USER_AGENT } },
      opts?.timeoutMs ?? CONFIG.RESOLVER.TIMEOUT_MS,
      async (res): Promise<unknown> => {
        if (res.status !== 200) {
          await res.body?.cancel();
          throw new ResolverError(domain, `unexpected status code ${res.status}`);
        }
        try {
          return await res.json();
        } catch (err) {
          throw new ResolverError(domain, 'unreadable response body', err);
        }
      },
    );
  } catch (err) {
    if (err instanceof ResolverError) throw err;
    throw new ResolverError(domain, 'request failed', err);
  }

  const parsed = ResolverResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ResolverError(domain, 'response has no numeric Status');
  }
  return parsed.data.Status;
}

/**
 * Build the existence check used by the verification stage.
 *
 * Every kind of failure is retried with a fixed delay. A domain is reported
 * missing only on an explicit NXDOMAIN answer; if no attempt gets an answer the
 * domain is reported as existing, so it stays on the blocklist.
 */
export function createExistenceVerifier(opts?: ResolverOptions): ExistenceVerifier {
  const attempts = opts?.retries ?? CONFIG.RESOLVER.RETRIES;
  const delayMs = opts?.delayMs ?? CONFIG.RESOLVER.RETRY_DELAY_MS;

  return async function exists(domain: string): Promise<boolean> {
    let status: number;
    try {
      status = await retryFixed(
        async () => {
          try {
            return await queryResolver(domain, opts);
          } catch (err) {
            incResolverQuery('error');
            throw err;
          }
        },
        {
          attempts,
          delayMs,
          sleep: opts?.sleep,
          onRetry: (err, attempt) => {
            logger.debug({ err, domain, attempt }, 'resolver query failed, retrying');
          },
        },
      );
    } catch (err) {
      incResolverFailOpen();
      logger.warn({ err, domain, attempts }, 'resolver gave no answer, keeping domain');
      return true;
    }

    if (status === NXDOMAIN) {
      incResolverQuery('nxdomain');
      logger.info({ domain }, 'resolver reports domain as non-existent');
      return false;
    }
    incResolverQuery('exists');
    return true;
  };
}

export default createExistenceVerifier;
