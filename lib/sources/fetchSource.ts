import { fetchWithRetry, FetchRetryOptions } from '../net/fetchWithRetry';
import { incSourceFetch } from '../metrics';
import logger from '../logger';
import { CONFIG } from '../config';

/**
 * Common wrapper for list downloads (sources and TLD reference data).
 * Returns the whole body as text, or `null` once every attempt has failed;
 * a missing list is never fatal to the run.
 */
export async function fetchSourceText(url: string, opts?: FetchRetryOptions): Promise<string | null> {
  try {
    const text = await fetchWithRetry(url, { headers: { 'User-Agent': CONFIG.USER_AGENT } }, opts);
    incSourceFetch(true);
    return text;
  } catch (err) {
    incSourceFetch(false);
    logger.warn({ err, url }, 'list download failed, skipping');
    return null;
  }
}

export default fetchSourceText;
