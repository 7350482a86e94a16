// Centralized runtime configuration for timeouts, retry policy, concurrency and paths.
// Values are read from env with sane defaults and can be overridden in tests.

// `min` is 0 for delays, where no pause at all is a valid setting.
function envInt(name: string, fallback: number, min = 1): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isInteger(n) && n >= min ? n : fallback;
}

function envStr(name: string, fallback: string): string {
  const v = process.env[name];
  return v ? v : fallback;
}

export const CONFIG = {
  HTTP_TIMEOUT_MS: envInt('HTTP_TIMEOUT_MS', 60_000),
  USER_AGENT: envStr('USER_AGENT', 'blocklist-aggregator/1.0'),

  SOURCE: {
    RETRIES: envInt('SOURCE_RETRIES', 10),
    RETRY_DELAY_MS: envInt('SOURCE_RETRY_DELAY_MS', 5000, 0),
  },

  TLD: {
    TLDS_URL: envStr('TLDS_URL', 'http://data.iana.org/TLD/tlds-alpha-by-domain.txt'),
    PUBLIC_SUFFIX_URL: envStr('PUBLIC_SUFFIX_URL', 'https://publicsuffix.org/list/effective_tld_names.dat'),
  },

  RESOLVER: {
    URL: envStr('RESOLVER_URL', 'https://dns.google.com/resolve'),
    RETRIES: envInt('RESOLVER_RETRIES', 10),
    RETRY_DELAY_MS: envInt('RESOLVER_RETRY_DELAY_MS', 3000, 0),
    TIMEOUT_MS: envInt('RESOLVER_TIMEOUT_MS', 10_000),
    CONCURRENCY: envInt('RESOLVER_CONCURRENCY', 50),
  },

  AGGREGATOR: {
    BUFFER: envInt('AGGREGATOR_BUFFER', 20),
  },

  BLOCKLIST_CONFIG: envStr('BLOCKLIST_CONFIG', 'config/blocklist.json'),
  OUTPUT_DIR: envStr('OUTPUT_DIR', '.'),
  METRICS_FILE: process.env.METRICS_FILE || null,
};

export default CONFIG;
