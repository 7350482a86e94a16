import { fetchSourceText } from './fetchSource';
import { FetchRetryOptions } from '../net/fetchWithRetry';
import { createLineValidator, LineValidator } from '../validators';
import { matchesTld } from '../tld';
import { Whitelist } from '../whitelist';
import { incLines } from '../metrics';
import logger from '../logger';
import { SourceDescriptor, SourceResult, SourceStats, TldSnapshot } from '../types';

export interface ProcessContext {
  tlds: TldSnapshot;
  whitelist: Whitelist;
  fetch?: FetchRetryOptions;
}

function emptyStats(): SourceStats {
  return { lines: 0, accepted: 0, invalid: 0, unknownTld: 0, whitelisted: 0 };
}

/**
 * Filter raw lines down to candidate domains:
 * lower-case -> line validator -> TLD match -> whitelist.
 */
export function processLines(
  lines: Iterable<string>,
  validator: LineValidator,
  ctx: Pick<ProcessContext, 'tlds' | 'whitelist'>,
): { domains: Set<string>; stats: SourceStats } {
  const domains = new Set<string>();
  const stats = emptyStats();

  for (const raw of lines) {
    if (!raw.trim()) continue;
    stats.lines++;

    const domain = validator(raw.toLowerCase());
    if (domain === null) {
      stats.invalid++;
      continue;
    }

    if (!matchesTld(ctx.tlds, domain)) {
      logger.debug({ domain }, "don't match TLDs");
      stats.unknownTld++;
      continue;
    }

    const rule = ctx.whitelist.match(domain);
    if (rule) {
      logger.debug({ domain, rule }, 'in whitelist');
      stats.whitelisted++;
      continue;
    }

    stats.accepted++;
    domains.add(domain);
  }

  return { domains, stats };
}

export async function processSource(source: SourceDescriptor, ctx: ProcessContext): Promise<SourceResult> {
  const text = await fetchSourceText(source.url, ctx.fetch);
  if (text === null) {
    return { url: source.url, fetched: false, domains: new Set(), stats: emptyStats() };
  }

  const { domains, stats } = processLines(text.split(/\r?\n/), createLineValidator(source.rule), ctx);

  incLines('accepted', stats.accepted);
  incLines('invalid', stats.invalid);
  incLines('unknown_tld', stats.unknownTld);
  incLines('whitelisted', stats.whitelisted);
  logger.info({ url: source.url, ...stats, unique: domains.size }, 'source processed');

  return { url: source.url, fetched: true, domains, stats };
}

export default processSource;
