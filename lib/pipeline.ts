import pLimit from 'p-limit';
import { CandidateSet, startAggregator } from './aggregator';
import { CONFIG } from './config';
import { Channel } from './net/channel';
import { FetchRetryOptions } from './net/fetchWithRetry';
import { ExistenceVerifier, createExistenceVerifier } from './resolver';
import { processSource, ProcessContext } from './sources/processSource';
import { bootstrapTlds, TldBootstrapOptions } from './tld';
import { Whitelist } from './whitelist';
import { setDomainCount, startStageTimer } from './metrics';
import logger from './logger';
import { SourceDescriptor, SourceResult, TldSnapshot } from './types';

export interface VerifyOptions {
  concurrency?: number; // in-flight existence checks
  bufferSize?: number; // aggregator channel capacity
}

/**
 * Stage A: one task per source, all started at once. Each task merges its
 * domains into the shared Candidate Set; the stage ends when every task has.
 */
export async function collectCandidates(
  sources: readonly SourceDescriptor[],
  ctx: ProcessContext,
): Promise<{ candidates: Set<string>; results: SourceResult[] }> {
  const candidateSet = new CandidateSet();
  const results = await Promise.all(
    sources.map(async (source) => {
      const result = await processSource(source, ctx);
      await candidateSet.merge(result.domains);
      return result;
    }),
  );
  return { candidates: candidateSet.snapshot(), results };
}

/**
 * Stage B: one existence check per candidate, at most `concurrency` in flight.
 * Domains that exist are sent to the aggregator; the channel is closed only
 * after every check has finished, and the result is read only after the
 * aggregator has drained it.
 */
export async function verifyCandidates(
  candidates: Iterable<string>,
  exists: ExistenceVerifier,
  opts?: VerifyOptions,
): Promise<Set<string>> {
  const limit = pLimit(opts?.concurrency ?? CONFIG.RESOLVER.CONCURRENCY);
  const channel = new Channel<string>(opts?.bufferSize ?? CONFIG.AGGREGATOR.BUFFER);
  const aggregator = startAggregator(channel);

  const tasks = Array.from(candidates, (domain) =>
    limit(async () => {
      let keep: boolean;
      try {
        keep = await exists(domain);
      } catch (err) {
        logger.warn({ err, domain }, 'existence check threw, keeping domain');
        keep = true;
      }
      if (keep) await channel.send(domain);
    }),
  );

  try {
    await Promise.all(tasks);
  } finally {
    channel.close();
  }
  return aggregator.done;
}

export interface PipelineOptions extends VerifyOptions {
  sources: readonly SourceDescriptor[];
  whitelist: Whitelist;
  tld?: TldBootstrapOptions;
  fetch?: FetchRetryOptions; // retry policy for source downloads
  verifier?: ExistenceVerifier;
}

export interface PipelineResult {
  tlds: TldSnapshot;
  sources: SourceResult[];
  candidates: Set<string>;
  finalDomains: Set<string>;
}

/**
 * TLD bootstrap -> Stage A -> Stage B. Each step starts only after the
 * previous one has fully completed.
 */
export async function runPipeline(opts: PipelineOptions): Promise<PipelineResult> {
  let stop = startStageTimer('tld_bootstrap');
  const tlds = await bootstrapTlds({ fetch: opts.fetch, ...opts.tld });
  stop();

  stop = startStageTimer('candidates');
  const { candidates, results } = await collectCandidates(opts.sources, {
    tlds,
    whitelist: opts.whitelist,
    fetch: opts.fetch,
  });
  stop();
  setDomainCount('candidates', candidates.size);
  logger.info(
    {
      sources: results.length,
      unavailable: results.filter((r) => !r.fetched).length,
      candidates: candidates.size,
    },
    'candidate collection finished',
  );

  stop = startStageTimer('verification');
  const finalDomains = await verifyCandidates(candidates, opts.verifier ?? createExistenceVerifier(), opts);
  stop();
  setDomainCount('verification', finalDomains.size);
  logger.info(
    { candidates: candidates.size, kept: finalDomains.size, dropped: candidates.size - finalDomains.size },
    'existence verification finished',
  );

  return { tlds, sources: results, candidates, finalDomains };
}
