/**
 * Prometheus metrics for a pipeline run, using `prom-client`.
 *
 * Metrics:
 * - `blocklist_source_fetch_total{result}` (Counter): ok / failed per source or TLD list
 * - `blocklist_lines_total{outcome}` (Counter): accepted / invalid / unknown_tld / whitelisted
 * - `blocklist_resolver_queries_total{result}` (Counter): exists / nxdomain / error per attempt
 * - `blocklist_resolver_fail_open_total` (Counter): domains kept after every attempt failed
 * - `blocklist_domains{stage}` (Gauge): set sizes after each stage
 * - `blocklist_stage_duration_seconds{stage}` (Histogram)
 *
 * The CLI can dump `register.metrics()` into a node_exporter textfile.
 */

import { Counter, Gauge, Histogram, register } from 'prom-client';

export type LineOutcome = 'accepted' | 'invalid' | 'unknown_tld' | 'whitelisted';
export type ResolverResult = 'exists' | 'nxdomain' | 'error';
export type Stage = 'tld_bootstrap' | 'candidates' | 'verification' | 'final' | 'optimized';

export const sourceFetchTotal = new Counter({
  name: 'blocklist_source_fetch_total',
  help: 'Source and reference list downloads by result',
  labelNames: ['result'] as const,
});

export const linesTotal = new Counter({
  name: 'blocklist_lines_total',
  help: 'Source lines by validation outcome',
  labelNames: ['outcome'] as const,
});

export const resolverQueriesTotal = new Counter({
  name: 'blocklist_resolver_queries_total',
  help: 'Existence queries against the resolver by result',
  labelNames: ['result'] as const,
});

export const resolverFailOpenTotal = new Counter({
  name: 'blocklist_resolver_fail_open_total',
  help: 'Domains kept because the resolver never gave a usable answer',
});

export const domainsGauge = new Gauge({
  name: 'blocklist_domains',
  help: 'Number of domains after each pipeline stage',
  labelNames: ['stage'] as const,
});

export const stageDuration = new Histogram({
  name: 'blocklist_stage_duration_seconds',
  help: 'Wall-clock duration of pipeline stages in seconds',
  labelNames: ['stage'] as const,
  buckets: [0.1, 0.5, 1, 5, 15, 30, 60, 120, 300, 600, 1800],
});

export function incSourceFetch(ok: boolean): void {
  sourceFetchTotal.inc({ result: ok ? 'ok' : 'failed' });
}

export function incLines(outcome: LineOutcome, count = 1): void {
  if (count > 0) linesTotal.inc({ outcome }, count);
}

export function incResolverQuery(result: ResolverResult): void {
  resolverQueriesTotal.inc({ result });
}

export function incResolverFailOpen(): void {
  resolverFailOpenTotal.inc();
}

export function setDomainCount(stage: Stage, count: number): void {
  domainsGauge.set({ stage }, count);
}

/**
 * Start a stage timer; call the returned function when the stage ends.
 */
export function startStageTimer(stage: Stage): () => void {
  const end = stageDuration.startTimer({ stage });
  return () => {
    end();
  };
}

export { register };
