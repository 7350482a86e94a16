import { CONFIG } from './config';
import { fetchSourceText } from './sources/fetchSource';
import { FetchRetryOptions } from './net/fetchWithRetry';
import logger from './logger';
import { TldSnapshot } from './types';

export interface TldListPart {
  tlds: string[];
  suffixes: string[];
}

/**
 * IANA `tlds-alpha-by-domain.txt`: one label per line. The `#` header and
 * blank lines are skipped.
 */
export function parseTldList(text: string): TldListPart {
  const tlds: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim().toLowerCase();
    if (!line || line.startsWith('#')) continue;
    tlds.push(line);
  }
  return { tlds, suffixes: [] };
}

/**
 * Public suffix list: lines that don't start with [a-z0-9] (comments, wildcard
 * and exception rules, non-ASCII entries) are ignored. Single labels are exact
 * TLDs; everything else becomes a "."-prefixed suffix.
 */
export function parsePublicSuffixList(text: string): TldListPart {
  const part: TldListPart = { tlds: [], suffixes: [] };
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim().toLowerCase();
    if (!/^[a-z0-9]/.test(line)) continue;
    if (line.includes('.')) part.suffixes.push(`.${line}`);
    else part.tlds.push(line);
  }
  return part;
}

export function createTldSnapshot(parts: readonly TldListPart[]): TldSnapshot {
  const tlds = new Set<string>();
  const suffixes: string[] = [];
  for (const part of parts) {
    for (const t of part.tlds) tlds.add(t);
    suffixes.push(...part.suffixes);
  }
  return Object.freeze({ tlds, suffixes: Object.freeze(suffixes) });
}

export function matchesTld(snapshot: TldSnapshot, domain: string): boolean {
  const lastLabel = domain.slice(domain.lastIndexOf('.') + 1);
  if (snapshot.tlds.has(lastLabel)) return true;
  return snapshot.suffixes.some((suffix) => domain.endsWith(suffix));
}

export interface TldBootstrapOptions {
  tldsUrl?: string;
  publicSuffixUrl?: string;
  fetch?: FetchRetryOptions;
}

async function loadPart(
  url: string,
  parse: (text: string) => TldListPart,
  fetchOpts?: FetchRetryOptions,
): Promise<TldListPart> {
  const text = await fetchSourceText(url, fetchOpts);
  if (text === null) return { tlds: [], suffixes: [] };
  const part = parse(text);
  logger.info({ url, tlds: part.tlds.length, suffixes: part.suffixes.length }, 'loaded TLD reference data');
  return part;
}

/**
 * Download both reference lists concurrently and freeze the merged result.
 * A list that can't be fetched contributes nothing.
 */
export async function bootstrapTlds(opts?: TldBootstrapOptions): Promise<TldSnapshot> {
  const parts = await Promise.all([
    loadPart(opts?.tldsUrl ?? CONFIG.TLD.TLDS_URL, parseTldList, opts?.fetch),
    loadPart(opts?.publicSuffixUrl ?? CONFIG.TLD.PUBLIC_SUFFIX_URL, parsePublicSuffixList, opts?.fetch),
  ]);
  const snapshot = createTldSnapshot(parts);
  if (snapshot.tlds.size === 0 && snapshot.suffixes.length === 0) {
    logger.warn('no TLD reference data available, every domain will be rejected');
  }
  return snapshot;
}
