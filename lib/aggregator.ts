import { Mutex } from './net/mutex';

/**
 * Candidate Set shared by the source tasks. Writes are rare (one per source
 * batch) so a mutex around the set is enough.
 */
export class CandidateSet {
  private readonly domains = new Set<string>();
  private readonly mutex = new Mutex();

  /** Merge one source's domains; resolves with the new set size. */
  merge(batch: Iterable<string>): Promise<number> {
    return this.mutex.runExclusive(() => {
      for (const d of batch) this.domains.add(d);
      return this.domains.size;
    });
  }

  /** Copy of the current contents; only meaningful after every merge has resolved. */
  snapshot(): Set<string> {
    return new Set(this.domains);
  }
}

export interface Aggregator {
  /** Resolves with the Final Domain Set once the channel is closed and drained. */
  readonly done: Promise<Set<string>>;
}

/**
 * Start the single consumer that owns the Final Domain Set. Producers never
 * touch the set; they send domains through `channel`.
 */
export function startAggregator(channel: AsyncIterable<string>): Aggregator {
  const done = (async () => {
    const finalDomains = new Set<string>();
    for await (const domain of channel) {
      finalDomains.add(domain);
    }
    return finalDomains;
  })();
  return { done };
}
