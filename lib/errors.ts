/**
 * Error types raised inside the pipeline. None of them abort a run except
 * `ConfigError`; the others are caught at the stage that owns the unit of work.
 */

export class FetchError extends Error {
  readonly name = 'FetchError';

  constructor(
    readonly url: string,
    readonly attempts: number,
    cause?: unknown,
  ) {
    super(`failed to fetch ${url} after ${attempts} attempt(s): ${describe(cause)}`, { cause });
  }
}

export class ResolverError extends Error {
  readonly name = 'ResolverError';

  constructor(
    readonly domain: string,
    readonly reason: string,
    cause?: unknown,
  ) {
    super(`resolver query for ${domain} failed: ${reason}`, { cause });
  }
}

export class ChannelClosedError extends Error {
  readonly name = 'ChannelClosedError';

  constructor() {
    super('send on closed channel');
  }
}

export class ConfigError extends Error {
  readonly name = 'ConfigError';
}

function describe(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return cause === undefined ? 'unknown error' : String(cause);
}
