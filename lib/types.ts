/** How the lines of a source are turned into domains. */
export type LineRule =
  | { kind: 'hostLine'; address: string } // "<address> <domain>" hosts-file lines
  | { kind: 'domainList' }; // one bare domain per line

export type WhitelistRuleKind = 'contains' | 'prefix' | 'suffix' | 'equal' | 'regex';

export interface WhitelistRule {
  kind: WhitelistRuleKind;
  pattern: string;
}

export interface SourceDescriptor {
  url: string;
  rule: LineRule;
}

export interface SourceStats {
  lines: number; // non-empty lines read
  accepted: number; // lines that passed every check, repeats included
  invalid: number;
  unknownTld: number;
  whitelisted: number;
}

export interface SourceResult {
  url: string;
  fetched: boolean;
  domains: Set<string>;
  stats: SourceStats;
}

/** Immutable public-suffix reference data, built once per run. */
export interface TldSnapshot {
  readonly tlds: ReadonlySet<string>; // exact-match top-level labels
  readonly suffixes: readonly string[]; // multi-label suffixes, each with a leading "."
}

export interface OutputFileNames {
  plain: string;
  plainWithoutShortlinks: string;
  optimized: string;
  optimizedWithoutShortlinks: string;
}
