import { ConfigError } from './errors';
import { WhitelistRule } from './types';

export interface Whitelist {
  /** First rule matching `domain`, in configured order. */
  match(domain: string): WhitelistRule | undefined;
  isWhitelisted(domain: string): boolean;
}

type Predicate = (domain: string) => boolean;

function compileRule(rule: WhitelistRule): Predicate {
  const { pattern } = rule;
  switch (rule.kind) {
    case 'contains':
      return (d) => d.includes(pattern);
    case 'prefix':
      return (d) => d.startsWith(pattern);
    case 'suffix':
      return (d) => d.endsWith(pattern);
    case 'equal':
      return (d) => d === pattern;
    case 'regex': {
      let re: RegExp;
      try {
        re = new RegExp(pattern);
      } catch (err) {
        throw new ConfigError(`invalid whitelist regex ${JSON.stringify(pattern)}`, { cause: err });
      }
      return (d) => re.test(d);
    }
  }
}

export function createWhitelist(rules: readonly WhitelistRule[]): Whitelist {
  const compiled = rules.map((rule) => ({ rule, test: compileRule(rule) }));
  const match = (domain: string) => compiled.find((c) => c.test(domain))?.rule;
  return {
    match,
    isWhitelisted: (domain) => match(domain) !== undefined,
  };
}
