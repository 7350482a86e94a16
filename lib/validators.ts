import logger from './logger';
import { LineRule } from './types';

/** Returns the domain carried by a line, or `null` when the line is rejected. */
export type LineValidator = (line: string) => string | null;

// Applied to lower-cased text; \w also admits "_", which real lists contain.
export const DOMAIN_PATTERN = /^((xn--)?[a-z0-9_][\w-]*\.)+\w{2,}$/;

export function isValidDomain(s: string): boolean {
  return DOMAIN_PATTERN.test(s);
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Hosts-file style: `<address><whitespace><domain>`. The address must equal
 * `address` exactly; anything after the domain (comments, aliases) is ignored.
 */
export function hostLine(address: string): LineValidator {
  const validLine = new RegExp(`^(${escapeRegExp(address)})\\s+([\\w\\-.]+)`);
  return (line) => {
    const m = validLine.exec(line);
    if (m && isValidDomain(m[2])) return m[2];
    logger.debug({ line }, 'invalid line');
    return null;
  };
}

/** One bare domain per line. */
export function domainListLine(): LineValidator {
  return (line) => {
    if (isValidDomain(line)) return line;
    logger.debug({ line }, 'invalid domain');
    return null;
  };
}

export function createLineValidator(rule: LineRule): LineValidator {
  switch (rule.kind) {
    case 'hostLine':
      return hostLine(rule.address);
    case 'domainList':
      return domainListLine();
  }
}
