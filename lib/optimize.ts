/**
 * Every proper parent of `domain` at a label boundary, nearest first:
 * "a.b.example.com" -> ["b.example.com", "example.com", "com"].
 */
export function parentDomains(domain: string): string[] {
  const labels = domain.split('.');
  const parents: string[] = [];
  for (let i = 1; i < labels.length; i++) {
    parents.push(labels.slice(i).join('.'));
  }
  return parents;
}

/** True when a strict ancestor of `domain` is itself in `domains`. */
export function isCoveredByParent(domain: string, domains: ReadonlySet<string>): boolean {
  return parentDomains(domain).some((parent) => domains.has(parent));
}

/**
 * Drop every domain already covered by a blocked ancestor. The result is
 * unordered; callers sort before writing.
 */
export function optimize(domains: ReadonlySet<string>): string[] {
  const kept: string[] = [];
  for (const domain of domains) {
    if (!isCoveredByParent(domain, domains)) kept.push(domain);
  }
  return kept;
}
