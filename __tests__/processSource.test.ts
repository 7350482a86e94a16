import { processLines, processSource } from '../lib/sources/processSource';
import { createTldSnapshot } from '../lib/tld';
import { hostLine, isValidDomain } from '../lib/validators';
import { createWhitelist } from '../lib/whitelist';
import { noSleep, routeFetch, text } from './helpers/fetchMock';

const tlds = createTldSnapshot([{ tlds: ['com', 'org'], suffixes: ['.co.uk'] }]);
const whitelist = createWhitelist([{ kind: 'suffix', pattern: '.googlevideo.com' }]);

describe('processLines', () => {
  test('validates, filters and deduplicates', () => {
    const lines = [
      '# blocked hosts',
      '',
      '0.0.0.0 ADS.Example.com',
      '0.0.0.0 v1.googlevideo.com',
      '1.2.3.4 other.com',
      '0.0.0.0 thing.unknowntld',
      '0.0.0.0 ads.example.com',
      '0.0.0.0 tracker.example.co.uk',
    ];

    const { domains, stats } = processLines(lines, hostLine('0.0.0.0'), { tlds, whitelist });

    expect([...domains].sort()).toEqual(['ads.example.com', 'tracker.example.co.uk']);
    expect(stats).toEqual({ lines: 7, accepted: 3, invalid: 2, unknownTld: 1, whitelisted: 1 });
  });

  test('accepted counts every passing line while domains holds each once', () => {
    const { domains, stats } = processLines(
      ['ads.example.com', 'ads.example.com', 'ADS.EXAMPLE.COM'],
      (line) => line,
      { tlds, whitelist },
    );
    expect(domains).toEqual(new Set(['ads.example.com']));
    expect(stats.accepted).toBe(3);
  });

  test('whitelisted domains are dropped even when they pass every other check', () => {
    const { domains, stats } = processLines(['0.0.0.0 v1.googlevideo.com'], hostLine('0.0.0.0'), { tlds, whitelist });
    expect(domains.size).toBe(0);
    expect(stats.whitelisted).toBe(1);
  });

  test('accepted domains are lower-case and well formed', () => {
    const { domains } = processLines(
      ['0.0.0.0 MiXeD.Example.ORG', '0.0.0.0 UPPER.EXAMPLE.COM'],
      hostLine('0.0.0.0'),
      { tlds, whitelist },
    );
    expect(domains.size).toBe(2);
    for (const d of domains) {
      expect(d).toBe(d.toLowerCase());
      expect(isValidDomain(d)).toBe(true);
    }
  });
});

describe('processSource', () => {
  afterEach(() => jest.restoreAllMocks());

  test('downloads and processes a domain list with CRLF line endings', async () => {
    routeFetch(() => text('ads.example.com\r\ntracker.example.org\r\nnot a domain\r\n'));

    const result = await processSource(
      { url: 'https://lists.example.test/domains.txt', rule: { kind: 'domainList' } },
      { tlds, whitelist, fetch: { sleep: noSleep } },
    );

    expect(result.fetched).toBe(true);
    expect([...result.domains].sort()).toEqual(['ads.example.com', 'tracker.example.org']);
    expect(result.stats).toEqual({ lines: 3, accepted: 2, invalid: 1, unknownTld: 0, whitelisted: 0 });
  });

  test('an unreachable source contributes nothing', async () => {
    routeFetch(() => {
      throw new TypeError('fetch failed');
    });

    const result = await processSource(
      { url: 'https://down.example.test/hosts', rule: { kind: 'hostLine', address: '127.0.0.1' } },
      { tlds, whitelist, fetch: { retries: 2, sleep: noSleep } },
    );

    expect(result).toEqual({
      url: 'https://down.example.test/hosts',
      fetched: false,
      domains: new Set(),
      stats: { lines: 0, accepted: 0, invalid: 0, unknownTld: 0, whitelisted: 0 },
    });
  });
});
