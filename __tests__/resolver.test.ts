import { ResolverError } from '../lib/errors';
import { createExistenceVerifier, queryResolver } from '../lib/resolver';
import { json, routeFetch, text } from './helpers/fetchMock';

const endpoint = 'https://dns.example.test/resolve';

describe('queryResolver', () => {
  afterEach(() => jest.restoreAllMocks());

  test('sends the domain as the name parameter and returns Status', async () => {
    const spy = routeFetch(() => json({ Status: 0, Answer: [] }));

    await expect(queryResolver('ads.example.com', { endpoint })).resolves.toBe(0);
    expect(spy.mock.calls[0][0]).toBe('https://dns.example.test/resolve?name=ads.example.com');
  });

  test('rejects non-200 responses', async () => {
    routeFetch(() => json({ Status: 0 }, 503));
    await expect(queryResolver('ads.example.com', { endpoint })).rejects.toThrow(
      'resolver query for ads.example.com failed: unexpected status code 503',
    );
  });

  test('rejects bodies that are not JSON', async () => {
    routeFetch(() => text('<html>rate limited</html>'));
    await expect(queryResolver('ads.example.com', { endpoint })).rejects.toBeInstanceOf(ResolverError);
  });

  test('rejects answers without a numeric Status', async () => {
    routeFetch(() => json({ Status: 'NXDOMAIN' }));
    await expect(queryResolver('ads.example.com', { endpoint })).rejects.toThrow('response has no numeric Status');
  });

  test('a body that stalls after the headers times out', async () => {
    routeFetch(() => {
      const stalled = new ReadableStream<Uint8Array>({
        start(c) {
          c.enqueue(new TextEncoder().encode('{"Sta'));
        },
      });
      return new Response(stalled, { status: 200 });
    });

    const err = await queryResolver('ads.example.com', { endpoint, timeoutMs: 50 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ResolverError);
    expect(err).toMatchObject({ reason: 'request failed' });
    expect(err instanceof Error ? err.cause : undefined).toEqual(
      new Error('request to https://dns.example.test/resolve?name=ads.example.com timed out after 50ms'),
    );
  });

  test('wraps transport errors', async () => {
    routeFetch(() => {
      throw new TypeError('fetch failed');
    });
    await expect(queryResolver('ads.example.com', { endpoint })).rejects.toThrow(
      'resolver query for ads.example.com failed: request failed',
    );
  });
});

describe('createExistenceVerifier', () => {
  afterEach(() => jest.restoreAllMocks());

  test('Status 3 means the domain does not exist', async () => {
    const spy = routeFetch(() => json({ Status: 3 }));
    const exists = createExistenceVerifier({ endpoint, sleep: async () => {} });

    await expect(exists('gone.example.com')).resolves.toBe(false);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  test('any other Status means the domain exists', async () => {
    routeFetch(() => json({ Status: 0 }));
    const exists = createExistenceVerifier({ endpoint, sleep: async () => {} });

    await expect(exists('ads.example.com')).resolves.toBe(true);
  });

  test('SERVFAIL is an answer, not an error', async () => {
    const spy = routeFetch(() => json({ Status: 2 }));
    const exists = createExistenceVerifier({ endpoint, sleep: async () => {} });

    await expect(exists('flaky.example.com')).resolves.toBe(true);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  test('errors are retried until an answer arrives', async () => {
    let calls = 0;
    const spy = routeFetch(() => {
      calls++;
      return calls === 1 ? json({}, 500) : json({ Status: 3 });
    });
    const exists = createExistenceVerifier({ endpoint, sleep: async () => {} });

    await expect(exists('gone.example.com')).resolves.toBe(false);
    expect(spy).toHaveBeenCalledTimes(2);
  });

  test('keeps the domain when every attempt fails', async () => {
    const spy = routeFetch(() => {
      throw new TypeError('fetch failed');
    });
    const sleep = jest.fn(async () => {});
    const exists = createExistenceVerifier({ endpoint, sleep });

    await expect(exists('ads.example.com')).resolves.toBe(true);
    expect(spy).toHaveBeenCalledTimes(10);
    expect(sleep).toHaveBeenCalledTimes(9);
    expect(sleep).toHaveBeenCalledWith(3000);
  });

  test('retry ceiling is configurable', async () => {
    const spy = routeFetch(() => json({}, 404));
    const exists = createExistenceVerifier({ endpoint, retries: 3, sleep: async () => {} });

    await expect(exists('ads.example.com')).resolves.toBe(true);
    expect(spy).toHaveBeenCalledTimes(3);
  });
});
