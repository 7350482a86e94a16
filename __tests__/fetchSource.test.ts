jest.mock('../lib/net/fetchWithRetry', () => ({
  fetchWithRetry: jest.fn(),
}));

import { FetchError } from '../lib/errors';
import { fetchWithRetry } from '../lib/net/fetchWithRetry';
import { fetchSourceText } from '../lib/sources/fetchSource';

const mockFetchWithRetry = fetchWithRetry as jest.MockedFunction<typeof fetchWithRetry>;

describe('fetchSourceText', () => {
  beforeEach(() => jest.resetAllMocks());

  test('returns the body text', async () => {
    mockFetchWithRetry.mockResolvedValueOnce('ads.example.com\ntracker.example.org\n');

    const result = await fetchSourceText('https://lists.example.test/domains.txt');

    expect(result).toBe('ads.example.com\ntracker.example.org\n');
  });

  test('sends the configured user agent and forwards retry options', async () => {
    mockFetchWithRetry.mockResolvedValueOnce('');
    const opts = { retries: 2, delayMs: 1 };

    await fetchSourceText('https://lists.example.test/domains.txt', opts);

    expect(mockFetchWithRetry).toHaveBeenCalledWith(
      'https://lists.example.test/domains.txt',
      { headers: { 'User-Agent': 'blocklist-aggregator/1.0' } },
      opts,
    );
  });

  test('returns null once retries are exhausted', async () => {
    mockFetchWithRetry.mockRejectedValueOnce(new FetchError('https://lists.example.test/domains.txt', 10));

    const result = await fetchSourceText('https://lists.example.test/domains.txt');

    expect(result).toBeNull();
  });
});
