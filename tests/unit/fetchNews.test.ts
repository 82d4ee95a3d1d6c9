jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

// Execute Bottleneck jobs immediately (no timing concerns in unit tests)
jest.mock('bottleneck', () => {
  return jest.fn().mockImplementation(() => ({
    schedule: (fn: () => unknown) => fn(),
    on: jest.fn(),
  }));
});

import { AxiosInstance } from 'axios';
import { fetchNews, NEWS_URL } from '@/modules/fetchNews';

const createAxiosClient = () => {
  const get = jest.fn();
  return { get, client: { get } as unknown as AxiosInstance };
};

describe('fetchNews (unit)', () => {
  /**
   * Purpose:
   * Verifies the outbound request shape:
   * - news endpoint with token, timestamp and language
   * - api key sent in the authorization header
   */
  test('requests the news endpoint with token, timestamp and api key', async () => {
    const { get, client } = createAxiosClient();
    get.mockResolvedValue({ data: { Data: [] } });

    await fetchNews({
      axiosClient: client,
      apiKey: 'test-key',
      token: 'BTC',
      timestamp: 1700000000,
    });

    expect(get).toHaveBeenCalledWith(NEWS_URL, {
      headers: {
        Accept: 'application/json',
        authorization: 'Apikey test-key',
      },
      params: {
        lang: 'EN',
        lTs: 1700000000,
        categories: 'BTC',
        sign: true,
      },
    });
  });

  test('returns the response body untouched', async () => {
    const { get, client } = createAxiosClient();
    const body = { Type: 100, Data: [{ id: 1 }] };
    get.mockResolvedValue({ data: body });

    const result = await fetchNews({
      axiosClient: client,
      apiKey: 'test-key',
      token: 'ETH',
      timestamp: 1,
    });

    expect(result).toBe(body);
  });

  test('turns an HTTP error status into a readable error', async () => {
    const { get, client } = createAxiosClient();
    get.mockRejectedValue({
      isAxiosError: true,
      message: 'Request failed with status code 401',
      response: { status: 401 },
    });

    await expect(
      fetchNews({ axiosClient: client, apiKey: 'bad', token: 'BTC', timestamp: 1 })
    ).rejects.toThrow('CryptoCompare API request failed with status 401');
  });

  test('rethrows transport errors unchanged', async () => {
    const { get, client } = createAxiosClient();
    const err = new Error('timeout of 10000ms exceeded');
    get.mockRejectedValue(err);

    await expect(
      fetchNews({ axiosClient: client, apiKey: 'k', token: 'BTC', timestamp: 1 })
    ).rejects.toBe(err);
  });
});
