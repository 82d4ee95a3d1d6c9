import { EventEmitter } from 'events';

const mockRedis = Object.assign(new EventEmitter(), {
  incr: jest.fn(),
  pexpire: jest.fn(),
  pttl: jest.fn(),
  disconnect: jest.fn(),
});

jest.mock('ioredis', () => {
  return jest.fn(() => mockRedis);
});

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

jest.mock('bottleneck', () => {
  return jest.fn().mockImplementation(() => ({
    schedule: (fn: () => unknown) => fn(),
    on: jest.fn(),
  }));
});

import { AxiosInstance } from 'axios';
import {
  createFetchNewsTool,
  MemoryRateLimitStore,
  ServiceConfig,
  NEWS_URL,
} from '@/index';

const config: ServiceConfig = {
  nodeEnv: 'test',
  cryptoCompareApiKey: 'test-key',
  valkey: { host: '127.0.0.1', port: 6379 },
  rateLimit: { maxRequests: 1, intervalMinutes: 15 },
};

describe('createFetchNewsTool (unit)', () => {
  /**
   * Purpose:
   * Verifies the wired tool end to end:
   * - first call reaches the API and maps the feed
   * - second call from the same agent is rate limited
   * - another agent is unaffected
   */
  test('wires the API client and rate limiter together', async () => {
    const get = jest.fn().mockResolvedValue({
      data: {
        Data: [
          {
            id: 77,
            title: 'Solana upgrade ships',
            body: 'Validators adopted the release.',
            published_on: 1700000100,
            url: 'https://example.com/news/77',
            source: 'examplewire',
            categories: 'SOL|Technology',
          },
        ],
      },
    });
    const now = Date.parse('2025-01-01T10:00:00Z');

    const tool = createFetchNewsTool(config, {
      axiosClient: { get } as unknown as AxiosInstance,
      store: new MemoryRateLimitStore(() => now),
      now: () => now,
    });

    const first = await tool.invoke({ token: 'SOL' }, { agent: { id: 'agent-1' } });
    const second = await tool.invoke({ token: 'SOL' }, { agent: { id: 'agent-1' } });
    const other = await tool.invoke({ token: 'SOL' }, { agent: { id: 'agent-2' } });

    expect(first).toEqual({
      status: 'success',
      articles: [
        {
          id: '77',
          title: 'Solana upgrade ships',
          body: 'Validators adopted the release.',
          publishedAt: 1700000100,
          url: 'https://example.com/news/77',
          source: 'examplewire',
          categories: ['SOL', 'Technology'],
        },
      ],
    });
    expect(second).toEqual({
      status: 'error',
      kind: 'rate_limited',
      error: 'Rate limit exceeded',
    });
    expect(other.status).toBe('success');

    expect(get).toHaveBeenCalledTimes(2);
    expect(get).toHaveBeenCalledWith(
      NEWS_URL,
      expect.objectContaining({
        headers: expect.objectContaining({ authorization: 'Apikey test-key' }),
        params: expect.objectContaining({
          categories: 'SOL',
          lTs: Math.floor(now / 1000),
        }),
      })
    );
  });

  /**
   * Purpose:
   * Verifies the default Valkey store can be released:
   * - shutting the tool down disconnects the ioredis client
   */
  test('disconnects the default Valkey store on shutdown', () => {
    const tool = createFetchNewsTool(config, {
      axiosClient: { get: jest.fn() } as unknown as AxiosInstance,
    });

    expect(mockRedis.disconnect).not.toHaveBeenCalled();

    tool.shutdown();

    expect(mockRedis.disconnect).toHaveBeenCalledTimes(1);
  });
});
