import { describe, expect, it, vi } from 'vitest';

import { FinnhubProvider } from '../../src/mastra/providers/finnhub-provider';

function respondWith(body: unknown) {
  const fetchMock = vi.fn(async (_url: string) => new Response(JSON.stringify(body), { status: 200 }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

const provider = new FinnhubProvider({ apiKey: 'test-secret', baseUrl: 'https://fh.example.test/api/v1' });

describe('FinnhubProvider', () => {
  it('parses a quote', async () => {
    const fetchMock = respondWith({ c: 250.5, d: -2.5, dp: -0.99, t: 1_792_000_000 });

    await expect(provider.fetchQuote('TSLA')).resolves.toEqual({
      ticker: 'TSLA',
      price: 250.5,
      currency: 'USD',
      timestamp: new Date(1_792_000_000_000),
      change: -2.5,
      changePercent: -0.99,
      volume: null,
    });
    const url = new URL(fetchMock.mock.calls[0]?.[0] ?? '');
    expect(url.pathname).toBe('/api/v1/quote');
    expect(url.searchParams.get('symbol')).toBe('TSLA');
    expect(url.searchParams.get('token')).toBe('test-secret');
  });

  it('reports an all-zero quote as NOT_FOUND', async () => {
    respondWith({ c: 0, d: null, dp: null, t: 0 });

    await expect(provider.fetchQuote('ZZZZ')).rejects.toMatchObject({ kind: 'NOT_FOUND' });
  });

  it('converts market capitalization from millions', async () => {
    respondWith({ ticker: 'JPM', name: 'JPMorgan Chase & Co', finnhubIndustry: 'Banking', marketCapitalization: 550_000, currency: 'USD' });

    await expect(provider.fetchProfile('JPM')).resolves.toEqual({
      ticker: 'JPM',
      name: 'JPMorgan Chase & Co',
      sector: 'Banking',
      industry: 'Banking',
      marketCap: 550_000_000_000,
      peRatio: null,
      currency: 'USD',
    });
  });

  it('reports an empty profile as NOT_FOUND', async () => {
    respondWith({});

    await expect(provider.fetchProfile('ZZZZ')).rejects.toMatchObject({ kind: 'NOT_FOUND' });
  });

  it('does not serve history', async () => {
    const fetchMock = respondWith({});

    await expect(provider.fetchHistory('AAPL')).rejects.toMatchObject({ kind: 'UNSUPPORTED' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('passes HTTP failures through as classified errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 403 })));

    await expect(provider.fetchQuote('AAPL')).rejects.toMatchObject({ kind: 'UNSUPPORTED', status: 403 });
  });
});
