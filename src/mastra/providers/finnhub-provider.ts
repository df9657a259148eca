// ============================================================================
// FINNHUB PROVIDER
// ============================================================================
// Keyed tertiary source. Candles need a paid plan, so HISTORY is reported
// as UNSUPPORTED and the gateway moves on without retrying.
// Finnhub answers unknown symbols with an all-zero quote or an empty object.
// ============================================================================

import { z } from 'zod';

import { ProviderError } from '../errors';
import type { CompanyProfile, PriceHistory, StockQuote } from '../types';
import { fetchJson } from './http';
import type { MarketDataProvider } from './types';

const FINNHUB_BASE = 'https://finnhub.io/api/v1';

const quoteSchema = z.object({
  c: z.number().nullish(), // current price
  d: z.number().nullish(), // change
  dp: z.number().nullish(), // percent change
  t: z.number().nullish(), // unix seconds
});

const profileSchema = z.object({
  ticker: z.string().optional(),
  name: z.string().optional(),
  finnhubIndustry: z.string().optional(),
  marketCapitalization: z.number().optional(), // millions
  currency: z.string().optional(),
});

export interface FinnhubProviderOptions {
  apiKey: string;
  baseUrl?: string;
}

export class FinnhubProvider implements MarketDataProvider {
  readonly id = 'finnhub';
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: FinnhubProviderOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? FINNHUB_BASE;
  }

  async fetchQuote(ticker: string, signal?: AbortSignal): Promise<StockQuote> {
    const parsed = quoteSchema.safeParse(await this.get('/quote', ticker, signal));
    if (!parsed.success) {
      throw new ProviderError('TRANSIENT_NETWORK', `finnhub: unexpected quote response for ${ticker}`);
    }

    const { c, d, dp, t } = parsed.data;
    if (!c || !t) {
      throw new ProviderError('NOT_FOUND', `finnhub: no quote for ${ticker}`);
    }

    return {
      ticker,
      price: c,
      currency: 'USD',
      timestamp: new Date(t * 1000),
      change: d ?? null,
      changePercent: dp ?? null,
      volume: null,
    };
  }

  async fetchProfile(ticker: string, signal?: AbortSignal): Promise<CompanyProfile> {
    const parsed = profileSchema.safeParse(await this.get('/stock/profile2', ticker, signal));
    if (!parsed.success) {
      throw new ProviderError('TRANSIENT_NETWORK', `finnhub: unexpected profile response for ${ticker}`);
    }

    const profile = parsed.data;
    if (!profile.ticker && !profile.name) {
      throw new ProviderError('NOT_FOUND', `finnhub: no profile for ${ticker}`);
    }

    return {
      ticker,
      name: profile.name ?? ticker,
      sector: profile.finnhubIndustry ?? null,
      industry: profile.finnhubIndustry ?? null,
      marketCap: profile.marketCapitalization !== undefined ? profile.marketCapitalization * 1_000_000 : null,
      peRatio: null,
      currency: profile.currency ?? null,
    };
  }

  async fetchHistory(ticker: string): Promise<PriceHistory> {
    throw new ProviderError('UNSUPPORTED', `finnhub: price history is not available for ${ticker} on this plan`);
  }

  private async get(path: string, ticker: string, signal?: AbortSignal): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    url.searchParams.set('symbol', ticker);
    url.searchParams.set('token', this.apiKey);
    return fetchJson(url, { providerId: this.id, signal });
  }
}
