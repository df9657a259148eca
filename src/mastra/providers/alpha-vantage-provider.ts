// ============================================================================
// ALPHA VANTAGE PROVIDER
// ============================================================================
// Keyed secondary source. Alpha Vantage answers HTTP 200 for almost
// everything, so throttling and unknown symbols are detected from the body:
//   - "Note" / "Information" mentioning call frequency → RATE_LIMITED
//   - "Error Message" or an empty payload             → NOT_FOUND
// ============================================================================

import { z } from 'zod';

import { ProviderError } from '../errors';
import type { CompanyProfile, HistoryRange, PriceHistory, PricePoint, StockQuote } from '../types';
import { fetchJson, parseNumber } from './http';
import { rangeStartDate, type MarketDataProvider } from './types';

const ALPHA_VANTAGE_BASE = 'https://www.alphavantage.co/query';

const envelopeSchema = z
  .object({
    Note: z.string().optional(),
    Information: z.string().optional(),
    'Error Message': z.string().optional(),
  })
  .passthrough();

const globalQuoteSchema = z.object({
  'Global Quote': z
    .object({
      '05. price': z.string().optional(),
      '06. volume': z.string().optional(),
      '07. latest trading day': z.string().optional(),
      '09. change': z.string().optional(),
      '10. change percent': z.string().optional(),
    })
    .optional(),
});

const overviewSchema = z.object({
  Symbol: z.string().optional(),
  Name: z.string().optional(),
  Sector: z.string().optional(),
  Industry: z.string().optional(),
  MarketCapitalization: z.string().optional(),
  PERatio: z.string().optional(),
  Currency: z.string().optional(),
});

const dailySeriesSchema = z.object({
  'Time Series (Daily)': z
    .record(
      z.object({
        '2. high': z.string(),
        '3. low': z.string(),
        '4. close': z.string(),
        '5. volume': z.string().optional(),
      }),
    )
    .optional(),
});

export interface AlphaVantageProviderOptions {
  apiKey: string;
  baseUrl?: string;
}

export class AlphaVantageProvider implements MarketDataProvider {
  readonly id = 'alpha-vantage';
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: AlphaVantageProviderOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? ALPHA_VANTAGE_BASE;
  }

  async fetchQuote(ticker: string, signal?: AbortSignal): Promise<StockQuote> {
    const body = globalQuoteSchema.parse(await this.query('GLOBAL_QUOTE', ticker, {}, signal));
    const quote = body['Global Quote'];
    const price = parseNumber(quote?.['05. price']);

    if (!quote || price === null) {
      throw new ProviderError('NOT_FOUND', `alpha-vantage: no quote for ${ticker}`);
    }

    const tradingDay = quote['07. latest trading day'];
    return {
      ticker,
      price,
      currency: 'USD',
      timestamp: tradingDay ? new Date(`${tradingDay}T00:00:00Z`) : new Date(),
      change: parseNumber(quote['09. change']),
      changePercent: parseNumber(quote['10. change percent']),
      volume: parseNumber(quote['06. volume']),
    };
  }

  async fetchProfile(ticker: string, signal?: AbortSignal): Promise<CompanyProfile> {
    const body = overviewSchema.parse(await this.query('OVERVIEW', ticker, {}, signal));

    if (!body.Symbol) {
      throw new ProviderError('NOT_FOUND', `alpha-vantage: no company overview for ${ticker}`);
    }

    return {
      ticker,
      name: body.Name ?? ticker,
      sector: body.Sector ?? null,
      industry: body.Industry ?? null,
      marketCap: parseNumber(body.MarketCapitalization),
      peRatio: parseNumber(body.PERatio),
      currency: body.Currency ?? null,
    };
  }

  async fetchHistory(ticker: string, range: HistoryRange, signal?: AbortSignal): Promise<PriceHistory> {
    const outputsize = range === '1mo' || range === '3mo' ? 'compact' : 'full';
    const body = dailySeriesSchema.parse(await this.query('TIME_SERIES_DAILY', ticker, { outputsize }, signal));
    const series = body['Time Series (Daily)'];

    if (!series) {
      throw new ProviderError('NOT_FOUND', `alpha-vantage: no price history for ${ticker}`);
    }

    const start = rangeStartDate(range).getTime();
    const points: PricePoint[] = [];
    for (const [day, bar] of Object.entries(series)) {
      const date = new Date(`${day}T00:00:00Z`);
      const close = parseNumber(bar['4. close']);
      if (close === null || date.getTime() < start) continue;
      points.push({
        date,
        close,
        high: parseNumber(bar['2. high']),
        low: parseNumber(bar['3. low']),
        volume: parseNumber(bar['5. volume']),
      });
    }
    points.sort((a, b) => a.date.getTime() - b.date.getTime());

    if (points.length === 0) {
      throw new ProviderError('NOT_FOUND', `alpha-vantage: empty price history for ${ticker}`);
    }

    return { ticker, range, points };
  }

  private async query(
    fn: string,
    ticker: string,
    params: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const url = new URL(this.baseUrl);
    url.searchParams.set('function', fn);
    url.searchParams.set('symbol', ticker);
    url.searchParams.set('apikey', this.apiKey);
    for (const [k, v] of Object.entries(params)) {
      url.searchParams.set(k, v);
    }

    const body = await fetchJson(url, { providerId: this.id, signal });
    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new ProviderError('TRANSIENT_NETWORK', `alpha-vantage: unexpected response for ${ticker}`);
    }

    const notice = envelope.data.Note ?? envelope.data.Information;
    if (notice) {
      // Daily-limit notices mention the premium plans too; premium-only endpoints are UNSUPPORTED
      const throttled = /frequency|rate limit|per day/i.test(notice);
      throw new ProviderError(throttled ? 'RATE_LIMITED' : 'UNSUPPORTED', `alpha-vantage: ${notice}`);
    }
    if (envelope.data['Error Message']) {
      throw new ProviderError('NOT_FOUND', `alpha-vantage: ${envelope.data['Error Message']}`);
    }

    return body;
  }
}
