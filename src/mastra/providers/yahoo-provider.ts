// ============================================================================
// YAHOO FINANCE PROVIDER
// ============================================================================
// Primary source. Needs no API key, so it is always part of the chain when
// listed in PROVIDER_ORDER. yahoo-finance2 throws plain errors, which are
// translated into classified ProviderErrors here.
// ============================================================================

import YahooFinance from 'yahoo-finance2';

import { ProviderError, errorMessage, type ProviderFailureKind } from '../errors';
import type { CompanyProfile, HistoryRange, PriceHistory, PricePoint, StockQuote } from '../types';
import { rangeStartDate, type MarketDataProvider } from './types';

export function classifyYahooError(error: unknown): ProviderFailureKind {
  const message = errorMessage(error).toLowerCase();
  if (message.includes('too many requests') || message.includes('429')) return 'RATE_LIMITED';
  if (
    message.includes('not found') ||
    message.includes('no data found') ||
    message.includes('delisted') ||
    message.includes('invalid symbol')
  ) {
    return 'NOT_FOUND';
  }
  return 'TRANSIENT_NETWORK';
}

export class YahooFinanceProvider implements MarketDataProvider {
  readonly id = 'yahoo';
  private readonly yf = new YahooFinance({ suppressNotices: ['yahooSurvey'] });

  async fetchQuote(ticker: string): Promise<StockQuote> {
    const quote = await this.call(ticker, () => this.yf.quote(ticker));

    if (!quote || quote.regularMarketPrice === undefined) {
      throw new ProviderError('NOT_FOUND', `yahoo: no quote for ${ticker}`);
    }

    return {
      ticker,
      price: quote.regularMarketPrice,
      currency: quote.currency ?? 'USD',
      timestamp: quote.regularMarketTime ?? new Date(),
      change: quote.regularMarketChange ?? null,
      changePercent: quote.regularMarketChangePercent ?? null,
      volume: quote.regularMarketVolume ?? null,
    };
  }

  async fetchProfile(ticker: string): Promise<CompanyProfile> {
    const summary = await this.call(ticker, () =>
      this.yf.quoteSummary(ticker, { modules: ['assetProfile', 'price', 'summaryDetail'] }),
    );

    if (!summary.price) {
      throw new ProviderError('NOT_FOUND', `yahoo: no profile for ${ticker}`);
    }

    return {
      ticker,
      name: summary.price.longName ?? summary.price.shortName ?? ticker,
      sector: summary.assetProfile?.sector ?? null,
      industry: summary.assetProfile?.industry ?? null,
      marketCap: summary.price.marketCap ?? null,
      peRatio: summary.summaryDetail?.trailingPE ?? null,
      currency: summary.price.currency ?? null,
    };
  }

  async fetchHistory(ticker: string, range: HistoryRange): Promise<PriceHistory> {
    const chart = await this.call(ticker, () =>
      this.yf.chart(ticker, { period1: rangeStartDate(range), period2: new Date(), interval: '1d' }),
    );

    const points: PricePoint[] = [];
    for (const q of chart.quotes) {
      if (q.close === null || q.close === undefined) continue;
      points.push({
        date: q.date,
        close: q.close,
        high: q.high ?? null,
        low: q.low ?? null,
        volume: q.volume ?? null,
      });
    }

    if (points.length === 0) {
      throw new ProviderError('NOT_FOUND', `yahoo: no price history for ${ticker}`);
    }

    return { ticker, range, points };
  }

  private async call<T>(ticker: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(classifyYahooError(error), `yahoo: ${ticker}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
