import type { CompanyProfile, HistoryRange, PriceHistory, StockQuote } from '../types';

/**
 * One market data source. Implementations throw `ProviderError` with a
 * classified kind; anything else they throw is classified by the gateway.
 */
export interface MarketDataProvider {
  readonly id: string;
  fetchQuote(ticker: string, signal?: AbortSignal): Promise<StockQuote>;
  fetchProfile(ticker: string, signal?: AbortSignal): Promise<CompanyProfile>;
  fetchHistory(ticker: string, range: HistoryRange, signal?: AbortSignal): Promise<PriceHistory>;
}

export function rangeStartDate(range: HistoryRange, now: Date = new Date()): Date {
  const start = new Date(now);
  switch (range) {
    case '1mo':
      start.setMonth(start.getMonth() - 1);
      break;
    case '3mo':
      start.setMonth(start.getMonth() - 3);
      break;
    case '6mo':
      start.setMonth(start.getMonth() - 6);
      break;
    case '1y':
      start.setFullYear(start.getFullYear() - 1);
      break;
  }
  return start;
}
