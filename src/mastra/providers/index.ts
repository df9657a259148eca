import type { SystemConfig } from '../config';
import type { Logger } from '../logger';
import { AlphaVantageProvider } from './alpha-vantage-provider';
import { FinnhubProvider } from './finnhub-provider';
import type { MarketDataProvider } from './types';
import { YahooFinanceProvider } from './yahoo-provider';

export { AlphaVantageProvider } from './alpha-vantage-provider';
export { FinnhubProvider } from './finnhub-provider';
export { YahooFinanceProvider, classifyYahooError } from './yahoo-provider';
export { classifyHttpStatus, fetchJson, parseNumber } from './http';
export { rangeStartDate, type MarketDataProvider } from './types';

/**
 * Builds the fallback chain in PROVIDER_ORDER. A keyed provider whose
 * credentials are absent is left out, which only shortens the chain.
 */
export function createProviders(
  config: Pick<SystemConfig, 'providerOrder' | 'alphaVantageApiKey' | 'finnhubApiKey'>,
  logger?: Logger,
): MarketDataProvider[] {
  const providers: MarketDataProvider[] = [];

  for (const id of config.providerOrder) {
    switch (id) {
      case 'yahoo':
        providers.push(new YahooFinanceProvider());
        break;
      case 'alpha-vantage':
        if (config.alphaVantageApiKey) {
          providers.push(new AlphaVantageProvider({ apiKey: config.alphaVantageApiKey }));
        } else {
          logger?.debug('Skipping alpha-vantage provider: ALPHA_VANTAGE_API_KEY not set');
        }
        break;
      case 'finnhub':
        if (config.finnhubApiKey) {
          providers.push(new FinnhubProvider({ apiKey: config.finnhubApiKey }));
        } else {
          logger?.debug('Skipping finnhub provider: FINNHUB_API_KEY not set');
        }
        break;
    }
  }

  return providers;
}
