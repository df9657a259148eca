// In-process stand-ins for market data providers and reasoning engines.

import type { ReasoningEngine, ReasoningRequest, ReasoningResult } from '../src/mastra/agents/reasoning-engine';
import type { SystemConfig } from '../src/mastra/config';
import { KnownTickerSet } from '../src/mastra/data/known-tickers';
import { DataSourceGateway } from '../src/mastra/gateway/data-source-gateway';
import { ProviderError, type ProviderFailureKind } from '../src/mastra/errors';
import type { MarketDataProvider } from '../src/mastra/providers/types';
import type { CompanyProfile, HistoryRange, PriceHistory, StockQuote, SynthesizedResponse } from '../src/mastra/types';

// ============================================================================
// FIXTURES
// ============================================================================

export const FIXED_DATE = new Date('2026-10-16T20:00:00Z');

export function makeQuote(ticker: string, price = 100): StockQuote {
  return {
    ticker,
    price,
    currency: 'USD',
    timestamp: FIXED_DATE,
    change: 1.5,
    changePercent: 1.52,
    volume: 1_000_000,
  };
}

export function makeProfile(ticker: string, sector = 'Technology'): CompanyProfile {
  return {
    ticker,
    name: `${ticker} Corp`,
    sector,
    industry: 'Software',
    marketCap: 2_500_000_000_000,
    peRatio: 25,
    currency: 'USD',
  };
}

export function makeHistory(ticker: string, range: HistoryRange, closes: readonly number[]): PriceHistory {
  return {
    ticker,
    range,
    points: closes.map((close, i) => ({
      date: new Date(Date.UTC(2026, 6, 1 + i)),
      close,
      high: close + 1,
      low: close - 1,
      volume: 1000,
    })),
  };
}

/** 60 closes rising by 1 from 100. */
export const RISING_CLOSES: readonly number[] = Array.from({ length: 60 }, (_, i) => 100 + i);

// ============================================================================
// PROVIDERS
// ============================================================================

type Step<T> = T | ProviderFailureKind;

/**
 * Each method answers from a per-ticker script; once a script runs out its
 * last step repeats. A bare failure kind is thrown as a ProviderError.
 */
export class FakeProvider implements MarketDataProvider {
  readonly calls: { method: 'quote' | 'profile' | 'history'; ticker: string }[] = [];

  constructor(
    readonly id: string,
    private readonly scripts: {
      quote?: Record<string, Step<StockQuote>[]>;
      profile?: Record<string, Step<CompanyProfile>[]>;
      history?: Record<string, Step<PriceHistory>[]>;
    } = {},
  ) {}

  callCount(method?: 'quote' | 'profile' | 'history', ticker?: string): number {
    return this.calls.filter((c) => (!method || c.method === method) && (!ticker || c.ticker === ticker)).length;
  }

  async fetchQuote(ticker: string): Promise<StockQuote> {
    return this.answer('quote', ticker, this.scripts.quote?.[ticker]);
  }

  async fetchProfile(ticker: string): Promise<CompanyProfile> {
    return this.answer('profile', ticker, this.scripts.profile?.[ticker]);
  }

  async fetchHistory(ticker: string, range: HistoryRange): Promise<PriceHistory> {
    const steps = this.scripts.history?.[ticker];
    const step = await this.answer('history', ticker, steps);
    return { ...step, range };
  }

  private async answer<T extends object>(method: 'quote' | 'profile' | 'history', ticker: string, steps: Step<T>[] | undefined): Promise<T> {
    this.calls.push({ method, ticker });
    const n = this.callCount(method, ticker);
    if (!steps || steps.length === 0) {
      throw new ProviderError('NOT_FOUND', `${this.id}: ${ticker} not found`);
    }
    const step = steps[Math.min(n, steps.length) - 1];
    if (step === undefined) throw new ProviderError('NOT_FOUND', `${this.id}: ${ticker} not found`);
    if (typeof step === 'string') throw new ProviderError(step, `${this.id}: ${step}`);
    return step;
  }
}

/** A provider with quote, profile and history for every listed ticker. */
export function healthyProvider(id: string, tickers: readonly string[], sectors: Record<string, string> = {}): FakeProvider {
  return new FakeProvider(id, {
    quote: Object.fromEntries(tickers.map((t, i) => [t, [makeQuote(t, 100 + i * 10)]])),
    profile: Object.fromEntries(tickers.map((t) => [t, [makeProfile(t, sectors[t] ?? 'Technology')]])),
    history: Object.fromEntries(tickers.map((t) => [t, [makeHistory(t, '3mo', RISING_CLOSES)]])),
  });
}

export function instantGateway(providers: readonly MarketDataProvider[], maxRetries = 2): DataSourceGateway {
  return new DataSourceGateway({ providers, maxRetries, sleep: async () => {} });
}

// ============================================================================
// REASONING ENGINES
// ============================================================================

export type EngineScript = (request: ReasoningRequest, invocation: number) => string | Promise<string>;

export class ScriptedEngine implements ReasoningEngine {
  readonly requests: ReasoningRequest[] = [];

  constructor(
    readonly name: string,
    private readonly script: EngineScript = () => 'Analysis complete.',
  ) {}

  get invocations(): number {
    return this.requests.length;
  }

  async invoke(request: ReasoningRequest): Promise<ReasoningResult> {
    this.requests.push(request);
    const text = await this.script(request, this.requests.length);
    return {
      text,
      toolCallsMade: request.toolbox?.callsMade ?? 0,
      budgetExhausted: request.toolbox?.budgetExhausted ?? false,
    };
  }
}

export const TEST_TICKERS = new KnownTickerSet([
  { symbol: 'AAPL', name: 'Apple Inc.', aliases: ['apple'] },
  { symbol: 'MSFT', name: 'Microsoft Corporation', aliases: ['microsoft'] },
  { symbol: 'GOOGL', name: 'Alphabet Inc.', aliases: ['google', 'alphabet'] },
  { symbol: 'TSLA', name: 'Tesla Inc.', aliases: ['tesla'] },
  { symbol: 'BRK-B', name: 'Berkshire Hathaway', aliases: ['berkshire'] },
  { symbol: 'JPM', name: 'JPMorgan Chase', aliases: [] },
]);

export function testConfig(overrides: Partial<SystemConfig> = {}): SystemConfig {
  return {
    openaiApiKey: 'test-key',
    openaiModel: 'gpt-4o',
    alphaVantageApiKey: undefined,
    finnhubApiKey: undefined,
    providerOrder: ['yahoo'],
    temperatures: { master: 0.7, junior: 0.5, orchestrator: 0.3 },
    maxIterations: 10,
    juniorMaxIterations: 5,
    providerMaxRetries: 2,
    providerBackoffMs: 0,
    narrowMarginThreshold: 0.35,
    sessionMaxTurns: 20,
    fetchConcurrency: 4,
    logLevel: 'error',
    ...overrides,
  };
}

export function makeResponse(tickers: readonly string[], text = 'Done.'): SynthesizedResponse {
  return {
    text,
    contributingWorkers: ['junior'],
    escalated: false,
    warnings: [],
    complexity: 'SIMPLE',
    tickers,
    states: ['CLASSIFYING', 'DISPATCHED_JUNIOR', 'SYNTHESIZING', 'DONE'],
  };
}
