// ============================================================================
// STOCK TOOLS
// ============================================================================
// Tools the reasoning engine can call. All data goes through the
// DataSourceGateway, so provider fallback applies to tool calls too, and
// every outcome is recorded on the calling Toolbox.
//
// Junior toolset: price, info, history, basic technical analysis.
// Master toolset: Junior toolset + comparison, risk metrics, portfolio.
//
// A tool never throws for missing data: it returns `{ error, failures }` so
// the model can say the ticker is unavailable.
// ============================================================================

import { z } from 'zod';

import { basicTechnicals, portfolioStats, riskMetrics, type PortfolioHolding } from '../analysis/technical';
import {
  HISTORY_RANGES,
  PROFILE_REQUEST,
  QUOTE_REQUEST,
  historyRequest,
  type GatewayOutcome,
  type MarketDataPayload,
  type MarketDataRequest,
} from '../types';
import { defineStockTool, type StockTool, type ToolContext } from './toolbox';

const tickerSchema = z
  .string()
  .min(1)
  .max(12)
  .transform((t) => t.trim().toUpperCase())
  .describe('Stock ticker symbol, e.g. AAPL');

const tickerListSchema = z
  .array(tickerSchema)
  .min(2)
  .max(10)
  .transform((tickers) => [...new Set(tickers)])
  .describe('Ticker symbols');

// ============================================================================
// HELPERS
// ============================================================================

function round(value: number | null, digits = 2): number | null {
  if (value === null) return null;
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function unavailable(outcome: Pick<GatewayOutcome, 'ticker' | 'failures'>) {
  return {
    ticker: outcome.ticker,
    error: `No data available for ${outcome.ticker}`,
    failures: outcome.failures.map((f) => `${f.providerId}: ${f.kind}`),
  };
}

async function fetchRecorded(ctx: ToolContext, ticker: string, request: MarketDataRequest): Promise<GatewayOutcome> {
  const outcome = await ctx.exclusive(ticker, () => ctx.gateway.fetch(ticker, request, { signal: ctx.signal }));
  ctx.record(outcome);
  return outcome;
}

async function fetchManyRecorded(
  ctx: ToolContext,
  tickers: readonly string[],
  requests: readonly MarketDataRequest[],
): Promise<Map<string, GatewayOutcome[]>> {
  const byTicker = await ctx.gateway.fetchForTickers(tickers, requests, {
    signal: ctx.signal,
    concurrency: ctx.concurrency,
    schedule: (ticker, task) => ctx.exclusive(ticker, task),
  });
  for (const outcomes of byTicker.values()) {
    outcomes.forEach((o) => ctx.record(o));
  }
  return byTicker;
}

type PayloadOf<K extends MarketDataPayload['kind']> = Extract<MarketDataPayload, { kind: K }>;

function payloadOf<K extends MarketDataPayload['kind']>(
  outcomes: readonly GatewayOutcome[],
  kind: K,
): PayloadOf<K> | undefined {
  for (const outcome of outcomes) {
    if (outcome.status !== 'success') continue;
    const payload = outcome.result.payload;
    if (isKind(payload, kind)) return payload;
  }
  return undefined;
}

function isKind<K extends MarketDataPayload['kind']>(payload: MarketDataPayload, kind: K): payload is PayloadOf<K> {
  return payload.kind === kind;
}

function closesOf(payload: PayloadOf<'HISTORY'> | undefined): number[] {
  return payload ? payload.history.points.map((p) => p.close) : [];
}

// ============================================================================
// JUNIOR TOOLS
// ============================================================================

export const getStockPriceTool = defineStockTool({
  id: 'get-stock-price',
  description: 'Get the current price, daily change and volume for a stock',
  inputSchema: z.object({ ticker: tickerSchema }),
  run: async ({ ticker }, ctx) => {
    const outcome = await fetchRecorded(ctx, ticker, QUOTE_REQUEST);
    if (outcome.status === 'failed') return unavailable(outcome);
    const payload = outcome.result.payload;
    if (payload.kind !== 'QUOTE') return unavailable(outcome);

    const { quote } = payload;
    return {
      ticker,
      price: quote.price,
      currency: quote.currency,
      change: round(quote.change),
      changePercent: round(quote.changePercent),
      volume: quote.volume,
      asOf: quote.timestamp.toISOString(),
      source: outcome.result.providerId,
    };
  },
});

export const getStockInfoTool = defineStockTool({
  id: 'get-stock-info',
  description: 'Get company name, sector, industry, market cap and P/E ratio for a stock',
  inputSchema: z.object({ ticker: tickerSchema }),
  run: async ({ ticker }, ctx) => {
    const outcome = await fetchRecorded(ctx, ticker, PROFILE_REQUEST);
    if (outcome.status === 'failed') return unavailable(outcome);
    const payload = outcome.result.payload;
    if (payload.kind !== 'PROFILE') return unavailable(outcome);

    return { ...payload.profile, source: outcome.result.providerId };
  },
});

export const getPriceHistoryTool = defineStockTool({
  id: 'get-price-history',
  description: 'Get daily closing prices for a stock over a period (1mo, 3mo, 6mo or 1y)',
  inputSchema: z.object({
    ticker: tickerSchema,
    range: z.enum(HISTORY_RANGES).default('3mo').describe('History period'),
  }),
  run: async ({ ticker, range }, ctx) => {
    const outcome = await fetchRecorded(ctx, ticker, historyRequest(range));
    if (outcome.status === 'failed') return unavailable(outcome);
    const payload = outcome.result.payload;
    if (payload.kind !== 'HISTORY') return unavailable(outcome);

    const points = payload.history.points;
    return {
      ticker,
      range,
      sessions: points.length,
      // Most recent sessions only; the full series is in the data ledger
      recent: points.slice(-20).map((p) => ({ date: p.date.toISOString().slice(0, 10), close: round(p.close) })),
      source: outcome.result.providerId,
    };
  },
});

export const getBasicAnalysisTool = defineStockTool({
  id: 'get-basic-analysis',
  description: 'Get 20/50-day moving averages, trend signal and support/resistance for a stock',
  inputSchema: z.object({ ticker: tickerSchema }),
  run: async ({ ticker }, ctx) => {
    const outcome = await fetchRecorded(ctx, ticker, historyRequest('3mo'));
    if (outcome.status === 'failed') return unavailable(outcome);

    const technicals = basicTechnicals(closesOf(payloadOf([outcome], 'HISTORY')));
    if (!technicals) return unavailable(outcome);

    return {
      ticker,
      lastClose: round(technicals.lastClose),
      sma20: round(technicals.sma20),
      sma50: round(technicals.sma50),
      trend: technicals.trend,
      support: round(technicals.support),
      resistance: round(technicals.resistance),
      periodReturnPercent: round(technicals.periodReturn),
      source: outcome.result.providerId,
    };
  },
});

// ============================================================================
// MASTER TOOLS
// ============================================================================

export const compareStocksTool = defineStockTool({
  id: 'compare-stocks',
  description: 'Compare several stocks side by side: price, 6-month return, volatility and valuation',
  inputSchema: z.object({ tickers: tickerListSchema }),
  run: async ({ tickers }, ctx) => {
    const byTicker = await fetchManyRecorded(ctx, tickers, [QUOTE_REQUEST, PROFILE_REQUEST, historyRequest('6mo')]);

    return {
      comparison: tickers.map((ticker) => {
        const outcomes = byTicker.get(ticker) ?? [];
        const quote = payloadOf(outcomes, 'QUOTE');
        const profile = payloadOf(outcomes, 'PROFILE');
        const risk = riskMetrics(closesOf(payloadOf(outcomes, 'HISTORY')));

        if (!quote && !profile && !risk) {
          return {
            ticker,
            error: `No data available for ${ticker}`,
            failures: outcomes.flatMap((o) => o.failures.map((f) => `${f.providerId}: ${f.kind}`)),
          };
        }

        return {
          ticker,
          price: quote?.quote.price ?? null,
          sector: profile?.profile.sector ?? null,
          marketCap: profile?.profile.marketCap ?? null,
          peRatio: round(profile?.profile.peRatio ?? null),
          returnPercent6mo: round(risk?.periodReturn ?? null),
          volatilityPercent: round(risk?.volatility ?? null),
        };
      }),
    };
  },
});

export const getRiskMetricsTool = defineStockTool({
  id: 'get-risk-metrics',
  description: 'Get annualised volatility, max drawdown and drawdown from period high for a stock',
  inputSchema: z.object({
    ticker: tickerSchema,
    range: z.enum(HISTORY_RANGES).default('6mo').describe('History period'),
  }),
  run: async ({ ticker, range }, ctx) => {
    const outcome = await fetchRecorded(ctx, ticker, historyRequest(range));
    if (outcome.status === 'failed') return unavailable(outcome);

    const risk = riskMetrics(closesOf(payloadOf([outcome], 'HISTORY')));
    if (!risk) return unavailable(outcome);

    return {
      ticker,
      range,
      periodReturnPercent: round(risk.periodReturn),
      annualizedVolatilityPercent: round(risk.volatility),
      maxDrawdownPercent: round(risk.maxDrawdown),
      drawdownFromHighPercent: round(risk.currentDrawdownFromHigh),
      source: outcome.result.providerId,
    };
  },
});

export const getPortfolioSnapshotTool = defineStockTool({
  id: 'get-portfolio-snapshot',
  description: 'Get equal-weight portfolio statistics and sector concentration for a set of stocks',
  inputSchema: z.object({ tickers: tickerListSchema }),
  run: async ({ tickers }, ctx) => {
    const byTicker = await fetchManyRecorded(ctx, tickers, [PROFILE_REQUEST, historyRequest('6mo')]);

    const holdings: PortfolioHolding[] = [];
    const unavailableTickers: string[] = [];
    for (const ticker of tickers) {
      const outcomes = byTicker.get(ticker) ?? [];
      if (!outcomes.some((o) => o.status === 'success')) {
        unavailableTickers.push(ticker);
        continue;
      }
      const risk = riskMetrics(closesOf(payloadOf(outcomes, 'HISTORY')));
      holdings.push({
        ticker,
        sector: payloadOf(outcomes, 'PROFILE')?.profile.sector ?? null,
        periodReturn: risk?.periodReturn ?? null,
        volatility: risk?.volatility ?? null,
      });
    }

    const stats = portfolioStats(holdings);
    return {
      holdings: holdings.map((h) => h.ticker),
      unavailable: unavailableTickers,
      weightPercent: round(stats.weight * 100),
      averageReturnPercent: round(stats.averageReturn),
      averageVolatilityPercent: round(stats.averageVolatility),
      bestPerformer: stats.bestPerformer,
      worstPerformer: stats.worstPerformer,
      largestSector: stats.largestSector,
      largestSectorWeightPercent: round(stats.largestSectorWeight * 100),
    };
  },
});

export const JUNIOR_TOOLS: readonly StockTool[] = Object.freeze([
  getStockPriceTool,
  getStockInfoTool,
  getPriceHistoryTool,
  getBasicAnalysisTool,
]);

export const MASTER_TOOLS: readonly StockTool[] = Object.freeze([
  ...JUNIOR_TOOLS,
  compareStocksTool,
  getRiskMetricsTool,
  getPortfolioSnapshotTool,
]);
