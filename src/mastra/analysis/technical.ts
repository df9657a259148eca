// ============================================================================
// TECHNICAL ANALYSIS
// ============================================================================
// Deterministic indicators over a closing-price series (oldest first):
// - Simple moving averages and a price-vs-MA trend signal
// - Support / resistance from the recent trading range
// - Period return, annualised volatility and max drawdown
// - Equal-weight portfolio statistics and sector concentration
//
// Percentages are returned as percent values (12.5 means 12.5%).
// ============================================================================

const TRADING_DAYS_PER_YEAR = 252;

export type TrendSignal = 'BULLISH' | 'BEARISH' | 'NEUTRAL';

export interface BasicTechnicals {
  lastClose: number;
  sma20: number | null;
  sma50: number | null;
  trend: TrendSignal;
  support: number;
  resistance: number;
  periodReturn: number;
}

export interface RiskMetrics {
  periodReturn: number;
  /** Annualised standard deviation of daily returns. */
  volatility: number | null;
  maxDrawdown: number;
  currentDrawdownFromHigh: number;
}

export interface PortfolioHolding {
  ticker: string;
  sector: string | null;
  periodReturn: number | null;
  volatility: number | null;
}

export interface PortfolioStats {
  holdings: number;
  weight: number;
  averageReturn: number | null;
  averageVolatility: number | null;
  bestPerformer: string | null;
  worstPerformer: string | null;
  sectorWeights: Record<string, number>;
  largestSector: string | null;
  largestSectorWeight: number;
}

export function sma(closes: readonly number[], window: number): number | null {
  if (window <= 0 || closes.length < window) return null;
  const slice = closes.slice(closes.length - window);
  return slice.reduce((sum, c) => sum + c, 0) / window;
}

/**
 * Price above both averages is bullish, below both bearish. With only the
 * short average available it alone decides.
 */
export function trendSignal(lastClose: number, sma20: number | null, sma50: number | null): TrendSignal {
  if (sma20 === null) return 'NEUTRAL';
  if (sma50 === null) {
    if (lastClose > sma20) return 'BULLISH';
    if (lastClose < sma20) return 'BEARISH';
    return 'NEUTRAL';
  }
  if (lastClose > sma20 && sma20 > sma50) return 'BULLISH';
  if (lastClose < sma20 && sma20 < sma50) return 'BEARISH';
  return 'NEUTRAL';
}

/** Lowest and highest close of the last `lookback` sessions. */
export function supportResistance(
  closes: readonly number[],
  lookback = 20,
): { support: number; resistance: number } | null {
  if (closes.length === 0) return null;
  const window = closes.slice(Math.max(0, closes.length - lookback));
  return { support: Math.min(...window), resistance: Math.max(...window) };
}

export function periodReturn(closes: readonly number[]): number | null {
  if (closes.length < 2) return null;
  const first = closes[0];
  const last = closes[closes.length - 1];
  if (first === undefined || last === undefined || first === 0) return null;
  return ((last - first) / first) * 100;
}

export function dailyReturns(closes: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const prev = closes[i - 1];
    const curr = closes[i];
    if (prev === undefined || curr === undefined || prev === 0) continue;
    returns.push((curr - prev) / prev);
  }
  return returns;
}

export function annualizedVolatility(closes: readonly number[]): number | null {
  const returns = dailyReturns(closes);
  if (returns.length < 2) return null;
  const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length;
  const variance = returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / (returns.length - 1);
  return Math.sqrt(variance) * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100;
}

/** Largest peak-to-trough decline, as a non-positive percentage. */
export function maxDrawdown(closes: readonly number[]): number {
  let worst = 0;
  let runningMax = closes[0] ?? 0;

  for (const price of closes) {
    if (price > runningMax) {
      runningMax = price;
    }
    if (runningMax > 0) {
      const drawdown = ((price - runningMax) / runningMax) * 100;
      if (drawdown < worst) {
        worst = drawdown;
      }
    }
  }

  return worst;
}

export function basicTechnicals(closes: readonly number[]): BasicTechnicals | null {
  const lastClose = closes[closes.length - 1];
  const range = supportResistance(closes);
  if (lastClose === undefined || range === null) return null;

  const sma20 = sma(closes, 20);
  const sma50 = sma(closes, 50);

  return {
    lastClose,
    sma20,
    sma50,
    trend: trendSignal(lastClose, sma20, sma50),
    support: range.support,
    resistance: range.resistance,
    periodReturn: periodReturn(closes) ?? 0,
  };
}

export function riskMetrics(closes: readonly number[]): RiskMetrics | null {
  const last = closes[closes.length - 1];
  if (last === undefined) return null;
  const high = Math.max(...closes);

  return {
    periodReturn: periodReturn(closes) ?? 0,
    volatility: annualizedVolatility(closes),
    maxDrawdown: maxDrawdown(closes),
    currentDrawdownFromHigh: high > 0 ? ((last - high) / high) * 100 : 0,
  };
}

function average(values: readonly (number | null)[]): number | null {
  const present = values.filter((v): v is number => v !== null);
  if (present.length === 0) return null;
  return present.reduce((sum, v) => sum + v, 0) / present.length;
}

export function portfolioStats(holdings: readonly PortfolioHolding[]): PortfolioStats {
  const weight = holdings.length > 0 ? 1 / holdings.length : 0;

  const sectorWeights: Record<string, number> = {};
  for (const h of holdings) {
    const sector = h.sector ?? 'Unknown';
    sectorWeights[sector] = (sectorWeights[sector] ?? 0) + weight;
  }

  let largestSector: string | null = null;
  let largestSectorWeight = 0;
  for (const [sector, w] of Object.entries(sectorWeights)) {
    if (w > largestSectorWeight) {
      largestSector = sector;
      largestSectorWeight = w;
    }
  }

  const ranked = holdings
    .filter((h): h is PortfolioHolding & { periodReturn: number } => h.periodReturn !== null)
    .sort((a, b) => b.periodReturn - a.periodReturn);

  return {
    holdings: holdings.length,
    weight,
    averageReturn: average(holdings.map((h) => h.periodReturn)),
    averageVolatility: average(holdings.map((h) => h.volatility)),
    bestPerformer: ranked[0]?.ticker ?? null,
    worstPerformer: ranked[ranked.length - 1]?.ticker ?? null,
    sectorWeights,
    largestSector,
    largestSectorWeight,
  };
}
