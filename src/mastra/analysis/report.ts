// ============================================================================
// REPORT FORMATTING
// ============================================================================
// Plain-text sections the workers put ahead of the model's narrative, so a
// response always carries the fetched figures even when the narrative is
// short. Each ticker gets a `## TICKER` heading.
// ============================================================================

import type { CompanyProfile, PriceHistory, ProviderFailure, ProviderSuccess, StockQuote } from '../types';
import {
  basicTechnicals,
  riskMetrics,
  type PortfolioStats,
  type RiskMetrics,
} from './technical';

export function formatNumber(value: number | null, digits = 2): string {
  return value === null ? 'n/a' : value.toFixed(digits);
}

export function formatSigned(value: number | null, digits = 2, suffix = ''): string {
  if (value === null) return 'n/a';
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}${suffix}`;
}

export function formatMoney(value: number | null, currency = 'USD'): string {
  if (value === null) return 'n/a';
  return currency === 'USD' ? `$${value.toFixed(2)}` : `${value.toFixed(2)} ${currency}`;
}

export function formatLargeNumber(value: number | null): string {
  if (value === null) return 'n/a';
  const abs = Math.abs(value);
  if (abs >= 1e12) return `${(value / 1e12).toFixed(2)}T`;
  if (abs >= 1e9) return `${(value / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `${(value / 1e6).toFixed(2)}M`;
  return value.toFixed(0);
}

export function formatFailures(failures: readonly ProviderFailure[]): string {
  if (failures.length === 0) return 'no provider returned data';
  return failures.map((f) => `${f.providerId}: ${f.kind}`).join('; ');
}

// ============================================================================
// PAYLOAD LOOKUP
// ============================================================================

export interface TickerData {
  quote?: StockQuote;
  profile?: CompanyProfile;
  /** Longest history range obtained. */
  history?: PriceHistory;
}

const RANGE_ORDER = ['1mo', '3mo', '6mo', '1y'];

/** Collects the payloads for one ticker out of a worker's data ledger. */
export function tickerData(ticker: string, dataUsed: readonly ProviderSuccess[]): TickerData {
  const data: TickerData = {};
  for (const success of dataUsed) {
    if (success.ticker !== ticker) continue;
    const payload = success.payload;
    switch (payload.kind) {
      case 'QUOTE':
        data.quote ??= payload.quote;
        break;
      case 'PROFILE':
        data.profile ??= payload.profile;
        break;
      case 'HISTORY':
        if (!data.history || RANGE_ORDER.indexOf(payload.history.range) > RANGE_ORDER.indexOf(data.history.range)) {
          data.history = payload.history;
        }
        break;
    }
  }
  return data;
}

export function closes(history: PriceHistory | undefined): number[] {
  return history ? history.points.map((p) => p.close) : [];
}

// ============================================================================
// SECTIONS
// ============================================================================

function quoteLine(quote: StockQuote): string {
  const day = quote.timestamp.toISOString().slice(0, 10);
  return (
    `Price: ${formatMoney(quote.price, quote.currency)} ` +
    `(${formatSigned(quote.change)}, ${formatSigned(quote.changePercent, 2, '%')}) as of ${day}`
  );
}

function profileLines(profile: CompanyProfile): string[] {
  return [
    `Company: ${profile.name} | Sector: ${profile.sector ?? 'n/a'} | Industry: ${profile.industry ?? 'n/a'}`,
    `Market cap: ${formatLargeNumber(profile.marketCap)} | P/E: ${formatNumber(profile.peRatio)}`,
  ];
}

function technicalLine(history: PriceHistory): string | null {
  const t = basicTechnicals(closes(history));
  if (!t) return null;
  return (
    `Technicals (${history.range}): SMA20 ${formatNumber(t.sma20)} | SMA50 ${formatNumber(t.sma50)} | ` +
    `Trend ${t.trend} | Support ${formatNumber(t.support)} | Resistance ${formatNumber(t.resistance)}`
  );
}

function riskLine(history: PriceHistory, risk: RiskMetrics): string {
  return (
    `Risk (${history.range}): return ${formatSigned(risk.periodReturn, 2, '%')} | ` +
    `volatility ${formatNumber(risk.volatility)}% | max drawdown ${formatNumber(risk.maxDrawdown)}% | ` +
    `from high ${formatNumber(risk.currentDrawdownFromHigh)}%`
  );
}

export function unavailableSection(ticker: string, failures: readonly ProviderFailure[]): string {
  return `## ${ticker}\nData unavailable: ${formatFailures(failures)}`;
}

export function basicSection(ticker: string, data: TickerData): string {
  const lines = [`## ${ticker}`];
  if (data.quote) lines.push(quoteLine(data.quote));
  if (data.profile) lines.push(...profileLines(data.profile));
  if (data.history) {
    const line = technicalLine(data.history);
    if (line) lines.push(line);
  }
  return lines.join('\n');
}

export function detailedSection(ticker: string, data: TickerData): string {
  const lines = [basicSection(ticker, data)];
  if (data.history) {
    const risk = riskMetrics(closes(data.history));
    if (risk) lines.push(riskLine(data.history, risk));
  }
  return lines.join('\n');
}

export function comparisonTable(tickers: readonly string[], data: ReadonlyMap<string, TickerData>): string {
  const rows = ['| Ticker | Price | Return | Volatility | Max DD | P/E | Sector |', '|---|---|---|---|---|---|---|'];
  for (const ticker of tickers) {
    const d = data.get(ticker);
    if (!d || (!d.quote && !d.profile && !d.history)) {
      rows.push(`| ${ticker} | unavailable | | | | | |`);
      continue;
    }
    const risk = riskMetrics(closes(d.history));
    rows.push(
      `| ${ticker} | ${d.quote ? formatMoney(d.quote.price, d.quote.currency) : 'n/a'} | ` +
        `${risk ? formatSigned(risk.periodReturn, 1, '%') : 'n/a'} | ` +
        `${risk ? `${formatNumber(risk.volatility, 1)}%` : 'n/a'} | ` +
        `${risk ? `${formatNumber(risk.maxDrawdown, 1)}%` : 'n/a'} | ` +
        `${formatNumber(d.profile?.peRatio ?? null, 1)} | ${d.profile?.sector ?? 'n/a'} |`,
    );
  }
  return `## Comparison\n${rows.join('\n')}`;
}

export function portfolioSection(stats: PortfolioStats): string {
  const sectors = Object.entries(stats.sectorWeights)
    .sort(([, a], [, b]) => b - a)
    .map(([sector, w]) => `${sector} ${(w * 100).toFixed(0)}%`)
    .join(', ');

  const lines = [
    '## Portfolio (equal weight)',
    `Holdings: ${stats.holdings} at ${(stats.weight * 100).toFixed(1)}% each`,
    `Average return: ${formatSigned(stats.averageReturn, 2, '%')} | Average volatility: ${formatNumber(stats.averageVolatility)}%`,
    `Best: ${stats.bestPerformer ?? 'n/a'} | Worst: ${stats.worstPerformer ?? 'n/a'}`,
    `Sectors: ${sectors || 'n/a'}`,
  ];
  if (stats.largestSectorWeight > 0.5 && stats.largestSector) {
    lines.push(`Concentration: ${stats.largestSector} is ${(stats.largestSectorWeight * 100).toFixed(0)}% of holdings`);
  }
  return lines.join('\n');
}
