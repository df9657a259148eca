// ============================================================================
// QUERY COMPLEXITY ROUTER
// ============================================================================
// Classifies a query into SIMPLE | COMPREHENSIVE | COMPARATIVE | PORTFOLIO
// and extracts its ticker set.
//
// TICKER EXTRACTION (first that yields anything):
//   1. Uppercase tokens in the known-symbol set, cashtags ($XYZ), and
//      whole-word company aliases ("Apple")
//   2. An anaphor ("it", "that stock") → tickers of the latest session turn
//   3. The reasoning engine, asked to name the tickers
//
// SCORING:
//   - More than one ticker → COMPARATIVE, or PORTFOLIO with portfolio words
//   - Strategy/risk/outlook or portfolio words → COMPREHENSIVE
//   - Otherwise weak deep signals are weighed against simple signals; ties
//     go to COMPREHENSIVE, since under-routing costs correctness
//
// The margin (0..1) tells the coordinator how clearly a SIMPLE call landed.
// ============================================================================

import { TurnCancelledError, errorMessage } from '../errors';
import type { ReasoningEngine } from '../agents/reasoning-engine';
import type { KnownTickerSet } from '../data/known-tickers';
import { silentLogger, type Logger } from '../logger';
import type { SessionView } from '../orchestrator/session-context';
import type { Classification, ClassificationSignals, ComplexityClass, TickerSource } from '../types';

// ============================================================================
// VOCABULARY
// ============================================================================

const PORTFOLIO_TERMS = [
  'portfolio',
  'diversify',
  'diversified',
  'diversification',
  'allocation',
  'allocate',
  'holdings',
  'rebalance',
  'rebalancing',
  'weighting',
];

const COMPREHENSIVE_TERMS = [
  'comprehensive',
  'in-depth',
  'deep dive',
  'strategy',
  'strategic',
  'risk',
  'risks',
  'risky',
  'outlook',
  'recommend',
  'recommendation',
  'valuation',
  'forecast',
  'investment thesis',
  'long-term',
  'research',
  'worth investing',
];

const COMPARISON_TERMS = ['compare', 'comparison', 'versus', 'vs', 'better than', 'against', 'relative to'];

const WEAK_DEEP_TERMS = [
  'analyze',
  'analyse',
  'analysis',
  'trend',
  'performance',
  'why',
  'should',
  'expect',
  'future',
  'buy',
  'sell',
  'hold',
];

const SIMPLE_TERMS = [
  'price',
  'quote',
  'current',
  'trading at',
  'market cap',
  'pe ratio',
  'p/e',
  'sector',
  'industry',
  'info',
  'information',
  'detailed',
  'details',
  'profile',
  'volume',
  'moving average',
  'sma',
  'support',
  'resistance',
  'technical',
  '52-week',
];

const ANAPHORS = [
  'it',
  'its',
  "it's",
  'that stock',
  'this stock',
  'that company',
  'this company',
  'them',
  'they',
  'their',
  'those',
  'these',
  'same',
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/** Whole-term match that treats `&`, `/` and `-` inside a term literally. */
function termPattern(term: string): RegExp {
  return new RegExp(`(?<![a-z0-9])${escapeRegExp(term)}(?![a-z0-9])`, 'i');
}

function matchTerms(text: string, terms: readonly string[]): string[] {
  return terms.filter((term) => termPattern(term).test(text));
}

export function detectSignals(query: string): ClassificationSignals {
  return {
    simple: matchTerms(query, SIMPLE_TERMS),
    deep: matchTerms(query, WEAK_DEEP_TERMS),
    comprehensive: matchTerms(query, COMPREHENSIVE_TERMS),
    portfolio: matchTerms(query, PORTFOLIO_TERMS),
    comparison: matchTerms(query, COMPARISON_TERMS),
  };
}

export function hasAnaphor(query: string): boolean {
  return matchTerms(query, ANAPHORS).length > 0;
}

// ============================================================================
// TICKER EXTRACTION
// ============================================================================

const TOKEN_PATTERN = /(\$?)\b([A-Z]{1,5}(?:[.-][A-Z]{1,2})?)\b/g;

export function normalizeTicker(raw: string): string {
  return raw.replace(/^\$/, '').replace('.', '-').toUpperCase();
}

// Bare one- and two-letter symbols collide with finance shorthand (MA, C, T)
const MIN_BARE_SYMBOL_LENGTH = 3;

/**
 * Uppercase tokens in the known set, any cashtag, and company aliases, in
 * order of first appearance. Known symbols shorter than three letters count
 * only as cashtags (`$MA`) or through their company names.
 */
export function extractTickers(query: string, known: KnownTickerSet): string[] {
  const found: { symbol: string; index: number }[] = [];

  for (const match of query.matchAll(TOKEN_PATTERN)) {
    const [, cashtag, token] = match;
    if (token === undefined) continue;
    const symbol = normalizeTicker(token);
    if (cashtag === '$' || (known.has(symbol) && symbol.length >= MIN_BARE_SYMBOL_LENGTH)) {
      found.push({ symbol, index: match.index ?? 0 });
    }
  }

  for (const [alias, symbol] of known.aliasEntries()) {
    const hit = termPattern(alias).exec(query);
    if (hit) found.push({ symbol, index: hit.index });
  }

  found.sort((a, b) => a.index - b.index);
  return [...new Set(found.map((f) => f.symbol))];
}

/** Pulls ticker-shaped tokens out of a free-text engine reply. */
export function parseTickerList(text: string): string[] {
  if (/^\s*none\s*$/i.test(text)) return [];
  const symbols: string[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const token = match[2];
    if (token !== undefined) symbols.push(normalizeTicker(token));
  }
  return [...new Set(symbols)].filter((s) => s !== 'NONE').slice(0, 10);
}

// ============================================================================
// SCORING
// ============================================================================

export function scoreComplexity(
  tickers: readonly string[],
  signals: ClassificationSignals,
): { complexity: ComplexityClass; margin: number } {
  if (tickers.length > 1) {
    return { complexity: signals.portfolio.length > 0 ? 'PORTFOLIO' : 'COMPARATIVE', margin: 1 };
  }

  if (signals.comprehensive.length > 0 || signals.portfolio.length > 0) {
    return { complexity: 'COMPREHENSIVE', margin: 1 };
  }

  const simple = signals.simple.length;
  const deep = signals.deep.length;

  if (simple === 0 && deep === 0) {
    return { complexity: 'SIMPLE', margin: 0.5 };
  }
  if (deep >= simple) {
    return { complexity: 'COMPREHENSIVE', margin: (deep - simple) / (deep + simple) };
  }
  return { complexity: 'SIMPLE', margin: (simple - deep) / (simple + deep) };
}

// ============================================================================
// ROUTER
// ============================================================================

export const TICKER_EXTRACTION_PROMPT = `Identify the stock ticker symbols the following question refers to.
Reply with the symbols only, comma-separated and uppercase (for example: AAPL, MSFT).
If the question names no stock, reply NONE.

Question: `;

export interface QueryRouterOptions {
  knownTickers: KnownTickerSet;
  /** Fallback ticker extraction; without it step 3 is skipped. */
  engine?: ReasoningEngine;
  logger?: Logger;
}

export class QueryComplexityRouter {
  private readonly known: KnownTickerSet;
  private readonly engine?: ReasoningEngine;
  private readonly logger: Logger;

  constructor(options: QueryRouterOptions) {
    this.known = options.knownTickers;
    this.engine = options.engine;
    this.logger = options.logger ?? silentLogger;
  }

  async classify(
    query: string,
    session?: SessionView,
    options: { signal?: AbortSignal } = {},
  ): Promise<Classification> {
    const signals = detectSignals(query);
    const { tickers, tickerSource } = await this.resolveTickers(query, signals, session, options.signal);
    const { complexity, margin } = scoreComplexity(tickers, signals);

    const classification: Classification = Object.freeze({
      complexity,
      tickers: Object.freeze([...tickers]),
      margin,
      signals,
      tickerSource,
    });

    this.logger.debug('Query classified', {
      complexity,
      tickers,
      margin: Number(margin.toFixed(3)),
      tickerSource,
    });

    return classification;
  }

  private async resolveTickers(
    query: string,
    signals: ClassificationSignals,
    session: SessionView | undefined,
    signal?: AbortSignal,
  ): Promise<{ tickers: string[]; tickerSource: TickerSource }> {
    const extracted = extractTickers(query, this.known);
    const anaphor = hasAnaphor(query);
    const prior = session?.recentTickers() ?? [];

    if (extracted.length > 0) {
      // "compare it with MSFT" keeps the earlier subject first
      if (anaphor && signals.comparison.length > 0 && extracted.length < 2 && prior.length > 0) {
        return { tickers: [...new Set([...prior, ...extracted])], tickerSource: 'SESSION' };
      }
      return { tickers: extracted, tickerSource: 'QUERY' };
    }

    if (anaphor && prior.length > 0) {
      return { tickers: [...prior], tickerSource: 'SESSION' };
    }

    const fromEngine = await this.askEngine(query, signal);
    if (fromEngine.length > 0) {
      return { tickers: fromEngine, tickerSource: 'ENGINE' };
    }

    return { tickers: [], tickerSource: 'NONE' };
  }

  private async askEngine(query: string, signal?: AbortSignal): Promise<string[]> {
    if (!this.engine) return [];

    try {
      const result = await this.engine.invoke({
        prompt: `${TICKER_EXTRACTION_PROMPT}${query}`,
        maxIterations: 0,
        signal,
      });
      return parseTickerList(result.text);
    } catch (error) {
      if (error instanceof TurnCancelledError) throw error;
      this.logger.warn('Ticker extraction by reasoning engine failed', { error: errorMessage(error) });
      return [];
    }
  }
}
