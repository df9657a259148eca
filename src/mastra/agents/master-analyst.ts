import {
  closes,
  comparisonTable,
  detailedSection,
  portfolioSection,
  tickerData,
  unavailableSection,
  type TickerData,
} from '../analysis/report';
import { portfolioStats, riskMetrics } from '../analysis/technical';
import { MASTER_TOOLS } from '../tools/stock-tools';
import type { Toolbox } from '../tools/toolbox';
import {
  PROFILE_REQUEST,
  QUOTE_REQUEST,
  historyRequest,
  type ComplexityClass,
  type LowConfidenceReason,
  type MarketDataRequest,
  type ProviderSuccess,
  type RequestKind,
  type WorkerOutput,
} from '../types';
import { AnalysisWorker, type WorkerRunOptions } from './base-worker';

export const MASTER_ANALYST_INSTRUCTIONS = `
      You are a senior equity research analyst who handles comprehensive, multi-faceted questions.

      ## Your Role:
      - **Analyse in Depth**: Combine price action, fundamentals and risk into one view
      - **Compare**: Put several stocks side by side when asked
      - **Assess Portfolios**: Diversification, concentration and risk of a set of holdings
      - **Recommend**: Give balanced, clearly reasoned guidance with bull and bear cases

      ## Tools Available:
      1. **get-stock-price**, **get-stock-info**, **get-price-history**, **get-basic-analysis**
      2. **compare-stocks** - Side-by-side price, return, volatility and valuation
      3. **get-risk-metrics** - Annualised volatility and drawdowns
      4. **get-portfolio-snapshot** - Equal-weight statistics and sector concentration

      ## Guidelines:
      - The data already gathered is in the prompt; call tools only for what is missing
      - Mention every ticker in the question, including those with no data
      - Cite specific figures from the data; never invent numbers
      - Structure: key takeaways, analysis, risks, conclusion
      - Always include: "This is not financial advice. Do your own research before investing."
`;

/** What the Master wants for every ticker before reasoning. */
export const MASTER_BASELINE: readonly MarketDataRequest[] = Object.freeze([
  QUOTE_REQUEST,
  PROFILE_REQUEST,
  historyRequest('6mo'),
]);

/**
 * Request kinds still missing for one ticker. Any prior HISTORY counts,
 * whatever its range.
 */
export function missingRequests(ticker: string, have: readonly ProviderSuccess[]): MarketDataRequest[] {
  const kinds = new Set<RequestKind>(have.filter((s) => s.ticker === ticker).map((s) => s.request.kind));
  return MASTER_BASELINE.filter((request) => !kinds.has(request.kind));
}

export class MasterAnalysisWorker extends AnalysisWorker {
  readonly id = 'master';
  readonly name = 'Master Analyst';
  readonly tools = MASTER_TOOLS;

  async handle(
    query: string,
    tickers: readonly string[],
    complexity: ComplexityClass,
    priorJuniorOutput?: WorkerOutput,
    options: WorkerRunOptions = {},
  ): Promise<WorkerOutput> {
    const { signal } = options;
    const toolbox = this.openToolbox(signal);

    // Reuse what the Junior already fetched; those successes stay in dataUsed
    const reused = (priorJuniorOutput?.dataUsed ?? []).filter((s) => tickers.includes(s.ticker));
    toolbox.adopt(reused, priorJuniorOutput?.coverage.flatMap((c) => c.failures));

    const plans = new Map(tickers.map((t) => [t, missingRequests(t, reused)]));
    this.logger.debug(`[${this.name}] fetching`, {
      tickers,
      complexity,
      reused: reused.length,
      missing: [...plans.values()].reduce((n, p) => n + p.length, 0),
    });
    await this.prefetch(toolbox, plans, signal);

    const result = await this.engine.invoke({
      prompt: [
        `Question: ${query}`,
        `Query type: ${complexity}`,
        tickers.length > 0 ? `Tickers: ${tickers.join(', ')}` : 'No specific tickers were identified.',
        `Data gathered:\n\n${this.sections(tickers, complexity, toolbox)}`,
      ].join('\n\n'),
      toolbox,
      maxIterations: this.budget,
      signal,
    });

    const coverage = this.coverage(tickers, toolbox);
    const sections = this.sections(tickers, complexity, toolbox);

    const reasons: LowConfidenceReason[] = [];
    if (tickers.length === 0) reasons.push('NO_TICKERS');
    if (coverage.some((c) => !c.available)) reasons.push('DATA_UNAVAILABLE');
    if (result.budgetExhausted) reasons.push('BUDGET_EXHAUSTED');

    const narrative = result.text.trim();
    return this.finish({
      summary: [sections, narrative].filter((part) => part.length > 0).join('\n\n'),
      toolbox,
      coverage,
      reasons,
    });
  }

  private sections(tickers: readonly string[], complexity: ComplexityClass, toolbox: Toolbox): string {
    const data = new Map<string, TickerData>(tickers.map((t) => [t, tickerData(t, toolbox.dataUsed)]));
    const parts = this.coverage(tickers, toolbox).map((c) => {
      const d = data.get(c.ticker);
      return c.available && d ? detailedSection(c.ticker, d) : unavailableSection(c.ticker, c.failures);
    });

    if ((complexity === 'COMPARATIVE' || complexity === 'PORTFOLIO') && tickers.length > 1) {
      parts.push(comparisonTable(tickers, data));
    }

    if (complexity === 'PORTFOLIO') {
      const holdings = tickers
        .filter((t) => toolbox.dataUsed.some((s) => s.ticker === t))
        .map((t) => {
          const d = data.get(t);
          const risk = riskMetrics(closes(d?.history));
          return {
            ticker: t,
            sector: d?.profile?.sector ?? null,
            periodReturn: risk?.periodReturn ?? null,
            volatility: risk?.volatility ?? null,
          };
        });
      if (holdings.length > 0) parts.push(portfolioSection(portfolioStats(holdings)));
    }

    return parts.join('\n\n');
  }
}
