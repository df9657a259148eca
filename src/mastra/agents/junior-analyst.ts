import { basicSection, tickerData, unavailableSection } from '../analysis/report';
import { JUNIOR_TOOLS } from '../tools/stock-tools';
import type { Toolbox } from '../tools/toolbox';
import {
  PROFILE_REQUEST,
  QUOTE_REQUEST,
  historyRequest,
  type LowConfidenceReason,
  type MarketDataRequest,
  type WorkerOutput,
} from '../types';
import { AnalysisWorker, type WorkerRunOptions } from './base-worker';

export const SCOPE_EXCEEDED_MARKER = 'SCOPE: EXCEEDED';

export const JUNIOR_ANALYST_INSTRUCTIONS = `
      You are a junior equity analyst who answers quick, factual questions about individual stocks.

      ## Your Scope:
      - Current price, daily change and volume
      - Company basics: sector, industry, market cap, P/E ratio
      - Basic technicals: 20/50-day moving averages, trend, support and resistance

      ## Tools Available:
      1. **get-stock-price** - Current price and daily move
      2. **get-stock-info** - Company profile and valuation basics
      3. **get-price-history** - Recent daily closes
      4. **get-basic-analysis** - Moving averages, trend and support/resistance

      ## Guidelines:
      - The data already gathered is in the prompt; call tools only for what is missing
      - Use ticker symbols in UPPERCASE
      - Keep the answer short: a few sentences per ticker
      - If a ticker's data is unavailable, say so plainly; never invent figures
      - Never give personalised investment advice

      ## Scope Check:
      If the question asks for things beyond your scope (investment recommendations,
      risk assessment, valuation judgements, outlook, strategy, or explaining why a stock moved),
      answer what you can and end with a separate line reading exactly:
      ${SCOPE_EXCEEDED_MARKER}
`;

const PROFILE_WORDING =
  /\b(info|information|details?|detailed|profile|company|sector|industry|market cap|valuation|p\/?e|pe ratio|about)\b/i;
const TECHNICAL_WORDING =
  /\b(technical|trend|moving average|sma|support|resistance|history|historical|chart|52-week|momentum)\b/i;

/** QUOTE always; PROFILE and HISTORY(3mo) when the wording asks for them. */
export function planJuniorRequests(query: string): MarketDataRequest[] {
  const plan: MarketDataRequest[] = [QUOTE_REQUEST];
  if (PROFILE_WORDING.test(query)) plan.push(PROFILE_REQUEST);
  if (TECHNICAL_WORDING.test(query)) plan.push(historyRequest('3mo'));
  return plan;
}

export function stripScopeMarker(text: string): { text: string; scopeExceeded: boolean } {
  const scopeExceeded = /^\s*SCOPE:\s*EXCEEDED\s*$/im.test(text);
  return { text: text.replace(/^\s*SCOPE:\s*EXCEEDED\s*$/gim, '').trim(), scopeExceeded };
}

export class JuniorAnalysisWorker extends AnalysisWorker {
  readonly id = 'junior';
  readonly name = 'Junior Analyst';
  readonly tools = JUNIOR_TOOLS;

  async handle(query: string, tickers: readonly string[], options: WorkerRunOptions = {}): Promise<WorkerOutput> {
    const { signal } = options;
    const toolbox = this.openToolbox(signal);

    if (tickers.length === 0) {
      return this.finish({
        summary:
          'I could not identify a stock ticker in your question. ' +
          'Please include a ticker symbol such as AAPL or a company name such as Apple.',
        toolbox,
        coverage: [],
        reasons: ['NO_TICKERS'],
      });
    }

    const plan = planJuniorRequests(query);
    this.logger.debug(`[${this.name}] fetching`, { tickers, plan: plan.map((r) => r.kind) });
    await this.prefetch(toolbox, new Map(tickers.map((t) => [t, plan])), signal);

    const result = await this.engine.invoke({
      prompt: `Question: ${query}\n\nData gathered:\n\n${this.sections(tickers, toolbox)}`,
      toolbox,
      maxIterations: this.budget,
      signal,
    });

    const narrative = stripScopeMarker(result.text);
    // Tool calls may have filled in tickers the prefetch missed
    const coverage = this.coverage(tickers, toolbox);
    const sections = this.sections(tickers, toolbox);

    const reasons: LowConfidenceReason[] = [];
    if (coverage.some((c) => !c.available)) reasons.push('DATA_UNAVAILABLE');
    if (narrative.scopeExceeded) reasons.push('SCOPE_EXCEEDED');
    if (result.budgetExhausted) reasons.push('BUDGET_EXHAUSTED');

    return this.finish({
      summary: narrative.text ? `${sections}\n\n${narrative.text}` : sections,
      toolbox,
      coverage,
      reasons,
    });
  }

  private sections(tickers: readonly string[], toolbox: Toolbox): string {
    return this.coverage(tickers, toolbox)
      .map((c) =>
        c.available
          ? basicSection(c.ticker, tickerData(c.ticker, toolbox.dataUsed))
          : unavailableSection(c.ticker, c.failures),
      )
      .join('\n\n');
  }
}
