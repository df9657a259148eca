import type { DataSourceGateway } from '../gateway/data-source-gateway';
import { silentLogger, type Logger } from '../logger';
import { Toolbox, type StockTool } from '../tools/toolbox';
import type {
  Confidence,
  GatewayOutcome,
  LowConfidenceReason,
  MarketDataRequest,
  TickerCoverage,
  WorkerId,
  WorkerOutput,
} from '../types';
import type { ReasoningEngine } from './reasoning-engine';

// ============================================
// Worker Configuration
// ============================================

export interface WorkerOptions {
  gateway: DataSourceGateway;
  engine: ReasoningEngine;
  /** Tool-call budget per invocation. */
  budget: number;
  concurrency?: number;
  logger?: Logger;
}

export interface WorkerRunOptions {
  signal?: AbortSignal;
}

// ============================================
// Base Worker Class
// ============================================

export abstract class AnalysisWorker {
  abstract readonly id: WorkerId;
  abstract readonly name: string;
  abstract readonly tools: readonly StockTool[];

  protected readonly gateway: DataSourceGateway;
  protected readonly engine: ReasoningEngine;
  protected readonly budget: number;
  protected readonly concurrency: number;
  protected readonly logger: Logger;

  constructor(options: WorkerOptions) {
    this.gateway = options.gateway;
    this.engine = options.engine;
    this.budget = options.budget;
    this.concurrency = options.concurrency ?? 4;
    this.logger = options.logger ?? silentLogger;
  }

  get toolIds(): string[] {
    return this.tools.map((t) => t.id);
  }

  protected openToolbox(signal?: AbortSignal): Toolbox {
    return new Toolbox({
      tools: this.tools,
      gateway: this.gateway,
      budget: this.budget,
      signal,
      concurrency: this.concurrency,
      logger: this.logger,
    });
  }

  /**
   * Fetches per-ticker request plans: distinct tickers concurrently in
   * batches, one ticker's requests in sequence. Outcomes land in the toolbox.
   */
  protected async prefetch(
    toolbox: Toolbox,
    plans: ReadonlyMap<string, readonly MarketDataRequest[]>,
    signal?: AbortSignal,
  ): Promise<void> {
    const entries = [...plans.entries()].filter(([, requests]) => requests.length > 0);

    for (let i = 0; i < entries.length; i += this.concurrency) {
      const batch = entries.slice(i, i + this.concurrency);
      const results: GatewayOutcome[][] = await Promise.all(
        batch.map(([ticker, requests]) =>
          toolbox.exclusive(ticker, () => this.gateway.fetchMany(ticker, requests, { signal })),
        ),
      );
      results.flat().forEach((outcome) => toolbox.record(outcome));
    }
  }

  protected coverage(tickers: readonly string[], toolbox: Toolbox): TickerCoverage[] {
    return tickers.map((ticker) =>
      Object.freeze({
        ticker,
        available: toolbox.dataUsed.some((s) => s.ticker === ticker),
        failures: Object.freeze(toolbox.failures.filter((f) => f.ticker === ticker)),
      }),
    );
  }

  protected finish(params: {
    summary: string;
    toolbox: Toolbox;
    coverage: readonly TickerCoverage[];
    reasons: readonly LowConfidenceReason[];
  }): WorkerOutput {
    const reasons = [...new Set(params.reasons)];
    const confidence: Confidence = reasons.length === 0 ? 'HIGH' : 'LOW';
    const output: WorkerOutput = Object.freeze({
      workerId: this.id,
      summary: params.summary,
      dataUsed: Object.freeze([...params.toolbox.dataUsed]),
      confidence,
      lowConfidenceReasons: Object.freeze(reasons),
      coverage: Object.freeze([...params.coverage]),
      toolCallsMade: params.toolbox.callsMade,
    });

    this.logger.info(`[${this.name}] finished`, {
      confidence: output.confidence,
      reasons,
      dataPoints: output.dataUsed.length,
      toolCalls: output.toolCallsMade,
    });

    return output;
  }
}
