// ============================================================================
// STOCK AGENT SYSTEM
// ============================================================================
// Caller-facing facade. Owns the sessions, wires providers → gateway →
// workers → coordinator from one SystemConfig, and exposes the convenience
// queries the CLI uses. Sessions live in memory only and are gone when they
// end or the process exits.
// ============================================================================

import { randomUUID } from 'node:crypto';

import { JUNIOR_ANALYST_INSTRUCTIONS, JuniorAnalysisWorker } from '../agents/junior-analyst';
import { MASTER_ANALYST_INSTRUCTIONS, MasterAnalysisWorker } from '../agents/master-analyst';
import { MastraReasoningEngine, type ReasoningEngine } from '../agents/reasoning-engine';
import type { SystemConfig } from '../config';
import { loadKnownTickers, type KnownTickerSet } from '../data/known-tickers';
import { DataSourceGateway, type Sleep } from '../gateway/data-source-gateway';
import { silentLogger, type Logger } from '../logger';
import { createProviders } from '../providers';
import type { MarketDataProvider } from '../providers/types';
import { QueryComplexityRouter } from '../router/query-router';
import { MASTER_TOOLS } from '../tools/stock-tools';
import type { TurnResult } from '../types';
import { OrchestratorCoordinator } from './coordinator';
import { SessionContext, type SessionTurn } from './session-context';

const MAX_QUERY_LENGTH = 2000;

export const ORCHESTRATOR_INSTRUCTIONS = `
      You are the coordinator of a stock analysis team.
      Your only job here is to read a question and name the stock ticker symbols it refers to.
      Map company names to their primary US listing (Apple → AAPL, Alphabet → GOOGL).
      Never guess a symbol for something that is not a publicly traded company.
`;

export interface ReasoningEngines {
  junior: ReasoningEngine;
  master: ReasoningEngine;
  /** Fallback ticker extraction in the router. */
  orchestrator: ReasoningEngine;
}

export interface StockAgentSystemOptions {
  config: SystemConfig;
  /** Defaults to the chain built from PROVIDER_ORDER. */
  providers?: readonly MarketDataProvider[];
  /** Defaults to Mastra agents on the configured OpenAI model. */
  engines?: Partial<ReasoningEngines>;
  knownTickers?: KnownTickerSet;
  logger?: Logger;
  /** Run a Junior pass ahead of the Master for non-SIMPLE queries. */
  preseedMaster?: boolean;
  /** Backoff sleep override for the gateway. */
  sleep?: Sleep;
}

export interface SubmitOptions {
  signal?: AbortSignal;
}

export interface SystemStatus {
  initialized: boolean;
  config: {
    model: string;
    maxIterations: number;
    juniorMaxIterations: number;
    narrowMarginThreshold: number;
    sessionMaxTurns: number;
  };
  providers: string[];
  agents: { orchestrator: string; junior: string; master: string };
  tools: number;
  activeSessions: number;
}

export interface ToolInfo {
  name: string;
  description: string;
}

export class StockAgentSystem {
  readonly config: SystemConfig;
  private readonly gateway: DataSourceGateway;
  private readonly engines: ReasoningEngines;
  private readonly junior: JuniorAnalysisWorker;
  private readonly master: MasterAnalysisWorker;
  private readonly coordinator: OrchestratorCoordinator;
  private readonly sessions = new Map<string, SessionContext>();
  private readonly logger: Logger;

  constructor(options: StockAgentSystemOptions) {
    const { config } = options;
    this.config = config;
    this.logger = options.logger ?? silentLogger;

    const providers = options.providers ?? createProviders(config, this.logger);
    if (providers.length === 0) {
      this.logger.warn('No market data providers configured; every fetch will fail');
    }

    this.gateway = new DataSourceGateway({
      providers,
      maxRetries: config.providerMaxRetries,
      baseDelayMs: config.providerBackoffMs,
      logger: this.logger,
      sleep: options.sleep,
    });

    this.engines = {
      junior: options.engines?.junior ?? this.mastraEngine('junior-analyst', 'Junior Analyst', JUNIOR_ANALYST_INSTRUCTIONS, config.temperatures.junior),
      master: options.engines?.master ?? this.mastraEngine('master-analyst', 'Master Analyst', MASTER_ANALYST_INSTRUCTIONS, config.temperatures.master),
      orchestrator:
        options.engines?.orchestrator ??
        this.mastraEngine('orchestrator', 'Orchestrator', ORCHESTRATOR_INSTRUCTIONS, config.temperatures.orchestrator),
    };

    this.junior = new JuniorAnalysisWorker({
      gateway: this.gateway,
      engine: this.engines.junior,
      budget: config.juniorMaxIterations,
      concurrency: config.fetchConcurrency,
      logger: this.logger,
    });

    this.master = new MasterAnalysisWorker({
      gateway: this.gateway,
      engine: this.engines.master,
      budget: config.maxIterations,
      concurrency: config.fetchConcurrency,
      logger: this.logger,
    });

    this.coordinator = new OrchestratorCoordinator({
      router: new QueryComplexityRouter({
        knownTickers: options.knownTickers ?? loadKnownTickers(),
        engine: this.engines.orchestrator,
        logger: this.logger,
      }),
      junior: this.junior,
      master: this.master,
      narrowMarginThreshold: config.narrowMarginThreshold,
      preseedMaster: options.preseedMaster,
      logger: this.logger,
    });

    this.logger.info('Stock agent system initialized', {
      model: config.openaiModel,
      providers: this.gateway.providerIds,
    });
  }

  // ============================================================================
  // SESSIONS
  // ============================================================================

  startSession(): string {
    const id = randomUUID();
    this.sessions.set(id, new SessionContext(id, this.config.sessionMaxTurns));
    this.logger.debug('Session started', { sessionId: id });
    return id;
  }

  /** Returns false for an unknown session. */
  endSession(sessionId: string): boolean {
    const ended = this.sessions.delete(sessionId);
    if (ended) this.logger.debug('Session ended', { sessionId });
    return ended;
  }

  async submitQuery(text: string, sessionId: string, options: SubmitOptions = {}): Promise<TurnResult> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return { ok: false, error: { kind: 'UNKNOWN_SESSION', message: `Unknown session: ${sessionId}` } };
    }

    const query = text.trim();
    if (query.length === 0) {
      return { ok: false, error: { kind: 'INVALID_QUERY', message: 'The query is empty' } };
    }
    if (query.length > MAX_QUERY_LENGTH) {
      return {
        ok: false,
        error: { kind: 'INVALID_QUERY', message: `The query exceeds ${MAX_QUERY_LENGTH} characters` },
      };
    }

    return this.coordinator.runTurn(query, session, { signal: options.signal });
  }

  getSessionHistory(sessionId: string): readonly SessionTurn[] | undefined {
    return this.sessions.get(sessionId)?.turns;
  }

  clearSessionHistory(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    session?.clear();
    return session !== undefined;
  }

  // ============================================================================
  // CONVENIENCE QUERIES
  // ============================================================================

  getStockPrice(symbol: string, sessionId: string, options?: SubmitOptions): Promise<TurnResult> {
    return this.submitQuery(`Get the current stock price for ${symbol}`, sessionId, options);
  }

  getStockInfo(symbol: string, sessionId: string, options?: SubmitOptions): Promise<TurnResult> {
    return this.submitQuery(`Get detailed information about ${symbol}`, sessionId, options);
  }

  analyzeStock(symbol: string, sessionId: string, options?: SubmitOptions): Promise<TurnResult> {
    return this.submitQuery(`Perform comprehensive analysis of ${symbol}`, sessionId, options);
  }

  compareStocks(symbols: readonly string[], sessionId: string, options?: SubmitOptions): Promise<TurnResult> {
    return this.submitQuery(`Compare these stocks: ${symbols.join(', ')}`, sessionId, options);
  }

  portfolioAnalysis(symbols: readonly string[], sessionId: string, options?: SubmitOptions): Promise<TurnResult> {
    return this.submitQuery(`Analyze this portfolio: ${symbols.join(', ')}`, sessionId, options);
  }

  marketResearch(topic: string, sessionId: string, options?: SubmitOptions): Promise<TurnResult> {
    return this.submitQuery(`Research the market for: ${topic}`, sessionId, options);
  }

  // ============================================================================
  // INTROSPECTION
  // ============================================================================

  getSystemStatus(): SystemStatus {
    return {
      initialized: true,
      config: {
        model: this.config.openaiModel,
        maxIterations: this.config.maxIterations,
        juniorMaxIterations: this.config.juniorMaxIterations,
        narrowMarginThreshold: this.config.narrowMarginThreshold,
        sessionMaxTurns: this.config.sessionMaxTurns,
      },
      providers: this.gateway.providerIds,
      agents: {
        orchestrator: this.engines.orchestrator.name,
        junior: this.engines.junior.name,
        master: this.engines.master.name,
      },
      tools: MASTER_TOOLS.length,
      activeSessions: this.sessions.size,
    };
  }

  getAgentCapabilities(): Record<'orchestrator' | 'junior' | 'master', string[]> {
    return {
      orchestrator: [
        'Classify queries by complexity',
        'Route queries to the junior or master analyst',
        'Escalate borderline or out-of-scope queries',
        'Synthesize and validate the final answer',
      ],
      junior: ['Current stock prices', 'Company information', 'Basic technical analysis', ...this.junior.toolIds],
      master: [
        'Comprehensive stock analysis',
        'Risk assessment',
        'Multi-stock comparison',
        'Portfolio analysis',
        ...this.master.toolIds,
      ],
    };
  }

  getAvailableTools(): ToolInfo[] {
    return MASTER_TOOLS.map((tool) => ({ name: tool.id, description: tool.description }));
  }

  /** One end-to-end price query in a throwaway session. */
  async testSystem(): Promise<{ testQuery: string; result: TurnResult; systemWorking: boolean }> {
    const testQuery = 'Get the current stock price for AAPL';
    const sessionId = this.startSession();
    try {
      const result = await this.submitQuery(testQuery, sessionId);
      return { testQuery, result, systemWorking: result.ok };
    } finally {
      this.endSession(sessionId);
    }
  }

  private mastraEngine(id: string, name: string, instructions: string, temperature: number): ReasoningEngine {
    return new MastraReasoningEngine({
      id,
      name,
      instructions,
      modelId: this.config.openaiModel,
      apiKey: this.config.openaiApiKey,
      temperature,
      logger: this.logger,
    });
  }
}
