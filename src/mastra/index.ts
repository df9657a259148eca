import 'dotenv/config';

import { loadConfig, type SystemConfig } from './config';
import { createLogger } from './logger';
import { StockAgentSystem, type StockAgentSystemOptions } from './orchestrator/stock-agent-system';

export type CreateStockAgentSystemOptions = Omit<StockAgentSystemOptions, 'config'> & { config?: SystemConfig };

/** Builds the system from the environment (.env is loaded on import). */
export function createStockAgentSystem(options: CreateStockAgentSystemOptions = {}): StockAgentSystem {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config.logLevel);
  return new StockAgentSystem({ ...options, config, logger });
}

export { ConfigError, PROVIDER_IDS, loadConfig, type ProviderId, type SystemConfig } from './config';
export {
  ProviderError,
  ReasoningEngineUnavailableError,
  StockAgentError,
  TurnCancelledError,
  type ProviderFailureKind,
} from './errors';
export { createLogger, silentLogger, type Logger, type LogLevelName } from './logger';
export * from './types';

export { DataSourceGateway, classifyError, type DataSourceGatewayOptions } from './gateway/data-source-gateway';
export {
  AlphaVantageProvider,
  FinnhubProvider,
  YahooFinanceProvider,
  createProviders,
  type MarketDataProvider,
} from './providers';
export { QueryComplexityRouter, scoreComplexity, extractTickers } from './router/query-router';
export { KnownTickerSet, loadKnownTickers } from './data/known-tickers';
export { JuniorAnalysisWorker } from './agents/junior-analyst';
export { MasterAnalysisWorker } from './agents/master-analyst';
export { MastraReasoningEngine, type ReasoningEngine, type ReasoningRequest, type ReasoningResult } from './agents/reasoning-engine';
export { JUNIOR_TOOLS, MASTER_TOOLS } from './tools/stock-tools';
export { Toolbox, type StockTool } from './tools/toolbox';
export { OrchestratorCoordinator, shouldEscalate, synthesize } from './orchestrator/coordinator';
export { SessionContext, type SessionTurn } from './orchestrator/session-context';
export {
  StockAgentSystem,
  type ReasoningEngines,
  type StockAgentSystemOptions,
  type SystemStatus,
  type ToolInfo,
} from './orchestrator/stock-agent-system';
