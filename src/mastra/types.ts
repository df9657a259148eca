// ============================================================================
// CORE DATA MODEL
// ============================================================================
// Shared types for the orchestration engine: market data requests and
// payloads, provider results, worker outputs and synthesized responses.
// Everything produced by the engine is frozen after creation.
// ============================================================================

import type { ProviderFailureKind } from './errors';

export type { ProviderFailureKind } from './errors';

// ============================================================================
// MARKET DATA
// ============================================================================

export const HISTORY_RANGES = ['1mo', '3mo', '6mo', '1y'] as const;

export type HistoryRange = (typeof HISTORY_RANGES)[number];

export type MarketDataRequest =
  | { readonly kind: 'QUOTE' }
  | { readonly kind: 'PROFILE' }
  | { readonly kind: 'HISTORY'; readonly range: HistoryRange };

export type RequestKind = MarketDataRequest['kind'];

export const QUOTE_REQUEST: MarketDataRequest = { kind: 'QUOTE' };
export const PROFILE_REQUEST: MarketDataRequest = { kind: 'PROFILE' };

export function historyRequest(range: HistoryRange): MarketDataRequest {
  return { kind: 'HISTORY', range };
}

export function describeRequest(request: MarketDataRequest): string {
  return request.kind === 'HISTORY' ? `HISTORY(${request.range})` : request.kind;
}

export interface StockQuote {
  ticker: string;
  price: number;
  currency: string;
  timestamp: Date;
  change: number | null;
  changePercent: number | null;
  volume: number | null;
}

export interface CompanyProfile {
  ticker: string;
  name: string;
  sector: string | null;
  industry: string | null;
  marketCap: number | null;
  peRatio: number | null;
  currency: string | null;
}

export interface PricePoint {
  date: Date;
  close: number;
  high: number | null;
  low: number | null;
  volume: number | null;
}

export interface PriceHistory {
  ticker: string;
  range: HistoryRange;
  /** Oldest first. */
  points: PricePoint[];
}

export type MarketDataPayload =
  | { readonly kind: 'QUOTE'; readonly quote: StockQuote }
  | { readonly kind: 'PROFILE'; readonly profile: CompanyProfile }
  | { readonly kind: 'HISTORY'; readonly history: PriceHistory };

// ============================================================================
// PROVIDER RESULTS
// ============================================================================

export interface ProviderSuccess {
  readonly ok: true;
  readonly ticker: string;
  readonly request: MarketDataRequest;
  readonly payload: MarketDataPayload;
  readonly providerId: string;
  readonly timestamp: Date;
}

export interface ProviderFailure {
  readonly ok: false;
  readonly ticker: string;
  readonly request: MarketDataRequest;
  readonly providerId: string;
  readonly kind: ProviderFailureKind;
  readonly retryable: boolean;
  readonly attempts: number;
  readonly message: string;
}

export type ProviderResult = ProviderSuccess | ProviderFailure;

/**
 * What one gateway fetch hands back: the first success together with the
 * failures that preceded it, or every failure when the chain is exhausted.
 */
export type GatewayOutcome =
  | {
      readonly status: 'success';
      readonly ticker: string;
      readonly request: MarketDataRequest;
      readonly result: ProviderSuccess;
      readonly failures: readonly ProviderFailure[];
    }
  | {
      readonly status: 'failed';
      readonly ticker: string;
      readonly request: MarketDataRequest;
      readonly failures: readonly ProviderFailure[];
    };

// ============================================================================
// CLASSIFICATION
// ============================================================================

export const COMPLEXITY_CLASSES = ['SIMPLE', 'COMPREHENSIVE', 'COMPARATIVE', 'PORTFOLIO'] as const;

export type ComplexityClass = (typeof COMPLEXITY_CLASSES)[number];

export type TickerSource = 'QUERY' | 'SESSION' | 'ENGINE' | 'NONE';

export interface ClassificationSignals {
  simple: string[];
  deep: string[];
  comprehensive: string[];
  portfolio: string[];
  comparison: string[];
}

export interface Classification {
  readonly complexity: ComplexityClass;
  readonly tickers: readonly string[];
  /** 0..1; how clearly the query landed in its class. */
  readonly margin: number;
  readonly signals: ClassificationSignals;
  readonly tickerSource: TickerSource;
}

// ============================================================================
// WORKER OUTPUT
// ============================================================================

export type WorkerId = 'junior' | 'master';

export type Confidence = 'HIGH' | 'LOW';

export type LowConfidenceReason = 'DATA_UNAVAILABLE' | 'SCOPE_EXCEEDED' | 'BUDGET_EXHAUSTED' | 'NO_TICKERS';

export interface TickerCoverage {
  readonly ticker: string;
  readonly available: boolean;
  readonly failures: readonly ProviderFailure[];
}

export interface WorkerOutput {
  readonly workerId: WorkerId;
  readonly summary: string;
  readonly dataUsed: readonly ProviderSuccess[];
  readonly confidence: Confidence;
  readonly lowConfidenceReasons: readonly LowConfidenceReason[];
  readonly coverage: readonly TickerCoverage[];
  readonly toolCallsMade: number;
}

// ============================================================================
// TURN RESULT
// ============================================================================

export type TurnState =
  | 'CLASSIFYING'
  | 'DISPATCHED_JUNIOR'
  | 'DISPATCHED_MASTER'
  | 'ESCALATING'
  | 'SYNTHESIZING'
  | 'DONE'
  | 'FAILED';

export interface SynthesizedResponse {
  readonly text: string;
  readonly contributingWorkers: readonly WorkerId[];
  readonly escalated: boolean;
  readonly warnings: readonly string[];
  readonly complexity: ComplexityClass;
  readonly tickers: readonly string[];
  readonly states: readonly TurnState[];
}

export type TurnErrorKind =
  | 'REASONING_ENGINE_UNAVAILABLE'
  | 'CANCELLED'
  | 'UNKNOWN_SESSION'
  | 'SESSION_BUSY'
  | 'INVALID_QUERY'
  | 'INTERNAL';

export interface TurnError {
  readonly kind: TurnErrorKind;
  readonly message: string;
}

export type TurnResult =
  | { readonly ok: true; readonly response: SynthesizedResponse }
  | { readonly ok: false; readonly error: TurnError };
