// ============================================================================
// DATA SOURCE GATEWAY
// ============================================================================
// Unifies the market data providers behind one fetch call with ordered
// fallback. Each call walks a small state machine per provider:
//
//   attempt → classify failure → retry (same provider) | advance (next)
//
// RATE_LIMITED and TRANSIENT_NETWORK are retried with exponential backoff;
// NOT_FOUND and UNSUPPORTED advance immediately. Provider failures never
// escape as exceptions: the caller gets the first success plus the failures
// that preceded it, or the complete failure sequence.
// ============================================================================

import { setTimeout as sleepFor } from 'node:timers/promises';

import { ProviderError, TurnCancelledError, errorMessage, throwIfCancelled, type ProviderFailureKind } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type { MarketDataProvider } from '../providers/types';
import {
  describeRequest,
  type GatewayOutcome,
  type MarketDataPayload,
  type MarketDataRequest,
  type ProviderFailure,
  type ProviderSuccess,
} from '../types';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface DataSourceGatewayOptions {
  providers: readonly MarketDataProvider[];
  /** Additional attempts against the same provider for retryable failures. */
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  logger?: Logger;
  sleep?: Sleep;
}

export interface FetchOptions {
  signal?: AbortSignal;
}

/** Runs one ticker's fetch chain; lets a caller queue work per ticker. */
export type TickerScheduler = (ticker: string, task: () => Promise<GatewayOutcome[]>) => Promise<GatewayOutcome[]>;

export interface FetchForTickersOptions extends FetchOptions {
  concurrency?: number;
  schedule?: TickerScheduler;
}

const RETRYABLE: ReadonlySet<ProviderFailureKind> = new Set(['RATE_LIMITED', 'TRANSIENT_NETWORK']);

export function isRetryable(kind: ProviderFailureKind): boolean {
  return RETRYABLE.has(kind);
}

/**
 * Classifies anything a provider throws. `ProviderError`s carry their own
 * kind; other errors are judged by an HTTP-like `status` and their message.
 */
export function classifyError(error: unknown): ProviderFailureKind {
  if (error instanceof ProviderError) return error.kind;

  const status = readStatus(error);
  if (status === 429) return 'RATE_LIMITED';
  if (status === 404) return 'NOT_FOUND';
  if (status === 501) return 'UNSUPPORTED';

  const message = errorMessage(error).toLowerCase();
  if (message.includes('rate limit') || message.includes('too many requests')) return 'RATE_LIMITED';
  if (message.includes('not found')) return 'NOT_FOUND';
  if (message.includes('not supported') || message.includes('unsupported')) return 'UNSUPPORTED';
  return 'TRANSIENT_NETWORK';
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
}

const defaultSleep: Sleep = async (ms, signal) => {
  try {
    await sleepFor(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) throw new TurnCancelledError();
    throw error;
  }
};

export class DataSourceGateway {
  private readonly providers: readonly MarketDataProvider[];
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(options: DataSourceGatewayOptions) {
    this.providers = Object.freeze([...options.providers]);
    this.maxRetries = options.maxRetries ?? 2;
    this.baseDelayMs = options.baseDelayMs ?? 250;
    this.maxDelayMs = options.maxDelayMs ?? 4000;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get providerIds(): string[] {
    return this.providers.map((p) => p.id);
  }

  /** Delay before retry number `retry` (1-based) against the same provider. */
  backoffDelay(retry: number): number {
    return Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** (retry - 1));
  }

  async fetch(ticker: string, request: MarketDataRequest, options: FetchOptions = {}): Promise<GatewayOutcome> {
    const { signal } = options;
    const symbol = ticker.trim().toUpperCase();
    const failures: ProviderFailure[] = [];

    for (const provider of this.providers) {
      // Counter is local to this call and this provider
      let attempts = 0;

      while (true) {
        throwIfCancelled(signal);
        attempts++;

        try {
          const payload = await this.attempt(provider, symbol, request, signal);
          throwIfCancelled(signal);

          const result: ProviderSuccess = Object.freeze({
            ok: true,
            ticker: symbol,
            request,
            payload,
            providerId: provider.id,
            timestamp: new Date(),
          });

          if (failures.length > 0) {
            this.logger.info('Provider fallback succeeded', {
              ticker: symbol,
              request: describeRequest(request),
              providerId: provider.id,
              failedProviders: failures.map((f) => f.providerId),
            });
          }

          return Object.freeze({ status: 'success', ticker: symbol, request, result, failures: Object.freeze(failures) });
        } catch (error) {
          if (error instanceof TurnCancelledError) throw error;
          throwIfCancelled(signal);

          const kind = classifyError(error);
          const retryable = isRetryable(kind);

          if (retryable && attempts <= this.maxRetries) {
            const delay = this.backoffDelay(attempts);
            this.logger.debug('Provider attempt failed, retrying', {
              ticker: symbol,
              request: describeRequest(request),
              providerId: provider.id,
              kind,
              attempt: attempts,
              delayMs: delay,
            });
            await this.sleep(delay, signal);
            continue;
          }

          this.logger.warn('Provider failed, advancing', {
            ticker: symbol,
            request: describeRequest(request),
            providerId: provider.id,
            kind,
            attempts,
            error: errorMessage(error),
          });

          failures.push(
            Object.freeze({
              ok: false,
              ticker: symbol,
              request,
              providerId: provider.id,
              kind,
              retryable,
              attempts,
              message: errorMessage(error),
            }),
          );
          break;
        }
      }
    }

    this.logger.warn('All providers failed', {
      ticker: symbol,
      request: describeRequest(request),
      kinds: failures.map((f) => `${f.providerId}:${f.kind}`),
    });

    return Object.freeze({ status: 'failed', ticker: symbol, request, failures: Object.freeze(failures) });
  }

  /** Several request kinds for one ticker, strictly one after another. */
  async fetchMany(
    ticker: string,
    requests: readonly MarketDataRequest[],
    options: FetchOptions = {},
  ): Promise<GatewayOutcome[]> {
    const outcomes: GatewayOutcome[] = [];
    for (const request of requests) {
      outcomes.push(await this.fetch(ticker, request, options));
    }
    return outcomes;
  }

  /**
   * Distinct tickers are independent, so they run concurrently in batches of
   * `concurrency`; each ticker's own requests stay sequential. Tickers are
   * normalised and deduplicated, and the result is keyed by the normalised
   * symbol.
   */
  async fetchForTickers(
    tickers: readonly string[],
    requests: readonly MarketDataRequest[],
    options: FetchForTickersOptions = {},
  ): Promise<Map<string, GatewayOutcome[]>> {
    const concurrency = Math.max(1, options.concurrency ?? 4);
    const schedule = options.schedule ?? ((_ticker, task) => task());
    const symbols = [...new Set(tickers.map((t) => t.trim().toUpperCase()))];
    const results = new Map<string, GatewayOutcome[]>();

    for (let i = 0; i < symbols.length; i += concurrency) {
      const batch = symbols.slice(i, i + concurrency);
      const outcomes = await Promise.all(
        batch.map((ticker) => schedule(ticker, () => this.fetchMany(ticker, requests, options))),
      );
      batch.forEach((ticker, j) => results.set(ticker, outcomes[j] ?? []));
    }

    return results;
  }

  private async attempt(
    provider: MarketDataProvider,
    ticker: string,
    request: MarketDataRequest,
    signal?: AbortSignal,
  ): Promise<MarketDataPayload> {
    switch (request.kind) {
      case 'QUOTE':
        return { kind: 'QUOTE', quote: await provider.fetchQuote(ticker, signal) };
      case 'PROFILE':
        return { kind: 'PROFILE', profile: await provider.fetchProfile(ticker, signal) };
      case 'HISTORY':
        return { kind: 'HISTORY', history: await provider.fetchHistory(ticker, request.range, signal) };
    }
  }
}
