// ============================================================================
// ERROR TAXONOMY
// ============================================================================
// Provider failures are recovered inside the DataSourceGateway and only ever
// surface as provenance or warnings. Reasoning engine failures abort the turn.
// Cancellation is raised at suspension points when the caller abandons a turn.
// ============================================================================

export type ProviderFailureKind = 'RATE_LIMITED' | 'NOT_FOUND' | 'TRANSIENT_NETWORK' | 'UNSUPPORTED';

export class StockAgentError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Thrown by market data providers. `kind` drives the gateway's
 * retry-or-advance decision.
 */
export class ProviderError extends StockAgentError {
  readonly kind: ProviderFailureKind;
  readonly status?: number;

  constructor(kind: ProviderFailureKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(`PROVIDER_${kind}`, message, { cause: options?.cause });
    this.kind = kind;
    this.status = options?.status;
  }
}

export class ReasoningEngineUnavailableError extends StockAgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('REASONING_ENGINE_UNAVAILABLE', message, options);
  }
}

export class TurnCancelledError extends StockAgentError {
  constructor(message = 'The turn was cancelled by the caller') {
    super('CANCELLED', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new TurnCancelledError();
  }
}
