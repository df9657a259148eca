// Shared JSON-over-HTTP plumbing for the keyed market data providers.
// Maps transport problems onto provider failure kinds so the gateway can
// decide between retrying and moving down the chain.

import { ProviderError, errorMessage, type ProviderFailureKind } from '../errors';

const DEFAULT_TIMEOUT_MS = 10_000;

export interface HttpRequestOptions {
  providerId: string;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export function classifyHttpStatus(status: number): ProviderFailureKind {
  if (status === 429) return 'RATE_LIMITED';
  if (status === 404) return 'NOT_FOUND';
  // Missing entitlement or bad credentials will not fix themselves on retry
  if (status === 401 || status === 403 || status === 501) return 'UNSUPPORTED';
  return 'TRANSIENT_NETWORK';
}

export async function fetchJson(url: URL, options: HttpRequestOptions): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  const onCallerAbort = () => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
  }

  try {
    let res: Response;
    try {
      res = await fetch(url.toString(), {
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
    } catch (error) {
      throw new ProviderError('TRANSIENT_NETWORK', `${options.providerId}: request failed (${errorMessage(error)})`, {
        cause: error,
      });
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new ProviderError(
        classifyHttpStatus(res.status),
        `${options.providerId}: HTTP ${res.status}${body ? ` ${body.slice(0, 200)}` : ''}`,
        { status: res.status },
      );
    }

    try {
      return await res.json();
    } catch (error) {
      throw new ProviderError('TRANSIENT_NETWORK', `${options.providerId}: malformed JSON response`, { cause: error });
    }
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener('abort', onCallerAbort);
  }
}

/** Numeric fields from these APIs arrive as strings, often "None" or "-". */
export function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const parsed = Number.parseFloat(value.replace(/%$/, ''));
  return Number.isFinite(parsed) ? parsed : null;
}
