import { describe, expect, it, vi } from 'vitest';

import { ProviderError, TurnCancelledError } from '../../src/mastra/errors';
import { DataSourceGateway, classifyError, isRetryable } from '../../src/mastra/gateway/data-source-gateway';
import { PROFILE_REQUEST, QUOTE_REQUEST, historyRequest } from '../../src/mastra/types';
import { FakeProvider, healthyProvider, instantGateway, makeQuote } from '../helpers';

describe('classifyError', () => {
  it('keeps the kind of a ProviderError', () => {
    expect(classifyError(new ProviderError('UNSUPPORTED', 'no history'))).toBe('UNSUPPORTED');
  });

  it('reads an HTTP-like status', () => {
    expect(classifyError(Object.assign(new Error('boom'), { status: 429 }))).toBe('RATE_LIMITED');
    expect(classifyError(Object.assign(new Error('boom'), { status: 404 }))).toBe('NOT_FOUND');
    expect(classifyError(Object.assign(new Error('boom'), { status: 501 }))).toBe('UNSUPPORTED');
  });

  it('falls back to the message and then to a transient failure', () => {
    expect(classifyError(new Error('Too Many Requests'))).toBe('RATE_LIMITED');
    expect(classifyError(new Error('Symbol not found'))).toBe('NOT_FOUND');
    expect(classifyError(new Error('socket hang up'))).toBe('TRANSIENT_NETWORK');
    expect(classifyError('weird')).toBe('TRANSIENT_NETWORK');
  });

  it('only retries rate limits and transient failures', () => {
    expect(isRetryable('RATE_LIMITED')).toBe(true);
    expect(isRetryable('TRANSIENT_NETWORK')).toBe(true);
    expect(isRetryable('NOT_FOUND')).toBe(false);
    expect(isRetryable('UNSUPPORTED')).toBe(false);
  });
});

describe('DataSourceGateway', () => {
  it('returns the first provider success without failures', async () => {
    const gateway = instantGateway([healthyProvider('primary', ['AAPL']), healthyProvider('secondary', ['AAPL'])]);

    const outcome = await gateway.fetch('aapl', QUOTE_REQUEST);

    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success') return;
    expect(outcome.ticker).toBe('AAPL');
    expect(outcome.result.providerId).toBe('primary');
    expect(outcome.result.payload).toEqual({ kind: 'QUOTE', quote: makeQuote('AAPL', 100) });
    expect(outcome.failures).toEqual([]);
  });

  it('retries a rate-limited provider, then falls back to the next one', async () => {
    const primary = new FakeProvider('primary', { quote: { AAPL: ['RATE_LIMITED'] } });
    const secondary = healthyProvider('secondary', ['AAPL']);
    const gateway = instantGateway([primary, secondary], 2);

    const outcome = await gateway.fetch('AAPL', QUOTE_REQUEST);

    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success') return;
    expect(outcome.result.providerId).toBe('secondary');
    expect(primary.callCount('quote', 'AAPL')).toBe(3);
    expect(outcome.failures).toHaveLength(1);
    expect(outcome.failures[0]).toMatchObject({
      ok: false,
      providerId: 'primary',
      kind: 'RATE_LIMITED',
      retryable: true,
      attempts: 3,
    });
  });

  it('recovers when a retry succeeds on the same provider', async () => {
    const primary = new FakeProvider('primary', { quote: { AAPL: ['TRANSIENT_NETWORK', makeQuote('AAPL', 123)] } });
    const secondary = healthyProvider('secondary', ['AAPL']);
    const gateway = instantGateway([primary, secondary]);

    const outcome = await gateway.fetch('AAPL', QUOTE_REQUEST);

    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success') return;
    expect(outcome.result.providerId).toBe('primary');
    expect(outcome.failures).toEqual([]);
    expect(secondary.callCount()).toBe(0);
  });

  it('advances immediately on NOT_FOUND', async () => {
    const primary = new FakeProvider('primary');
    const secondary = healthyProvider('secondary', ['AAPL']);
    const gateway = instantGateway([primary, secondary]);

    const outcome = await gateway.fetch('AAPL', PROFILE_REQUEST);

    expect(primary.callCount()).toBe(1);
    expect(outcome.failures[0]).toMatchObject({ providerId: 'primary', kind: 'NOT_FOUND', retryable: false, attempts: 1 });
  });

  it('returns every failure in order when the chain is exhausted', async () => {
    const gateway = instantGateway(
      [
        new FakeProvider('a', { quote: { ZZZZ: ['NOT_FOUND'] } }),
        new FakeProvider('b', { quote: { ZZZZ: ['RATE_LIMITED'] } }),
        new FakeProvider('c', { quote: { ZZZZ: ['UNSUPPORTED'] } }),
      ],
      1,
    );

    const outcome = await gateway.fetch('ZZZZ', QUOTE_REQUEST);

    expect(outcome.status).toBe('failed');
    expect(outcome.failures.map((f) => [f.providerId, f.kind, f.attempts])).toEqual([
      ['a', 'NOT_FOUND', 1],
      ['b', 'RATE_LIMITED', 2],
      ['c', 'UNSUPPORTED', 1],
    ]);
  });

  it('classifies plain errors thrown by a provider', async () => {
    const provider = new FakeProvider('plain');
    vi.spyOn(provider, 'fetchQuote').mockRejectedValue(Object.assign(new Error('gone'), { status: 404 }));
    const gateway = instantGateway([provider]);

    const outcome = await gateway.fetch('AAPL', QUOTE_REQUEST);

    expect(outcome.failures[0]).toMatchObject({ kind: 'NOT_FOUND', message: 'gone' });
  });

  it('fails with no failures when no provider is configured', async () => {
    const outcome = await instantGateway([]).fetch('AAPL', QUOTE_REQUEST);

    expect(outcome).toMatchObject({ status: 'failed', failures: [] });
  });

  it('waits with exponential backoff between retries', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const primary = new FakeProvider('primary', { quote: { AAPL: ['TRANSIENT_NETWORK'] } });
    const gateway = new DataSourceGateway({ providers: [primary], maxRetries: 3, baseDelayMs: 100, maxDelayMs: 300, sleep });

    await gateway.fetch('AAPL', QUOTE_REQUEST);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 300]);
    expect(primary.callCount()).toBe(4);
  });

  it('caps the backoff delay', () => {
    const gateway = new DataSourceGateway({ providers: [], baseDelayMs: 250, maxDelayMs: 4000 });

    expect([1, 2, 3, 5, 6].map((n) => gateway.backoffDelay(n))).toEqual([250, 500, 1000, 4000, 4000]);
  });

  it('throws TurnCancelledError when the signal is already aborted', async () => {
    const provider = healthyProvider('primary', ['AAPL']);
    const controller = new AbortController();
    controller.abort();

    await expect(instantGateway([provider]).fetch('AAPL', QUOTE_REQUEST, { signal: controller.signal })).rejects.toBeInstanceOf(
      TurnCancelledError,
    );
    expect(provider.callCount()).toBe(0);
  });

  it('stops retrying once the caller aborts during backoff', async () => {
    const controller = new AbortController();
    const primary = new FakeProvider('primary', { quote: { AAPL: ['RATE_LIMITED'] } });
    const secondary = healthyProvider('secondary', ['AAPL']);
    const gateway = new DataSourceGateway({
      providers: [primary, secondary],
      sleep: async () => controller.abort(),
    });

    await expect(gateway.fetch('AAPL', QUOTE_REQUEST, { signal: controller.signal })).rejects.toBeInstanceOf(
      TurnCancelledError,
    );
    expect(primary.callCount()).toBe(1);
    expect(secondary.callCount()).toBe(0);
  });

  it('aborts the real backoff timer', async () => {
    const controller = new AbortController();
    const primary = new FakeProvider('primary', { quote: { AAPL: ['RATE_LIMITED'] } });
    const gateway = new DataSourceGateway({ providers: [primary], baseDelayMs: 60_000 });

    const pending = gateway.fetch('AAPL', QUOTE_REQUEST, { signal: controller.signal });
    setTimeout(() => controller.abort(), 5);

    await expect(pending).rejects.toBeInstanceOf(TurnCancelledError);
  });

  it('runs requests for one ticker in order', async () => {
    const provider = healthyProvider('primary', ['AAPL']);
    const outcomes = await instantGateway([provider]).fetchMany('AAPL', [QUOTE_REQUEST, PROFILE_REQUEST, historyRequest('6mo')]);

    expect(outcomes.map((o) => o.request.kind)).toEqual(['QUOTE', 'PROFILE', 'HISTORY']);
    expect(provider.calls.map((c) => c.method)).toEqual(['quote', 'profile', 'history']);
    const history = outcomes[2];
    expect(history?.status === 'success' && history.result.payload.kind === 'HISTORY' && history.result.payload.history.range).toBe(
      '6mo',
    );
  });

  it('fetches several tickers in bounded batches', async () => {
    let active = 0;
    let peak = 0;
    const provider = healthyProvider('primary', ['AAPL', 'MSFT', 'GOOGL', 'TSLA', 'JPM']);
    const original = provider.fetchQuote.bind(provider);
    vi.spyOn(provider, 'fetchQuote').mockImplementation(async (ticker) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      active--;
      return original(ticker);
    });

    const results = await instantGateway([provider]).fetchForTickers(['AAPL', 'MSFT', 'GOOGL', 'TSLA', 'JPM'], [QUOTE_REQUEST], {
      concurrency: 2,
    });

    expect([...results.keys()]).toEqual(['AAPL', 'MSFT', 'GOOGL', 'TSLA', 'JPM']);
    expect([...results.values()].every((o) => o[0]?.status === 'success')).toBe(true);
    expect(peak).toBe(2);
  });

  it('fetches each ticker once however it is spelled', async () => {
    const provider = healthyProvider('primary', ['AAPL', 'MSFT']);
    const scheduled: string[] = [];

    const results = await instantGateway([provider]).fetchForTickers(['aapl', 'AAPL', ' MSFT '], [QUOTE_REQUEST], {
      schedule: (ticker, task) => {
        scheduled.push(ticker);
        return task();
      },
    });

    expect([...results.keys()]).toEqual(['AAPL', 'MSFT']);
    expect(scheduled).toEqual(['AAPL', 'MSFT']);
    expect(provider.callCount('quote', 'AAPL')).toBe(1);
  });
});
