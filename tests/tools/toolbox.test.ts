import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

vi.mock('@mastra/core/tools', () => ({
  createTool: (config: { id: string }) => config,
}));

import { TurnCancelledError } from '../../src/mastra/errors';
import { Toolbox, defineStockTool } from '../../src/mastra/tools/toolbox';
import { QUOTE_REQUEST } from '../../src/mastra/types';
import { healthyProvider, instantGateway } from '../helpers';

const echoTool = defineStockTool({
  id: 'echo',
  description: 'Echo a ticker',
  inputSchema: z.object({ ticker: z.string().min(1) }),
  run: async ({ ticker }) => ({ ticker }),
});

function toolbox(budget: number, signal?: AbortSignal) {
  return new Toolbox({ tools: [echoTool], gateway: instantGateway([healthyProvider('primary', ['AAPL'])]), budget, signal });
}

describe('Toolbox', () => {
  it('runs a tool and counts the call', async () => {
    const box = toolbox(2);

    await expect(box.call('echo', { ticker: 'AAPL' })).resolves.toEqual({ ticker: 'AAPL' });
    expect(box.callsMade).toBe(1);
    expect(box.budgetExhausted).toBe(false);
  });

  it('refuses calls past the budget without throwing', async () => {
    const box = toolbox(1);

    await box.call('echo', { ticker: 'AAPL' });
    const refused = await box.call('echo', { ticker: 'MSFT' });

    expect(refused).toEqual({ error: 'Tool budget of 1 calls exhausted. Answer with the data already gathered.' });
    expect(box.callsMade).toBe(1);
    expect(box.budgetExhausted).toBe(true);
  });

  it('reports unknown tools without spending budget', async () => {
    const box = toolbox(1);

    await expect(box.call('get-news', {})).resolves.toEqual({ error: 'Unknown tool: get-news' });
    expect(box.callsMade).toBe(0);
  });

  it('reports invalid input', async () => {
    const box = toolbox(1);

    const result = await box.call('echo', { ticker: 42 });

    expect(result).toEqual({ error: 'Invalid input for echo: Expected string, received number' });
  });

  it('throws once the turn is cancelled', async () => {
    const controller = new AbortController();
    const box = toolbox(5, controller.signal);
    controller.abort();

    await expect(box.call('echo', { ticker: 'AAPL' })).rejects.toBeInstanceOf(TurnCancelledError);
  });

  it('records successes in the ledger and keeps failures', async () => {
    const box = toolbox(1);
    const gateway = instantGateway([healthyProvider('primary', ['AAPL'])]);

    box.record(await gateway.fetch('AAPL', QUOTE_REQUEST));
    box.record(await gateway.fetch('ZZZZ', QUOTE_REQUEST));

    expect(box.dataUsed.map((s) => s.ticker)).toEqual(['AAPL']);
    expect(box.failures.map((f) => [f.ticker, f.kind])).toEqual([['ZZZZ', 'NOT_FOUND']]);
  });

  it('exposes its tools to the agent by id', () => {
    const box = toolbox(1);

    expect(Object.keys(box.toMastraTools())).toEqual(['echo']);
    expect(box.describe()).toEqual([{ id: 'echo', description: 'Echo a ticker' }]);
  });

  it('runs queued work for one ticker in order, even after a rejection', async () => {
    const box = toolbox(1);
    const order: string[] = [];

    const first = box.exclusive('AAPL', async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push('first');
      throw new Error('boom');
    });
    const second = box.exclusive('aapl', async () => {
      order.push('second');
      return 'ok';
    });
    const other = box.exclusive('MSFT', async () => {
      order.push('other');
      return 'msft';
    });

    await expect(first).rejects.toThrow('boom');
    await expect(second).resolves.toBe('ok');
    await expect(other).resolves.toBe('msft');
    expect(order).toEqual(['other', 'first', 'second']);
  });
});
