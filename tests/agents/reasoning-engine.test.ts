import { beforeEach, describe, expect, it, vi } from 'vitest';

const mastra = vi.hoisted(() => ({
  agentConfigs: [] as { id: string; name: string; tools: Record<string, unknown> }[],
  generate: vi.fn(),
  createOpenAI: vi.fn((_options: { apiKey: string }) => (modelId: string) => ({ modelId })),
}));

vi.mock('@mastra/core/agent', () => ({
  Agent: class {
    generate = mastra.generate;
    constructor(config: { id: string; name: string; tools: Record<string, unknown> }) {
      mastra.agentConfigs.push(config);
    }
  },
}));

vi.mock('@mastra/core/tools', () => ({
  createTool: (config: { id: string }) => config,
}));

vi.mock('@ai-sdk/openai', () => ({ createOpenAI: mastra.createOpenAI }));

import { MastraReasoningEngine } from '../../src/mastra/agents/reasoning-engine';
import { ReasoningEngineUnavailableError, TurnCancelledError } from '../../src/mastra/errors';
import { JUNIOR_TOOLS } from '../../src/mastra/tools/stock-tools';
import { Toolbox } from '../../src/mastra/tools/toolbox';
import { instantGateway } from '../helpers';

function engine(apiKey: string | undefined = 'test-secret') {
  return new MastraReasoningEngine({
    id: 'junior-analyst',
    name: 'Junior Analyst',
    instructions: 'Answer briefly.',
    modelId: 'gpt-4o',
    apiKey,
    temperature: 0.5,
  });
}

describe('MastraReasoningEngine', () => {
  beforeEach(() => {
    mastra.agentConfigs.length = 0;
    mastra.generate.mockReset();
    mastra.createOpenAI.mockClear();
  });

  it('runs the agent with the step limit and temperature', async () => {
    mastra.generate.mockResolvedValue({ text: 'AAPL is at $100.' });
    const toolbox = new Toolbox({ tools: JUNIOR_TOOLS, gateway: instantGateway([]), budget: 5 });

    const result = await engine().invoke({ prompt: 'Price of AAPL?', toolbox, maxIterations: 5 });

    expect(result).toEqual({ text: 'AAPL is at $100.', toolCallsMade: 0, budgetExhausted: false });
    expect(mastra.createOpenAI).toHaveBeenCalledWith({ apiKey: 'test-secret' });
    expect(mastra.agentConfigs[0]).toMatchObject({ id: 'junior-analyst', name: 'Junior Analyst', model: { modelId: 'gpt-4o' } });
    expect(Object.keys(mastra.agentConfigs[0]?.tools ?? {})).toEqual(JUNIOR_TOOLS.map((t) => t.id));
    expect(mastra.generate).toHaveBeenCalledWith([{ role: 'user', content: 'Price of AAPL?' }], {
      maxSteps: 6,
      modelSettings: { temperature: 0.5 },
      abortSignal: undefined,
    });
  });

  it('passes no tools for a plain completion', async () => {
    mastra.generate.mockResolvedValue({ text: 'AAPL' });

    await engine().invoke({ prompt: 'Which tickers?', maxIterations: 0 });

    expect(mastra.agentConfigs[0]?.tools).toEqual({});
    expect(mastra.generate).toHaveBeenCalledWith(expect.any(Array), expect.objectContaining({ maxSteps: 1 }));
  });

  it('is unavailable without an API key', async () => {
    await expect(engine(undefined).invoke({ prompt: 'hi', maxIterations: 0 })).rejects.toThrow(
      new ReasoningEngineUnavailableError('Junior Analyst: OPENAI_API_KEY is not configured'),
    );
    expect(mastra.agentConfigs).toHaveLength(0);
  });

  it('wraps model failures', async () => {
    mastra.generate.mockRejectedValue(new Error('503 Service Unavailable'));

    const error = await engine()
      .invoke({ prompt: 'hi', maxIterations: 0 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReasoningEngineUnavailableError);
    expect(error).toMatchObject({ message: 'Junior Analyst: 503 Service Unavailable' });
  });

  it('reports an abort during generation as cancellation', async () => {
    const controller = new AbortController();
    mastra.generate.mockImplementation(async () => {
      controller.abort();
      throw new Error('This operation was aborted');
    });

    await expect(engine().invoke({ prompt: 'hi', maxIterations: 0, signal: controller.signal })).rejects.toBeInstanceOf(
      TurnCancelledError,
    );
  });
});
