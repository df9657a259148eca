// ============================================================================
// TOOL CAPABILITY REGISTRY
// ============================================================================
// Every worker holds a fixed, named set of tools bound at construction. For
// each invocation a Toolbox wraps that set with:
// - the tool-call budget (calls past the budget are refused, not thrown)
// - the data ledger: every gateway success lands in `dataUsed`
// - the turn's AbortSignal
// - a per-ticker queue: gateway work for one ticker runs one chain at a time,
//   even when the engine issues tool calls in parallel
// The reasoning engine selects tools by id through `toMastraTools()`.
// ============================================================================

import type { ToolsInput } from '@mastra/core/agent';
import { createTool } from '@mastra/core/tools';
import type { z } from 'zod';

import { throwIfCancelled } from '../errors';
import type { DataSourceGateway } from '../gateway/data-source-gateway';
import { silentLogger, type Logger } from '../logger';
import type { GatewayOutcome, ProviderFailure, ProviderSuccess } from '../types';

export interface ToolContext {
  gateway: DataSourceGateway;
  signal?: AbortSignal;
  concurrency: number;
  record(outcome: GatewayOutcome): void;
  /** Runs `task` after every earlier task queued for the same ticker has settled. */
  exclusive<T>(ticker: string, task: () => Promise<T>): Promise<T>;
}

export type ToolInputSchema = z.AnyZodObject;

export interface StockTool {
  readonly id: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  execute(input: unknown, ctx: ToolContext): Promise<unknown>;
}

export interface StockToolDefinition<S extends ToolInputSchema> {
  id: string;
  description: string;
  inputSchema: S;
  run(input: z.output<S>, ctx: ToolContext): Promise<unknown>;
}

export interface ToolError {
  error: string;
}

export function defineStockTool<S extends ToolInputSchema>(definition: StockToolDefinition<S>): StockTool {
  return Object.freeze({
    id: definition.id,
    description: definition.description,
    inputSchema: definition.inputSchema,
    async execute(input: unknown, ctx: ToolContext): Promise<unknown> {
      const parsed = definition.inputSchema.safeParse(input);
      if (!parsed.success) {
        return { error: `Invalid input for ${definition.id}: ${parsed.error.issues.map((i) => i.message).join('; ')}` };
      }
      return definition.run(parsed.data, ctx);
    },
  });
}

export interface ToolboxOptions {
  tools: readonly StockTool[];
  gateway: DataSourceGateway;
  /** Maximum number of tool calls for one worker invocation. */
  budget: number;
  signal?: AbortSignal;
  concurrency?: number;
  logger?: Logger;
}

export class Toolbox implements ToolContext {
  readonly gateway: DataSourceGateway;
  readonly signal?: AbortSignal;
  readonly concurrency: number;
  readonly budget: number;
  readonly dataUsed: ProviderSuccess[] = [];
  readonly failures: ProviderFailure[] = [];

  private readonly tools: ReadonlyMap<string, StockTool>;
  private readonly logger: Logger;
  private readonly tickerQueues = new Map<string, Promise<void>>();
  private calls = 0;
  private exhausted = false;

  constructor(options: ToolboxOptions) {
    this.tools = new Map(options.tools.map((tool) => [tool.id, tool]));
    this.gateway = options.gateway;
    this.signal = options.signal;
    this.budget = options.budget;
    this.concurrency = options.concurrency ?? 4;
    this.logger = options.logger ?? silentLogger;
  }

  get callsMade(): number {
    return this.calls;
  }

  get budgetExhausted(): boolean {
    return this.exhausted;
  }

  get toolIds(): string[] {
    return [...this.tools.keys()];
  }

  async call(id: string, input: unknown): Promise<unknown> {
    throwIfCancelled(this.signal);

    const tool = this.tools.get(id);
    if (!tool) {
      return { error: `Unknown tool: ${id}` } satisfies ToolError;
    }

    if (this.calls >= this.budget) {
      this.exhausted = true;
      this.logger.warn('Tool budget exhausted', { tool: id, budget: this.budget });
      return {
        error: `Tool budget of ${this.budget} calls exhausted. Answer with the data already gathered.`,
      } satisfies ToolError;
    }

    this.calls++;
    this.logger.debug('Tool call', { tool: id, call: this.calls, budget: this.budget });
    return tool.execute(input, this);
  }

  record(outcome: GatewayOutcome): void {
    if (outcome.status === 'success') {
      this.dataUsed.push(outcome.result);
    }
    this.failures.push(...outcome.failures);
  }

  exclusive<T>(ticker: string, task: () => Promise<T>): Promise<T> {
    const key = ticker.trim().toUpperCase();
    const previous = this.tickerQueues.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    this.tickerQueues.set(
      key,
      run.then(
        () => undefined,
        () => undefined,
      ),
    );
    return run;
  }

  /** Carries results obtained earlier in the turn into this ledger. */
  adopt(successes: readonly ProviderSuccess[], failures: readonly ProviderFailure[] = []): void {
    this.dataUsed.push(...successes);
    this.failures.push(...failures);
  }

  describe(): { id: string; description: string }[] {
    return [...this.tools.values()].map((tool) => ({ id: tool.id, description: tool.description }));
  }

  toMastraTools(): ToolsInput {
    const mastraTools: ToolsInput = {};
    for (const tool of this.tools.values()) {
      mastraTools[tool.id] = createTool({
        id: tool.id,
        description: tool.description,
        inputSchema: tool.inputSchema,
        execute: async (inputData) => this.call(tool.id, inputData),
      });
    }
    return mastraTools;
  }
}
