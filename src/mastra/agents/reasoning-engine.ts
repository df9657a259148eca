// ============================================================================
// REASONING ENGINE
// ============================================================================
// The natural-language capability behind each worker: given a prompt and a
// toolbox, it returns text and may call tools along the way. Workers depend
// only on the `ReasoningEngine` interface; `MastraReasoningEngine` backs it
// with a Mastra Agent on an OpenAI model.
//
// Failure policy:
// - model unreachable, missing key, provider error → ReasoningEngineUnavailableError
// - caller aborted → TurnCancelledError
// - tool budget spent → a normal result with `budgetExhausted: true`
// ============================================================================

import { createOpenAI } from '@ai-sdk/openai';
import { Agent } from '@mastra/core/agent';

import { ReasoningEngineUnavailableError, TurnCancelledError, errorMessage, throwIfCancelled } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type { Toolbox } from '../tools/toolbox';

export interface ReasoningRequest {
  prompt: string;
  /** Tools the engine may call; absent for plain completions. */
  toolbox?: Toolbox;
  maxIterations: number;
  signal?: AbortSignal;
}

export interface ReasoningResult {
  text: string;
  toolCallsMade: number;
  budgetExhausted: boolean;
}

export interface ReasoningEngine {
  readonly name: string;
  invoke(request: ReasoningRequest): Promise<ReasoningResult>;
}

export interface MastraReasoningEngineOptions {
  id: string;
  name: string;
  instructions: string;
  modelId: string;
  apiKey: string | undefined;
  temperature: number;
  logger?: Logger;
}

export class MastraReasoningEngine implements ReasoningEngine {
  readonly name: string;
  private readonly options: MastraReasoningEngineOptions;
  private readonly logger: Logger;

  constructor(options: MastraReasoningEngineOptions) {
    this.name = options.name;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async invoke(request: ReasoningRequest): Promise<ReasoningResult> {
    const { apiKey, modelId, temperature } = this.options;
    throwIfCancelled(request.signal);

    if (!apiKey) {
      throw new ReasoningEngineUnavailableError(`${this.name}: OPENAI_API_KEY is not configured`);
    }

    // A fresh agent per invocation binds this turn's toolbox
    const agent = new Agent({
      id: this.options.id,
      name: this.name,
      instructions: this.options.instructions,
      model: createOpenAI({ apiKey })(modelId),
      tools: request.toolbox?.toMastraTools() ?? {},
    });

    try {
      const response = await agent.generate([{ role: 'user', content: request.prompt }], {
        // One step per tool round plus the final answer
        maxSteps: request.maxIterations + 1,
        modelSettings: { temperature },
        abortSignal: request.signal,
      });

      throwIfCancelled(request.signal);

      return {
        text: response.text,
        toolCallsMade: request.toolbox?.callsMade ?? 0,
        budgetExhausted: request.toolbox?.budgetExhausted ?? false,
      };
    } catch (error) {
      if (error instanceof TurnCancelledError || request.signal?.aborted) {
        throw new TurnCancelledError();
      }
      this.logger.error('Reasoning engine call failed', { engine: this.name, model: modelId, error: errorMessage(error) });
      throw new ReasoningEngineUnavailableError(`${this.name}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
