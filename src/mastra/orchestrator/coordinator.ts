// ============================================================================
// ORCHESTRATOR COORDINATOR
// ============================================================================
// Runs one turn as an explicit state machine:
//
//   CLASSIFYING → DISPATCHED_JUNIOR ─┬─────────────→ SYNTHESIZING → DONE
//                                    └→ ESCALATING ─┘
//               → DISPATCHED_MASTER ──────────────→ SYNTHESIZING → DONE
//
// Any state may end in FAILED. A turn escalates at most once: the guard is
// evaluated a single time, after the Junior pass of a SIMPLE query.
//
// The session is written once, after synthesis. Failed or cancelled turns
// leave it untouched.
// ============================================================================

import type { JuniorAnalysisWorker } from '../agents/junior-analyst';
import type { MasterAnalysisWorker } from '../agents/master-analyst';
import { formatFailures } from '../analysis/report';
import { ReasoningEngineUnavailableError, TurnCancelledError, errorMessage, throwIfCancelled } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type { QueryComplexityRouter } from '../router/query-router';
import type {
  Classification,
  SynthesizedResponse,
  TurnError,
  TurnResult,
  TurnState,
  WorkerId,
  WorkerOutput,
} from '../types';
import type { SessionContext } from './session-context';

export interface CoordinatorOptions {
  router: QueryComplexityRouter;
  junior: JuniorAnalysisWorker;
  master: MasterAnalysisWorker;
  /** SIMPLE classifications below this margin escalate. */
  narrowMarginThreshold?: number;
  /** Run a Junior pass ahead of the Master for non-SIMPLE queries. */
  preseedMaster?: boolean;
  logger?: Logger;
}

export interface TurnOptions {
  signal?: AbortSignal;
}

// ============================================================================
// ESCALATION GUARD
// ============================================================================

/**
 * Escalate when the Junior says the question was beyond it (LOW for any
 * reason but missing data or missing tickers), or when a SIMPLE call was
 * borderline.
 */
export function shouldEscalate(junior: WorkerOutput, classification: Classification, threshold: number): boolean {
  const scopeProblem =
    junior.confidence === 'LOW' &&
    junior.lowConfidenceReasons.some((r) => r !== 'DATA_UNAVAILABLE' && r !== 'NO_TICKERS');
  const narrowMargin = classification.complexity === 'SIMPLE' && classification.margin < threshold;
  return scopeProblem || narrowMargin;
}

// ============================================================================
// SYNTHESIS
// ============================================================================

function mentions(text: string, ticker: string): boolean {
  const escaped = ticker.replace(/[.*+?^${}()|[\]\\-]/g, '\\$&');
  return new RegExp(`(?<![A-Za-z0-9])\\$?${escaped}(?![A-Za-z0-9])`).test(text);
}

export function synthesize(params: {
  classification: Classification;
  outputs: readonly WorkerOutput[];
  escalated: boolean;
  states: readonly TurnState[];
}): SynthesizedResponse {
  const { classification, outputs, escalated } = params;
  const final = outputs[outputs.length - 1];
  const text = final?.summary ?? '';

  const contributingWorkers: WorkerId[] = [...new Set(outputs.map((o) => o.workerId))];
  const warnings: string[] = [];

  if (classification.tickers.length === 0) {
    warnings.push('No stock ticker could be identified in the query.');
  }

  for (const ticker of classification.tickers) {
    const hasData = outputs.some((o) => o.dataUsed.some((s) => s.ticker === ticker));
    if (!hasData) {
      const failures = outputs.flatMap((o) => o.coverage.filter((c) => c.ticker === ticker).flatMap((c) => c.failures));
      warnings.push(`No market data available for ${ticker} (${formatFailures(failures)}).`);
    }
    if (!mentions(text, ticker)) {
      warnings.push(`The response does not mention ${ticker}.`);
    }
  }

  if (final?.lowConfidenceReasons.includes('BUDGET_EXHAUSTED')) {
    warnings.push('The analysis was cut short because the tool-call budget was exhausted.');
  }

  return Object.freeze({
    text,
    contributingWorkers: Object.freeze(contributingWorkers),
    escalated,
    warnings: Object.freeze(warnings),
    complexity: classification.complexity,
    tickers: classification.tickers,
    states: Object.freeze([...params.states]),
  });
}

// ============================================================================
// COORDINATOR
// ============================================================================

export class OrchestratorCoordinator {
  private readonly router: QueryComplexityRouter;
  private readonly junior: JuniorAnalysisWorker;
  private readonly master: MasterAnalysisWorker;
  private readonly threshold: number;
  private readonly preseedMaster: boolean;
  private readonly logger: Logger;

  constructor(options: CoordinatorOptions) {
    this.router = options.router;
    this.junior = options.junior;
    this.master = options.master;
    this.threshold = options.narrowMarginThreshold ?? 0.35;
    this.preseedMaster = options.preseedMaster ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  async runTurn(query: string, session: SessionContext, options: TurnOptions = {}): Promise<TurnResult> {
    if (!session.beginTurn()) {
      return failure('SESSION_BUSY', `Session ${session.id} already has a turn in progress`);
    }

    const { signal } = options;
    const states: TurnState[] = [];
    const enter = (state: TurnState) => {
      states.push(state);
      this.logger.debug('Turn state', { sessionId: session.id, state });
    };

    try {
      throwIfCancelled(signal);

      enter('CLASSIFYING');
      const classification = await this.router.classify(query, session, { signal });
      const { complexity, tickers } = classification;

      const outputs: WorkerOutput[] = [];
      let escalated = false;

      if (complexity === 'SIMPLE') {
        enter('DISPATCHED_JUNIOR');
        const junior = await this.junior.handle(query, tickers, { signal });
        outputs.push(junior);

        if (shouldEscalate(junior, classification, this.threshold)) {
          enter('ESCALATING');
          this.logger.info('Escalating to master analyst', {
            sessionId: session.id,
            reasons: junior.lowConfidenceReasons,
            margin: classification.margin,
          });
          outputs.push(await this.master.handle(query, tickers, complexity, junior, { signal }));
          escalated = true;
        }
      } else {
        let seed: WorkerOutput | undefined;
        if (this.preseedMaster) {
          enter('DISPATCHED_JUNIOR');
          seed = await this.junior.handle(query, tickers, { signal });
          outputs.push(seed);
        }
        enter('DISPATCHED_MASTER');
        outputs.push(await this.master.handle(query, tickers, complexity, seed, { signal }));
      }

      // Results from an abandoned turn are discarded
      throwIfCancelled(signal);

      enter('SYNTHESIZING');
      // The response carries the completed trace; the turn is DONE once it is stored
      const response = synthesize({ classification, outputs, escalated, states: [...states, 'DONE'] });
      session.append(query, response);
      enter('DONE');

      this.logger.info('Turn completed', {
        sessionId: session.id,
        complexity,
        tickers,
        workers: response.contributingWorkers,
        escalated,
        warnings: response.warnings.length,
      });

      return { ok: true, response };
    } catch (error) {
      enter('FAILED');
      return this.toFailure(error, session.id, signal);
    } finally {
      session.endTurn();
    }
  }

  private toFailure(error: unknown, sessionId: string, signal?: AbortSignal): TurnResult {
    if (error instanceof TurnCancelledError || signal?.aborted) {
      this.logger.info('Turn cancelled', { sessionId });
      return failure('CANCELLED', 'The query was cancelled');
    }
    if (error instanceof ReasoningEngineUnavailableError) {
      this.logger.error('Reasoning engine unavailable', { sessionId, error: error.message });
      return failure('REASONING_ENGINE_UNAVAILABLE', error.message);
    }
    this.logger.error('Turn failed', { sessionId, error: errorMessage(error) });
    return failure('INTERNAL', `Internal error: ${errorMessage(error)}`);
  }
}

function failure(kind: TurnError['kind'], message: string): TurnResult {
  return { ok: false, error: Object.freeze({ kind, message }) };
}
