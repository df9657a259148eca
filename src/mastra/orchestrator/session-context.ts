import type { SynthesizedResponse } from '../types';

export interface SessionTurn {
  readonly query: string;
  readonly response: SynthesizedResponse;
  readonly completedAt: Date;
}

/** Read-only view the router consults for anaphora resolution. */
export interface SessionView {
  readonly turns: readonly SessionTurn[];
  recentTickers(): readonly string[];
}

/**
 * Per-conversation history, bounded FIFO: appending past `maxTurns` evicts
 * the oldest turn. Only the coordinator writes to it, once per completed
 * turn, and at most one turn runs against a session at a time.
 */
export class SessionContext implements SessionView {
  readonly id: string;
  readonly createdAt: Date;
  readonly maxTurns: number;

  private history: SessionTurn[] = [];
  private inFlight = false;

  constructor(id: string, maxTurns = 20) {
    if (!Number.isInteger(maxTurns) || maxTurns < 1) {
      throw new RangeError(`maxTurns must be a positive integer, got ${maxTurns}`);
    }
    this.id = id;
    this.maxTurns = maxTurns;
    this.createdAt = new Date();
  }

  get turns(): readonly SessionTurn[] {
    return [...this.history];
  }

  get length(): number {
    return this.history.length;
  }

  get busy(): boolean {
    return this.inFlight;
  }

  append(query: string, response: SynthesizedResponse): SessionTurn {
    const turn: SessionTurn = Object.freeze({ query, response, completedAt: new Date() });
    this.history.push(turn);
    while (this.history.length > this.maxTurns) {
      this.history.shift();
    }
    return turn;
  }

  /** Tickers of the most recent turn that had any. */
  recentTickers(): readonly string[] {
    for (let i = this.history.length - 1; i >= 0; i--) {
      const tickers = this.history[i]?.response.tickers ?? [];
      if (tickers.length > 0) return tickers;
    }
    return [];
  }

  clear(): void {
    this.history = [];
  }

  /** Returns false if a turn is already running on this session. */
  beginTurn(): boolean {
    if (this.inFlight) return false;
    this.inFlight = true;
    return true;
  }

  endTurn(): void {
    this.inFlight = false;
  }
}
