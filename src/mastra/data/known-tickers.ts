// ============================================================================
// KNOWN TICKERS
// ============================================================================
// Symbol set the router cross-checks uppercase tokens against, with company
// names and aliases for whole-word matching ("Apple" → AAPL). The list lives
// in known-tickers.json beside this file.
// ============================================================================

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

const knownTickerSchema = z.object({
  symbol: z.string().regex(/^[A-Z]{1,5}(-[A-Z]{1,2})?$/),
  name: z.string(),
  aliases: z.array(z.string()).default([]),
});

export type KnownTicker = z.infer<typeof knownTickerSchema>;

export class KnownTickerSet {
  private readonly symbols: ReadonlySet<string>;
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(readonly entries: readonly KnownTicker[]) {
    this.symbols = new Set(entries.map((e) => e.symbol));
    this.aliases = new Map(entries.flatMap((e) => e.aliases.map((alias) => [alias.toLowerCase(), e.symbol] as const)));
  }

  has(symbol: string): boolean {
    return this.symbols.has(symbol);
  }

  get size(): number {
    return this.symbols.size;
  }

  /** Lower-cased alias → symbol. */
  aliasEntries(): [string, string][] {
    return [...this.aliases.entries()];
  }

  nameOf(symbol: string): string | undefined {
    return this.entries.find((e) => e.symbol === symbol)?.name;
  }
}

let cached: KnownTickerSet | undefined;

export function loadKnownTickers(): KnownTickerSet {
  if (!cached) {
    const path = fileURLToPath(new URL('./known-tickers.json', import.meta.url));
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
    cached = new KnownTickerSet(z.array(knownTickerSchema).parse(raw));
  }
  return cached;
}
