// ============================================================================
// SYSTEM CONFIGURATION
// ============================================================================
// Read once from the environment and frozen for the life of the process.
// Optional provider credentials only shorten the fallback chain; the OpenAI
// key is checked when a reasoning engine is first invoked.
// ============================================================================

import { z } from 'zod';

export const PROVIDER_IDS = ['yahoo', 'alpha-vantage', 'finnhub'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

const providerOrderSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((id) => id.trim().toLowerCase())
      .filter((id) => id.length > 0),
  )
  .pipe(z.array(z.enum(PROVIDER_IDS)).min(1))
  .transform((ids) => [...new Set(ids)]);

const optionalKey = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  OPENAI_API_KEY: optionalKey,
  OPENAI_MODEL: z.string().default('gpt-4o'),

  ALPHA_VANTAGE_API_KEY: optionalKey,
  FINNHUB_API_KEY: optionalKey,
  PROVIDER_ORDER: providerOrderSchema.default('yahoo,alpha-vantage,finnhub'),

  MASTER_AGENT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  JUNIOR_AGENT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.5),
  ORCHESTRATOR_AGENT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  MAX_ITERATIONS: z.coerce.number().int().positive().default(10),
  JUNIOR_MAX_ITERATIONS: z.coerce.number().int().positive().default(5),

  PROVIDER_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  PROVIDER_BACKOFF_MS: z.coerce.number().int().min(0).default(250),
  NARROW_MARGIN_THRESHOLD: z.coerce.number().min(0).max(1).default(0.35),
  SESSION_MAX_TURNS: z.coerce.number().int().positive().default(20),
  FETCH_CONCURRENCY: z.coerce.number().int().positive().default(4),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface SystemConfig {
  readonly openaiApiKey: string | undefined;
  readonly openaiModel: string;
  readonly alphaVantageApiKey: string | undefined;
  readonly finnhubApiKey: string | undefined;
  readonly providerOrder: readonly ProviderId[];
  readonly temperatures: {
    readonly master: number;
    readonly junior: number;
    readonly orchestrator: number;
  };
  /** Tool-call budget of the master analyst. */
  readonly maxIterations: number;
  readonly juniorMaxIterations: number;
  readonly providerMaxRetries: number;
  readonly providerBackoffMs: number;
  readonly narrowMarginThreshold: number;
  readonly sessionMaxTurns: number;
  readonly fetchConcurrency: number;
  readonly logLevel: 'debug' | 'info' | 'warn' | 'error';
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SystemConfig {
  // Empty strings from .env files mean "unset"
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(cleaned);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;

  return Object.freeze({
    openaiApiKey: e.OPENAI_API_KEY,
    openaiModel: e.OPENAI_MODEL,
    alphaVantageApiKey: e.ALPHA_VANTAGE_API_KEY,
    finnhubApiKey: e.FINNHUB_API_KEY,
    providerOrder: Object.freeze([...e.PROVIDER_ORDER]),
    temperatures: Object.freeze({
      master: e.MASTER_AGENT_TEMPERATURE,
      junior: e.JUNIOR_AGENT_TEMPERATURE,
      orchestrator: e.ORCHESTRATOR_AGENT_TEMPERATURE,
    }),
    maxIterations: e.MAX_ITERATIONS,
    juniorMaxIterations: e.JUNIOR_MAX_ITERATIONS,
    providerMaxRetries: e.PROVIDER_MAX_RETRIES,
    providerBackoffMs: e.PROVIDER_BACKOFF_MS,
    narrowMarginThreshold: e.NARROW_MARGIN_THRESHOLD,
    sessionMaxTurns: e.SESSION_MAX_TURNS,
    fetchConcurrency: e.FETCH_CONCURRENCY,
    logLevel: e.LOG_LEVEL,
  });
}
