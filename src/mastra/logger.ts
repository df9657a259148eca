import { PinoLogger } from '@mastra/loggers';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * The slice of a logger the orchestration core writes to. `PinoLogger`
 * satisfies it, and tests hand in a silent stub.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export function createLogger(level: LogLevelName = 'info'): Logger {
  return new PinoLogger({
    name: 'StockAgents',
    level,
  });
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
