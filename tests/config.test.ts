import { describe, expect, it } from 'vitest';

import { ConfigError, loadConfig } from '../src/mastra/config';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.openaiApiKey).toBeUndefined();
    expect(config.openaiModel).toBe('gpt-4o');
    expect(config.providerOrder).toEqual(['yahoo', 'alpha-vantage', 'finnhub']);
    expect(config.temperatures).toEqual({ master: 0.7, junior: 0.5, orchestrator: 0.3 });
    expect(config.maxIterations).toBe(10);
    expect(config.juniorMaxIterations).toBe(5);
    expect(config.providerMaxRetries).toBe(2);
    expect(config.providerBackoffMs).toBe(250);
    expect(config.narrowMarginThreshold).toBe(0.35);
    expect(config.sessionMaxTurns).toBe(20);
    expect(config.fetchConcurrency).toBe(4);
    expect(config.logLevel).toBe('info');
  });

  it('coerces numeric variables and trims keys', () => {
    const config = loadConfig({
      OPENAI_API_KEY: '  test-secret  ',
      MAX_ITERATIONS: '7',
      JUNIOR_AGENT_TEMPERATURE: '0.2',
      NARROW_MARGIN_THRESHOLD: '0.5',
    });

    expect(config.openaiApiKey).toBe('test-secret');
    expect(config.maxIterations).toBe(7);
    expect(config.temperatures.junior).toBe(0.2);
    expect(config.narrowMarginThreshold).toBe(0.5);
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ FINNHUB_API_KEY: '', MAX_ITERATIONS: '' });

    expect(config.finnhubApiKey).toBeUndefined();
    expect(config.maxIterations).toBe(10);
  });

  it('normalizes and dedupes the provider order', () => {
    const config = loadConfig({ PROVIDER_ORDER: ' Finnhub, yahoo ,finnhub,' });

    expect(config.providerOrder).toEqual(['finnhub', 'yahoo']);
  });

  it('rejects unknown providers', () => {
    expect(() => loadConfig({ PROVIDER_ORDER: 'yahoo,bloomberg' })).toThrow(ConfigError);
  });

  it('rejects out-of-range values with the variable name', () => {
    expect(() => loadConfig({ MAX_ITERATIONS: '0' })).toThrow(/MAX_ITERATIONS/);
    expect(() => loadConfig({ NARROW_MARGIN_THRESHOLD: '1.5' })).toThrow(/NARROW_MARGIN_THRESHOLD/);
  });

  it('returns a frozen object', () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.temperatures)).toBe(true);
  });
});
