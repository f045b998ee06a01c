import { readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { describe, expect, it } from 'vitest';
import { configSchema, rawSchema } from '../../src/config/schema.js';
import { loadConfig } from '../../src/config/load.js';
import { ConfigError } from '../../src/core/errors.js';

describe('config schema', () => {
  it('applies defaults', () => {
    const parsed = configSchema.parse({});
    expect(parsed.symbol).toBe('BTC-USD');
    expect(parsed.rounds).toBe(30);
    expect(parsed.selection.epsilon).toBe(0.15);
    expect(parsed.selection.weights).toEqual({ confidence: 0.5, winRate: 0.3, epochWins: 0.2 });
    expect(parsed.sources.confirmationThreshold).toBe(2);
    expect(parsed.sources.onchainInflowThresholdUsd).toBe(400_000_000);
    expect(parsed.performance).toEqual({ retention: undefined, annualizationFactor: 252 });
    expect(parsed.enabledAgents).toHaveLength(10);
    expect(parsed.explainer.enabled).toBe(false);
  });

  it('parses the agent roster in order', () => {
    const parsed = configSchema.parse({ ENABLED_AGENTS: 'hybrid, news,trend_follower' });
    expect(parsed.enabledAgents).toEqual(['hybrid', 'news', 'trend_follower']);
  });

  it('rejects unknown agents', () => {
    expect(configSchema.safeParse({ ENABLED_AGENTS: 'hybrid,oracle' }).success).toBe(false);
  });

  it('coerces numbers and bounds the confirmation threshold', () => {
    const parsed = configSchema.parse({ HYBRID_CONFIRMATION_THRESHOLD: '3', SELECTION_EPSILON: '0' });
    expect(parsed.sources.confirmationThreshold).toBe(3);
    expect(parsed.selection.epsilon).toBe(0);
    expect(configSchema.safeParse({ HYBRID_CONFIRMATION_THRESHOLD: '4' }).success).toBe(false);
    expect(configSchema.safeParse({ SELECTION_EPSILON: '1.5' }).success).toBe(false);
  });

  it('keeps the explainer disabled without an API key', () => {
    expect(configSchema.parse({ EXPLAINER_ENABLED: 'true' }).explainer.enabled).toBe(false);
    const enabled = configSchema.parse({ EXPLAINER_ENABLED: 'true', EXPLAINER_API_KEY: 'test-secret' });
    expect(enabled.explainer.enabled).toBe(true);
    expect(enabled.explainer.apiKey).toBe('test-secret');
  });

  it('requires the fast trend window to be shorter than the slow one', () => {
    expect(configSchema.safeParse({ TREND_FAST_PERIOD: '30', TREND_SLOW_PERIOD: '10' }).success).toBe(false);
  });
});

describe('loadConfig', () => {
  it('throws ConfigError with the failing keys', () => {
    expect(() => loadConfig({ ROUNDS: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ ROUNDS: '0' })).toThrow(/^Config validation failed: ROUNDS:/);
  });
});

describe('.env.example', () => {
  const text = readFileSync(new URL('../../.env.example', import.meta.url), 'utf8');

  it('lists every key the schema reads', () => {
    const documented = text
      .split('\n')
      .map((line) => line.replace(/^#\s*/, '').split('=')[0]?.trim())
      .filter(Boolean);
    for (const key of Object.keys(rawSchema.shape)) expect(documented).toContain(key);
  });

  it('parses as a valid config', () => {
    expect(configSchema.safeParse(dotenv.parse(text)).success).toBe(true);
  });
});
