/**
 * Shared test helpers: mock factories for all modules.
 */

import type { EventSnapshot, MarketSnapshot, Signal } from '../src/core/types.js';
import type { Logger } from '../src/core/logger.js';
import type { Metrics } from '../src/core/metrics.js';
import type { RandomSource } from '../src/core/random.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export interface LogCall {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: Record<string, unknown>;
}

export const createMockLogger = (calls: LogCall[] = []): Logger & { calls: LogCall[] } => ({
  calls,
  debug: (message, context) => { calls.push({ level: 'debug', message, context }); },
  info: (message, context) => { calls.push({ level: 'info', message, context }); },
  warn: (message, context) => { calls.push({ level: 'warn', message, context }); },
  error: (message, context) => { calls.push({ level: 'error', message, context }); },
  child: () => createMockLogger(calls),
});

// ── Mock Metrics ────────────────────────────────────────────────────

export const createMockMetrics = (): Metrics & { counters: Map<string, number> } => {
  const counters = new Map<string, number>();
  return {
    counters,
    increment(name: string, value = 1) { counters.set(name, (counters.get(name) ?? 0) + value); },
    gauge() {},
  };
};

// ── Scripted randomness ─────────────────────────────────────────────

/** Replays `values` in order, then repeats the last one. */
export const scriptedRandom = (...values: number[]): RandomSource => {
  let i = 0;
  return {
    next: () => {
      const value = values[Math.min(i, values.length - 1)] ?? 0;
      i += 1;
      return value;
    },
  };
};

// ── Market Factory ──────────────────────────────────────────────────

export function makeMarket(overrides: Partial<MarketSnapshot> = {}): MarketSnapshot {
  return {
    symbol: 'BTC-USD',
    price: 50000,
    volume: 1000,
    timestamp: 1_700_000_000_000,
    ...overrides,
  };
}

// ── Signal Factory ──────────────────────────────────────────────────

export function makeSignal(overrides: Partial<Signal> = {}): Signal {
  return {
    timestamp: 1_700_000_000_000,
    symbol: 'BTC-USD',
    action: 'BUY',
    confidence: 0.7,
    size: 100,
    reason: 'test signal',
    agentName: 'agent_a',
    price: 50000,
    ...overrides,
  };
}

// ── Event scenarios ─────────────────────────────────────────────────

/** Forecast, on-chain and news all point up. */
export const bullishEvents = (): EventSnapshot => ({
  forecastMarket: { btc_100k: { yesProbability: 0.72 } },
  onchain: { totalExchangeInflows: 450_000_000 },
  news: {
    events: [
      { source: 'sec', title: 'SEC approves spot ETF', impactScore: 4.5, sentiment: 'bullish', matchedKeywords: ['etf'] },
    ],
  },
});

/** Forecast says SELL, on-chain says BUY, news is silent. */
export const conflictingEvents = (): EventSnapshot => ({
  forecastMarket: { fed_hike: { yesProbability: 0.78 } },
  onchain: { totalExchangeInflows: 600_000_000 },
});
