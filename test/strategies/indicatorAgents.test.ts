import { describe, expect, it } from 'vitest';
import { TrendFollowerAgent } from '../../src/strategies/trendFollower.js';
import { MeanReversionAgent } from '../../src/strategies/meanReversion.js';
import type { Signal } from '../../src/core/types.js';
import type { StrategyAgent } from '../../src/strategies/interface.js';
import { makeMarket } from '../helpers.js';

const feed = (agent: StrategyAgent, prices: number[]): Array<Signal | null> =>
  prices.map((price) => agent.evaluate(makeMarket({ price })));

describe('TrendFollowerAgent', () => {
  it('waits for a full slow window', () => {
    const results = feed(new TrendFollowerAgent(10, 30), Array.from({ length: 29 }, (_, i) => 100 + i));
    expect(results.every((s) => s === null)).toBe(true);
  });

  it('buys when the fast average is above the slow one', () => {
    const results = feed(new TrendFollowerAgent(10, 30), Array.from({ length: 30 }, (_, i) => 100 + i));
    const signal = results[29];
    expect(signal?.action).toBe('BUY');
    // fast = 124.5, slow = 114.5
    expect(signal?.confidence).toBeCloseTo(0.5 + 10 / 114.5, 6);
    expect(signal?.size).toBeCloseTo(100 * (0.5 + 10 / 114.5), 6);
    expect(signal?.reason).toBe('MA crossover: fast(124.50) above slow(114.50)');
  });

  it('sells in a downtrend', () => {
    const results = feed(new TrendFollowerAgent(10, 30), Array.from({ length: 30 }, (_, i) => 200 - i));
    expect(results[29]?.action).toBe('SELL');
  });

  it('has no opinion on a flat market or a missing price', () => {
    const agent = new TrendFollowerAgent(2, 3);
    expect(feed(agent, [100, 100, 100])[2]).toBeNull();
    expect(agent.evaluate(makeMarket({ price: undefined }))).toBeNull();
  });
});

describe('MeanReversionAgent', () => {
  it('sells a spike above the upper band', () => {
    const prices = [...Array.from({ length: 19 }, () => 100), 130];
    const signal = feed(new MeanReversionAgent(20, 2), prices)[19];
    expect(signal?.action).toBe('SELL');
    expect(signal?.confidence).toBeCloseTo(0.75, 1);
    expect(signal?.reason.startsWith('Price 130.00 above Bollinger band')).toBe(true);
  });

  it('buys a drop below the lower band', () => {
    const prices = [...Array.from({ length: 19 }, () => 100), 70];
    expect(feed(new MeanReversionAgent(20, 2), prices)[19]?.action).toBe('BUY');
  });

  it('has no band on a flat window', () => {
    const prices = Array.from({ length: 20 }, () => 100);
    expect(feed(new MeanReversionAgent(20, 2), prices)[19]).toBeNull();
  });
});
