import { SMA } from 'technicalindicators';
import type { EventSnapshot, MarketSnapshot, Signal } from '../core/types.js';
import { isPositiveFinite } from '../core/validation.js';
import type { StrategyAgent } from './interface.js';
import { PriceHistory } from './priceHistory.js';
import { buildSignal } from './signal.js';

const lastSma = (values: number[], period: number): number | undefined => {
  const series = SMA.calculate({ period, values });
  return series[series.length - 1];
};

export class TrendFollowerAgent implements StrategyAgent {
  readonly name: string;
  private readonly history: PriceHistory;

  constructor(
    private readonly fastPeriod = 10,
    private readonly slowPeriod = 30,
    name = 'trend_follower'
  ) {
    this.name = name;
    this.history = new PriceHistory(slowPeriod * 4);
  }

  evaluate(market: MarketSnapshot, _events?: EventSnapshot): Signal | null {
    if (!isPositiveFinite(market.price)) return null;
    this.history.push(market.price);
    if (this.history.length < this.slowPeriod) return null;

    const window = this.history.tail(this.slowPeriod);
    const fast = lastSma(window.slice(-this.fastPeriod), this.fastPeriod);
    const slow = lastSma(window, this.slowPeriod);
    if (fast == null || slow == null || slow <= 0 || fast === slow) return null;

    const action = fast > slow ? 'BUY' : 'SELL';
    const confidence = Math.min(0.5 + Math.abs(fast - slow) / slow, 0.95);
    return buildSignal(this.name, market, {
      action,
      confidence,
      size: 100 * confidence,
      reason: `MA crossover: fast(${fast.toFixed(2)}) ${action === 'BUY' ? 'above' : 'below'} slow(${slow.toFixed(2)})`
    });
  }
}
