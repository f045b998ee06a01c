import { SD, SMA } from 'technicalindicators';
import type { EventSnapshot, MarketSnapshot, Signal } from '../core/types.js';
import { isPositiveFinite } from '../core/validation.js';
import type { StrategyAgent } from './interface.js';
import { PriceHistory } from './priceHistory.js';
import { buildSignal } from './signal.js';

export class MeanReversionAgent implements StrategyAgent {
  readonly name: string;
  private readonly history: PriceHistory;

  constructor(
    private readonly period = 20,
    private readonly stdDevMultiplier = 2.0,
    name = 'mean_reversion'
  ) {
    this.name = name;
    this.history = new PriceHistory(period * 4);
  }

  evaluate(market: MarketSnapshot, _events?: EventSnapshot): Signal | null {
    const price = market.price;
    if (!isPositiveFinite(price)) return null;
    this.history.push(price);
    if (this.history.length < this.period) return null;

    const window = this.history.tail(this.period);
    const mean = SMA.calculate({ period: this.period, values: window })[0];
    const sigma = SD.calculate({ period: this.period, values: window })[0];
    // A flat window has no band to revert to
    if (mean == null || sigma == null || mean <= 0 || sigma <= 0) return null;

    const upper = mean + this.stdDevMultiplier * sigma;
    const lower = mean - this.stdDevMultiplier * sigma;
    const bands = `lower(${lower.toFixed(2)}), upper(${upper.toFixed(2)})`;

    if (price <= lower) {
      const confidence = Math.min(0.6 + Math.abs(price - lower) / mean, 0.95);
      return buildSignal(this.name, market, {
        action: 'BUY',
        confidence,
        size: 100 * confidence,
        reason: `Price ${price.toFixed(2)} below Bollinger band: ${bands}`
      });
    }
    if (price >= upper) {
      const confidence = Math.min(0.6 + Math.abs(price - upper) / mean, 0.95);
      return buildSignal(this.name, market, {
        action: 'SELL',
        confidence,
        size: 100 * confidence,
        reason: `Price ${price.toFixed(2)} above Bollinger band: ${bands}`
      });
    }
    return null;
  }
}
