import type { EventSnapshot, MarketSnapshot, Signal } from '../core/types.js';
import { BoundedSeenSet } from '../core/seenSet.js';
import { formatPercent, isPositiveFinite } from '../core/validation.js';
import type { StrategyAgent } from './interface.js';
import { scanForecastMarkets } from './detectors.js';
import { buildSignal } from './signal.js';

export interface ForecastMarketAgentOptions {
  threshold?: number;
  maxConfidence?: number;
  dedupMaxEntries?: number;
}

/**
 * Trades on forecast-market probabilities: likely BTC upside is bullish,
 * likely Fed hikes or recession are bearish. An unchanged reading of a market
 * that already triggered is ignored.
 */
export class ForecastMarketAgent implements StrategyAgent {
  readonly name: string;
  private readonly threshold: number;
  private readonly maxConfidence: number;
  private readonly seen: BoundedSeenSet;

  constructor(opts: ForecastMarketAgentOptions = {}, name = 'forecast_market') {
    this.name = name;
    this.threshold = opts.threshold ?? 0.65;
    this.maxConfidence = opts.maxConfidence ?? 0.9;
    this.seen = new BoundedSeenSet(opts.dedupMaxEntries ?? 500);
  }

  evaluate(market: MarketSnapshot, events?: EventSnapshot): Signal | null {
    if (!isPositiveFinite(market.price) || !events?.forecastMarket) return null;

    for (const reading of scanForecastMarkets(events.forecastMarket, this.threshold)) {
      const eventId = `forecast:${reading.market}:${reading.probability.toFixed(2)}`;
      if (!this.seen.markIfNew(eventId)) continue;

      const confidence = Math.min(this.maxConfidence, 0.65 + reading.edge * 2);
      const title = events.forecastMarket[reading.market]?.title;
      return buildSignal(this.name, market, {
        action: reading.action,
        confidence,
        reason:
          `${reading.label} market ${reading.market} at ${formatPercent(reading.probability, 1)} ` +
          `(threshold ${formatPercent(this.threshold)})` +
          (title ? `: "${title}"` : '')
      });
    }
    return null;
  }
}
