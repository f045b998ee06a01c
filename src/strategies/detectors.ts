/**
 * Source readers shared by the single-source agents and the hybrid fusion
 * agent. Each turns one EventSnapshot section into directional readings;
 * confidence and dedup policy stay with the caller.
 */

import type {
  DirectionalAction,
  ForecastMarketData,
  NewsEvent,
  OnChainData
} from '../core/types.js';
import type { BoundedSeenSet } from '../core/seenSet.js';

// ── Forecast markets ────────────────────────────────────────────

interface ForecastGroup {
  label: string;
  keys: readonly string[];
  /** Direction implied by a high "yes" probability. */
  likelyAction: DirectionalAction;
}

export const FORECAST_GROUPS: readonly ForecastGroup[] = [
  { label: 'BTC price', keys: ['btc_100k', 'btc_above_100k', 'bitcoin_100k'], likelyAction: 'BUY' },
  { label: 'Fed hike', keys: ['fed_hike', 'fed_rate_hike', 'rate_hike'], likelyAction: 'SELL' },
  { label: 'Recession', keys: ['recession', 'us_recession', 'recession_2025'], likelyAction: 'SELL' }
];

export interface ForecastReading {
  market: string;
  label: string;
  probability: number;
  action: DirectionalAction;
  /** How far the probability sits past the crossed bound. */
  edge: number;
}

const opposite = (action: DirectionalAction): DirectionalAction => (action === 'BUY' ? 'SELL' : 'BUY');

/**
 * Every decisive forecast reading, in group priority order. A reading is
 * decisive when its probability is above `threshold` or below `1 - threshold`.
 */
export const scanForecastMarkets = (data: ForecastMarketData, threshold: number): ForecastReading[] => {
  const readings: ForecastReading[] = [];
  for (const group of FORECAST_GROUPS) {
    for (const key of group.keys) {
      const market = data[key];
      if (!market) continue;
      const p = market.yesProbability;
      if (p > threshold) {
        readings.push({ market: key, label: group.label, probability: p, action: group.likelyAction, edge: p - threshold });
      } else if (p < 1 - threshold) {
        readings.push({
          market: key,
          label: group.label,
          probability: p,
          action: opposite(group.likelyAction),
          edge: 1 - threshold - p
        });
      }
    }
  }
  return readings;
};

// ── On-chain flows ──────────────────────────────────────────────

export const STABLECOIN_MINT_BULLISH_USD = 400_000_000;
export const STABLECOIN_BURN_BEARISH_USD = -300_000_000;

/** Remembers the previous DeFi TVL reading so a percentage change can be derived. */
export class TvlMonitor {
  private previous: number | undefined;

  /** Percentage change against the last reading, or null on the first reading. */
  update(tvl: number | undefined): number | null {
    if (tvl === undefined || tvl <= 0) return null;
    const prev = this.previous;
    this.previous = tvl;
    if (prev === undefined) return null;
    return ((tvl - prev) / prev) * 100;
  }
}

export interface OnChainVoteOptions {
  inflowThresholdUsd: number;
  tvlChangePct: number;
}

export interface OnChainVote {
  action: DirectionalAction;
  metric: 'exchange_inflows' | 'stablecoin_supply' | 'defi_tvl';
  value: number;
}

/**
 * Coarse on-chain direction for fusion: exchange inflows, then stablecoin
 * supply change, then TVL drift. `tvlChange` is the caller's TvlMonitor output.
 */
export const readOnChainVote = (
  data: OnChainData,
  tvlChange: number | null,
  opts: OnChainVoteOptions
): OnChainVote | null => {
  const inflows = data.totalExchangeInflows ?? 0;
  if (inflows >= opts.inflowThresholdUsd) {
    return { action: 'BUY', metric: 'exchange_inflows', value: inflows };
  }

  const stablecoinChange = data.stablecoinSupply?.change24hUsd ?? 0;
  if (stablecoinChange > STABLECOIN_MINT_BULLISH_USD) {
    return { action: 'BUY', metric: 'stablecoin_supply', value: stablecoinChange };
  }
  if (stablecoinChange < STABLECOIN_BURN_BEARISH_USD) {
    return { action: 'SELL', metric: 'stablecoin_supply', value: stablecoinChange };
  }

  if (tvlChange !== null) {
    if (tvlChange < -opts.tvlChangePct) return { action: 'SELL', metric: 'defi_tvl', value: tvlChange };
    if (tvlChange > opts.tvlChangePct) return { action: 'BUY', metric: 'defi_tvl', value: tvlChange };
  }
  return null;
};

// ── News ────────────────────────────────────────────────────────

/** Event identity: source plus the first 50 characters of the title. */
export const newsEventId = (event: Pick<NewsEvent, 'source' | 'title'>): string =>
  `${event.source}_${event.title.slice(0, 50)}`;

export interface RankedNewsEvent {
  event: NewsEvent;
  id: string;
  weightedImpact: number;
}

/**
 * Picks the highest weighted-impact unseen event at or above `threshold` and
 * marks only that event as seen.
 */
export const takeTopUnseenEvent = (
  events: readonly NewsEvent[],
  seen: BoundedSeenSet,
  threshold: number,
  weigh: (event: NewsEvent) => number = (e) => e.impactScore
): RankedNewsEvent | null => {
  let best: RankedNewsEvent | null = null;
  for (const event of events) {
    const id = newsEventId(event);
    if (seen.has(id)) continue;
    const weightedImpact = weigh(event);
    if (weightedImpact < threshold) continue;
    if (!best || weightedImpact > best.weightedImpact) best = { event, id, weightedImpact };
  }
  if (best) seen.add(best.id);
  return best;
};

/** Direction from sentiment, falling back to Fed / SEC title keywords. */
export const readNewsDirection = (event: NewsEvent): DirectionalAction | null => {
  if (event.sentiment === 'bullish') return 'BUY';
  if (event.sentiment === 'bearish') return 'SELL';

  const title = event.title.toLowerCase();
  if (event.source === 'fed') {
    if (title.includes('hike') || title.includes('hawkish')) return 'SELL';
    if (title.includes('cut') || title.includes('dovish')) return 'BUY';
  }
  if (event.source === 'sec' && title.includes('etf')) {
    if (title.includes('approve')) return 'BUY';
    if (title.includes('reject')) return 'SELL';
  }
  return null;
};
