import type { MarketSnapshot, NewsSentiment } from '../core/types.js';
import { SeededRandom, pickIndex } from '../core/random.js';
import type { EventProviders } from './eventAssembler.js';

// Per-round random walk parameters
const DRIFT = 0.0002;
const VOLATILITY = 0.012;
const PRICE_FLOOR_MULTIPLIER = 0.2;

const HEADLINES: ReadonlyArray<{ source: string; title: string; sentiment: NewsSentiment; keywords: string[] }> = [
  { source: 'fed', title: 'FOMC signals further rate hike as inflation stays sticky', sentiment: 'bearish', keywords: ['rate hike', 'hawkish'] },
  { source: 'fed', title: 'Fed minutes point to a pause in tightening', sentiment: 'neutral', keywords: ['pause'] },
  { source: 'fed', title: 'Fed chair hints at rate cut before year end', sentiment: 'bullish', keywords: ['rate cut', 'dovish'] },
  { source: 'sec', title: 'SEC approves additional spot bitcoin ETF listings', sentiment: 'bullish', keywords: ['etf', 'approve'] },
  { source: 'sec', title: 'SEC delays decision on spot ETF application', sentiment: 'neutral', keywords: ['etf'] },
  { source: 'sec', title: 'SEC files enforcement action against offshore exchange', sentiment: 'bearish', keywords: ['enforcement'] },
  { source: 'wire', title: 'Large custodian reports record institutional crypto inflows', sentiment: 'bullish', keywords: ['inflows'] },
  { source: 'wire', title: 'Major lender halts withdrawals citing liquidity stress', sentiment: 'bearish', keywords: ['withdrawals'] }
];

export interface SyntheticSourceOptions {
  seed: number;
  symbol: string;
  startPrice?: number;
  startTime?: number;
  intervalMs?: number;
}

/**
 * Reproducible stand-in for live feeds: a geometric random walk for the market
 * plus forecast, on-chain and news providers drawn from the same seed.
 */
export class SyntheticSnapshotSource {
  private readonly random: SeededRandom;
  private readonly symbol: string;
  private readonly basePrice: number;
  private readonly intervalMs: number;
  private price: number;
  private time: number;
  private tvl = 90_000_000_000;

  constructor(opts: SyntheticSourceOptions) {
    this.random = new SeededRandom(opts.seed);
    this.symbol = opts.symbol;
    this.basePrice = opts.startPrice ?? 50_000;
    this.price = this.basePrice;
    this.time = opts.startTime ?? Date.now();
    this.intervalMs = opts.intervalMs ?? 60_000;
  }

  /** Advances the walk one step and returns the new snapshot. */
  nextMarket(): MarketSnapshot {
    const shock = this.random.nextGaussian();
    this.price = Math.max(this.price * (1 + DRIFT + VOLATILITY * shock), this.basePrice * PRICE_FLOOR_MULTIPLIER);
    this.time += this.intervalMs;
    const spread = this.price * 0.0002;
    return {
      symbol: this.symbol,
      price: round2(this.price),
      volume: Math.round(500 + this.random.next() * 1500),
      timestamp: this.time,
      bid: round2(this.price - spread),
      ask: round2(this.price + spread),
      volatility: VOLATILITY
    };
  }

  providers(): EventProviders {
    return {
      forecastMarket: async () => ({
        btc_100k: { yesProbability: this.probability(0.3, 0.85), title: 'BTC above $100k by year end', source: 'synthetic' },
        fed_hike: { yesProbability: this.probability(0.15, 0.8), title: 'Fed hikes at next meeting', source: 'synthetic' },
        us_recession: { yesProbability: this.probability(0.1, 0.75), title: 'US recession declared', source: 'synthetic' }
      }),
      onchain: async () => {
        this.tvl *= 1 + (this.random.next() - 0.5) * 0.16;
        return {
          totalExchangeInflows: Math.round(100_000_000 + this.random.next() * 600_000_000),
          totalDefiTvl: Math.round(this.tvl),
          stablecoinSupply: {
            totalUsd: 160_000_000_000,
            change24hUsd: Math.round((this.random.next() - 0.5) * 1_400_000_000)
          },
          exchangeFlows: {
            primary: {
              usdc: Math.round(this.random.next() * 150_000_000),
              usdt: Math.round(this.random.next() * 150_000_000)
            }
          }
        };
      },
      news: async () => {
        if (this.random.next() > 0.4) return { events: [] };
        const headline = HEADLINES[pickIndex(this.random, HEADLINES.length)];
        if (!headline) return { events: [] };
        return {
          events: [
            {
              source: headline.source,
              title: headline.title,
              impactScore: Math.round((1 + this.random.next() * 4) * 10) / 10,
              sentiment: headline.sentiment,
              matchedKeywords: headline.keywords
            }
          ]
        };
      }
    };
  }

  private probability(min: number, max: number): number {
    return Math.round((min + this.random.next() * (max - min)) * 1000) / 1000;
  }
}

const round2 = (value: number): number => Math.round(value * 100) / 100;
