import type { DirectionalAction, EventSnapshot, MarketSnapshot, Signal } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { BoundedSeenSet } from '../core/seenSet.js';
import { isPositiveFinite } from '../core/validation.js';
import type { StrategyAgent } from './interface.js';
import { SourceConfirmationPolicy, type ConfirmationDecision, type SourceVote } from './confirmation.js';
import {
  TvlMonitor,
  readNewsDirection,
  readOnChainVote,
  scanForecastMarkets,
  takeTopUnseenEvent
} from './detectors.js';
import { buildSignal } from './signal.js';

export interface HybridAgentOptions {
  confirmationThreshold?: number;
  forecastThreshold?: number;
  onchainInflowThresholdUsd?: number;
  tvlChangePct?: number;
  newsImpactThreshold?: number;
  dedupMaxEntries?: number;
  logger?: Logger;
}

/**
 * Multi-source fusion agent. Forecast markets, on-chain flows and breaking
 * news each cast at most one vote; the confirmation policy decides whether
 * they agree strongly enough to trade.
 */
export class HybridAgent implements StrategyAgent {
  readonly name: string;
  readonly policy: SourceConfirmationPolicy;
  private readonly forecastThreshold: number;
  private readonly onchainInflowThresholdUsd: number;
  private readonly tvlChangePct: number;
  private readonly newsImpactThreshold: number;
  private readonly tvl = new TvlMonitor();
  private readonly seenNews: BoundedSeenSet;
  private readonly logger?: Logger;
  private lastDecision: ConfirmationDecision | null = null;

  constructor(opts: HybridAgentOptions = {}, name = 'hybrid') {
    this.name = name;
    this.policy = new SourceConfirmationPolicy(opts.confirmationThreshold ?? 2);
    this.forecastThreshold = opts.forecastThreshold ?? 0.65;
    this.onchainInflowThresholdUsd = opts.onchainInflowThresholdUsd ?? 400_000_000;
    this.tvlChangePct = opts.tvlChangePct ?? 5;
    this.newsImpactThreshold = opts.newsImpactThreshold ?? 2.0;
    this.seenNews = new BoundedSeenSet(opts.dedupMaxEntries ?? 500);
    this.logger = opts.logger?.child({ agent: name });
  }

  /** The policy outcome of the most recent evaluation, for audit. */
  get lastConfirmation(): ConfirmationDecision | null {
    return this.lastDecision;
  }

  collectVotes(events: EventSnapshot): SourceVote[] {
    return [
      { source: 'forecast-market', action: this.forecastVote(events) },
      { source: 'on-chain', action: this.onchainVote(events) },
      { source: 'news', action: this.newsVote(events) }
    ];
  }

  evaluate(market: MarketSnapshot, events?: EventSnapshot): Signal | null {
    this.lastDecision = null;
    if (!isPositiveFinite(market.price) || !events) return null;

    const decision = this.policy.decide(this.collectVotes(events));
    this.lastDecision = decision;

    if (decision.kind !== 'confirmed') {
      this.logger?.debug('no fused signal', { outcome: decision.kind, reason: decision.reason });
      return null;
    }

    return buildSignal(this.name, market, {
      action: decision.action,
      confidence: decision.confidence,
      reason: decision.reason
    });
  }

  private forecastVote(events: EventSnapshot): DirectionalAction | null {
    if (!events.forecastMarket) return null;
    return scanForecastMarkets(events.forecastMarket, this.forecastThreshold)[0]?.action ?? null;
  }

  private onchainVote(events: EventSnapshot): DirectionalAction | null {
    if (!events.onchain) return null;
    const tvlChange = this.tvl.update(events.onchain.totalDefiTvl);
    const vote = readOnChainVote(events.onchain, tvlChange, {
      inflowThresholdUsd: this.onchainInflowThresholdUsd,
      tvlChangePct: this.tvlChangePct
    });
    return vote?.action ?? null;
  }

  private newsVote(events: EventSnapshot): DirectionalAction | null {
    const news = events.news?.events;
    if (!news || news.length === 0) return null;
    const top = takeTopUnseenEvent(news, this.seenNews, this.newsImpactThreshold);
    return top ? readNewsDirection(top.event) : null;
  }
}

/** All three sources must agree: highest conviction, lowest frequency. */
export const createStrictHybridAgent = (
  opts: Omit<HybridAgentOptions, 'confirmationThreshold'> = {},
  name = 'strict_hybrid'
): HybridAgent => new HybridAgent({ ...opts, confirmationThreshold: 3 }, name);
