import type { DirectionalAction, EventSnapshot, MarketSnapshot, NewsEvent, Signal } from '../core/types.js';
import { BoundedSeenSet } from '../core/seenSet.js';
import { isPositiveFinite } from '../core/validation.js';
import type { StrategyAgent } from './interface.js';
import { newsEventId, takeTopUnseenEvent } from './detectors.js';
import { buildSignal, type SignalDraft } from './signal.js';

const quote = (title: string, max = 80): string =>
  title.length > max ? `"${title.slice(0, max)}..."` : `"${title}"`;

export interface NewsAgentOptions {
  impactThreshold?: number;
  fedMultiplier?: number;
  maxConfidence?: number;
  dedupMaxEntries?: number;
}

/**
 * Reacts to the highest-impact breaking event it has not traded yet. Fed
 * events are weighted up; confidence grows with impact.
 */
export class NewsAgent implements StrategyAgent {
  readonly name: string;
  private readonly impactThreshold: number;
  private readonly fedMultiplier: number;
  private readonly maxConfidence: number;
  private readonly seen: BoundedSeenSet;

  constructor(opts: NewsAgentOptions = {}, name = 'news') {
    this.name = name;
    this.impactThreshold = opts.impactThreshold ?? 2.0;
    this.fedMultiplier = opts.fedMultiplier ?? 1.5;
    this.maxConfidence = opts.maxConfidence ?? 0.88;
    this.seen = new BoundedSeenSet(opts.dedupMaxEntries ?? 500);
  }

  evaluate(market: MarketSnapshot, events?: EventSnapshot): Signal | null {
    const news = events?.news?.events;
    if (!isPositiveFinite(market.price) || !news || news.length === 0) return null;

    const top = takeTopUnseenEvent(news, this.seen, this.impactThreshold, (e) =>
      e.source === 'fed' ? e.impactScore * this.fedMultiplier : e.impactScore
    );
    if (!top) return null;

    const { event, weightedImpact } = top;
    let action: SignalDraft['action'];
    let confidence: number;

    if (event.sentiment === 'bullish' || event.sentiment === 'bearish') {
      action = event.sentiment === 'bullish' ? 'BUY' : 'SELL';
      confidence = Math.min(this.maxConfidence, 0.6 + weightedImpact / 10);
    } else if (event.source === 'fed') {
      // Neutral Fed communication reads as risk-off
      action = 'SELL';
      confidence = 0.65;
    } else if (event.source === 'sec' && event.title.toLowerCase().includes('etf')) {
      action = 'BUY';
      confidence = 0.7;
    } else {
      return null;
    }

    const keywords = event.matchedKeywords.join(', ') || 'none';
    return buildSignal(this.name, market, {
      action,
      confidence,
      reason:
        `${event.source.toUpperCase()} event (impact: ${event.impactScore.toFixed(1)}): ${quote(event.title)} | ` +
        `Sentiment: ${event.sentiment} | Keywords: ${keywords}`
    });
  }
}

interface KeywordMatch {
  action: DirectionalAction;
  confidence: number;
  label: string;
}

type KeywordRule = (event: NewsEvent, title: string) => KeywordMatch | null;

/**
 * Base for source-focused news agents: walks events from one source in feed
 * order and fires on the first unseen event a rule recognizes.
 */
abstract class SourceNewsAgent implements StrategyAgent {
  private readonly seen: BoundedSeenSet;

  protected constructor(
    readonly name: string,
    private readonly source: string,
    dedupMaxEntries: number
  ) {
    this.seen = new BoundedSeenSet(dedupMaxEntries);
  }

  protected abstract readonly rule: KeywordRule;

  evaluate(market: MarketSnapshot, events?: EventSnapshot): Signal | null {
    const news = events?.news?.events;
    if (!isPositiveFinite(market.price) || !news) return null;

    for (const event of news) {
      if (event.source !== this.source) continue;
      if (!this.seen.markIfNew(newsEventId(event))) continue;

      const match = this.rule(event, event.title.toLowerCase());
      if (!match) continue;
      return buildSignal(this.name, market, {
        action: match.action,
        confidence: match.confidence,
        reason: `${match.label}: "${event.title}"`
      });
    }
    return null;
  }
}

/** Federal Reserve announcements only; keyword-driven and quicker to fire than NewsAgent. */
export class FedNewsAgent extends SourceNewsAgent {
  constructor(dedupMaxEntries = 500, name = 'fed_news') {
    super(name, 'fed', dedupMaxEntries);
  }

  protected readonly rule: KeywordRule = (event, title) => {
    if (title.includes('hike') || title.includes('hawkish')) {
      return { action: 'SELL', confidence: 0.82, label: 'Fed hawkish signal' };
    }
    if (title.includes('cut') || title.includes('dovish')) {
      return { action: 'BUY', confidence: 0.82, label: 'Fed dovish signal' };
    }
    if (title.includes('pause')) {
      return { action: 'BUY', confidence: 0.72, label: 'Fed pause signal' };
    }
    if (event.sentiment === 'bullish') {
      return { action: 'BUY', confidence: 0.75, label: 'Fed bullish announcement' };
    }
    if (event.sentiment === 'bearish') {
      return { action: 'SELL', confidence: 0.75, label: 'Fed bearish announcement' };
    }
    return null;
  };
}

/** SEC crypto announcements: ETF decisions and enforcement actions. */
export class SecAgent extends SourceNewsAgent {
  constructor(dedupMaxEntries = 500, name = 'sec') {
    super(name, 'sec', dedupMaxEntries);
  }

  protected readonly rule: KeywordRule = (event, title) => {
    const keywords = event.matchedKeywords.map((k) => k.toLowerCase());
    const aboutEtf = keywords.includes('etf') || title.includes('etf');

    if (aboutEtf && (title.includes('approve') || title.includes('approval'))) {
      return { action: 'BUY', confidence: 0.92, label: 'SEC ETF APPROVAL' };
    }
    if (aboutEtf && (title.includes('reject') || title.includes('denial'))) {
      return { action: 'SELL', confidence: 0.85, label: 'SEC ETF REJECTION' };
    }
    if (keywords.includes('enforcement') || keywords.includes('fraud')) {
      return { action: 'SELL', confidence: 0.73, label: 'SEC enforcement action' };
    }
    return null;
  };
}
