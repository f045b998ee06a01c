/**
 * Source Confirmation Policy: fuses independent per-source opinions into one
 * conviction-scored decision.
 *
 * Rules, with T = confirmation threshold:
 *   1. Fewer than T sources voting        → insufficient evidence
 *   2. Neither direction reaches T votes  → conflict (sources disagree)
 *   3. Otherwise the direction with ≥ T votes wins, and conviction grows
 *      with every agreeing source: 0.70 + 0.07 × agreeing, capped at 1.0
 *
 * Strict (all-sources) confirmation is this policy with T equal to the number
 * of sources.
 */

import type { DirectionalAction } from '../core/types.js';
import { ConfigError } from '../core/errors.js';
import { formatPercent, roundConfidence } from '../core/validation.js';

export type SourceName = 'forecast-market' | 'on-chain' | 'news';

export const SOURCE_LABELS: Record<SourceName, string> = {
  'forecast-market': 'Forecast market',
  'on-chain': 'On-chain',
  news: 'News'
};

export interface SourceVote {
  source: SourceName;
  action: DirectionalAction | null;
}

export const BASE_CONVICTION = 0.7;
export const CONVICTION_PER_VOTE = 0.07;

export type ConfirmationDecision =
  | {
      kind: 'confirmed';
      action: DirectionalAction;
      confidence: number;
      agreeing: number;
      voting: number;
      reason: string;
    }
  | { kind: 'insufficient'; voting: number; required: number; reason: string }
  | { kind: 'conflict'; buyVotes: number; sellVotes: number; required: number; reason: string };

/** Conviction for `agreeing` matching votes. */
export const convictionFor = (agreeing: number): number =>
  roundConfidence(Math.min(1, BASE_CONVICTION + CONVICTION_PER_VOTE * agreeing));

const describeVotes = (votes: readonly SourceVote[]): string =>
  votes.map((v) => `${SOURCE_LABELS[v.source]}: ${v.action ?? 'none'}`).join(' + ');

export class SourceConfirmationPolicy {
  constructor(
    readonly threshold: number = 2,
    readonly sourceCount: number = 3
  ) {
    if (!Number.isInteger(threshold) || threshold < 1 || threshold > sourceCount) {
      throw new ConfigError(`confirmation threshold must be an integer in [1, ${sourceCount}]`, { threshold });
    }
  }

  decide(votes: readonly SourceVote[]): ConfirmationDecision {
    const cast = votes.filter((v): v is SourceVote & { action: DirectionalAction } => v.action !== null);
    const voting = cast.length;
    const buyVotes = cast.filter((v) => v.action === 'BUY').length;
    const sellVotes = voting - buyVotes;
    const required = this.threshold;

    if (voting < required) {
      return {
        kind: 'insufficient',
        voting,
        required,
        reason: `Insufficient evidence: ${voting}/${required} required sources have an opinion`
      };
    }

    if (Math.max(buyVotes, sellVotes) < required) {
      return {
        kind: 'conflict',
        buyVotes,
        sellVotes,
        required,
        reason: `Sources conflict (${buyVotes} BUY vs ${sellVotes} SELL, need ${required} agreeing) | ${describeVotes(cast)}`
      };
    }

    const action: DirectionalAction = buyVotes >= required ? 'BUY' : 'SELL';
    const agreeing = action === 'BUY' ? buyVotes : sellVotes;
    const confidence = convictionFor(agreeing);

    return {
      kind: 'confirmed',
      action,
      confidence,
      agreeing,
      voting,
      reason:
        `${agreeing}/${voting} sources confirm ${action} | ${describeVotes(cast)} | ` +
        `Multi-source conviction: ${formatPercent(confidence)}`
    };
  }
}
