/**
 * Selection Engine: epsilon-greedy choice of one winner per round.
 *
 * With probability ε a candidate is picked uniformly (explore); otherwise each
 * candidate is scored on its own confidence and its agent's track record and
 * the best score wins (exploit), earliest candidate on ties.
 */

import type { SelectionMode, Signal } from '../core/types.js';
import { ConfigError } from '../core/errors.js';
import { pickIndex, type RandomSource } from '../core/random.js';

export interface SelectionWeights {
  confidence: number;
  winRate: number;
  epochWins: number;
}

export const DEFAULT_EPSILON = 0.15;
export const DEFAULT_WEIGHTS: Readonly<SelectionWeights> = Object.freeze({
  confidence: 0.5,
  winRate: 0.3,
  epochWins: 0.2
});

/** Read-only view of agent standings at selection time. */
export interface StandingsView {
  winRate(agentName: string): number;
  epochWins(agentName: string): number;
  /** Rounds run so far, including the current one. */
  totalEpochs(): number;
}

export interface SelectionResult {
  winner: Signal;
  index: number;
  mode: SelectionMode;
  /** Exploit scores, aligned with the candidate order. */
  scores: number[];
}

export interface SelectionEngineOptions {
  random: RandomSource;
  epsilon?: number;
  weights?: Partial<SelectionWeights>;
}

export class SelectionEngine {
  readonly epsilon: number;
  readonly weights: Readonly<SelectionWeights>;
  private readonly random: RandomSource;

  constructor(opts: SelectionEngineOptions) {
    const epsilon = opts.epsilon ?? DEFAULT_EPSILON;
    if (!Number.isFinite(epsilon) || epsilon < 0 || epsilon > 1) {
      throw new ConfigError('selection epsilon must be within [0, 1]', { epsilon });
    }
    const weights = { ...DEFAULT_WEIGHTS, ...opts.weights };
    for (const [key, value] of Object.entries(weights)) {
      if (!Number.isFinite(value) || value < 0) {
        throw new ConfigError(`selection weight ${key} must be a non-negative number`, { [key]: value });
      }
    }
    this.epsilon = epsilon;
    this.weights = Object.freeze(weights);
    this.random = opts.random;
  }

  score(candidate: Signal, standings: StandingsView): number {
    const epochs = Math.max(standings.totalEpochs(), 1);
    return (
      this.weights.confidence * candidate.confidence +
      this.weights.winRate * standings.winRate(candidate.agentName) +
      this.weights.epochWins * (standings.epochWins(candidate.agentName) / epochs)
    );
  }

  /** Returns null for an empty candidate set: no actionable signal this round. */
  select(candidates: readonly Signal[], standings: StandingsView): SelectionResult | null {
    if (candidates.length === 0) return null;

    const scores = candidates.map((c) => this.score(c, standings));

    // One draw per round keeps the long-run explore rate at ε
    if (this.random.next() < this.epsilon) {
      const index = pickIndex(this.random, candidates.length);
      return { winner: this.at(candidates, index), index, mode: 'explore', scores };
    }

    let best = 0;
    for (let i = 1; i < scores.length; i += 1) {
      if ((scores[i] ?? -Infinity) > (scores[best] ?? -Infinity)) best = i;
    }
    return { winner: this.at(candidates, best), index: best, mode: 'exploit', scores };
  }

  private at(candidates: readonly Signal[], index: number): Signal {
    const winner = candidates[index];
    if (!winner) throw new RangeError(`candidate index ${index} out of range`);
    return winner;
  }
}
