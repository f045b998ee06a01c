import type { EventSnapshot, MarketSnapshot, Signal } from '../core/types.js';

/**
 * A decision policy competing in the arena.
 *
 * `evaluate` returns null when the agent has no actionable opinion, including
 * when the snapshot lacks the data it needs. Implementations may keep private
 * memory (price history, seen-event sets) but must not touch shared state.
 */
export interface StrategyAgent {
  readonly name: string;
  evaluate(market: MarketSnapshot, events?: EventSnapshot): Signal | null;
}
