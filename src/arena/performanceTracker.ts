/**
 * Performance Tracker: per-agent trade outcome history and the statistics
 * the selection engine scores against.
 *
 * Stats are derived from the (optionally windowed) outcome history and cached
 * until the next append, so they always match the history they describe.
 */

import type { AgentStats, TradeOutcome } from '../core/types.js';
import { UnknownAgentError } from '../core/errors.js';
import { mean, stdDev } from '../core/validation.js';

const SHARPE_EPSILON = 1e-6;

export interface PerformanceTrackerOptions {
  /** Outcomes kept per agent; oldest dropped first. Unbounded when omitted. */
  retention?: number;
  annualizationFactor?: number;
}

interface AgentRecord {
  outcomes: TradeOutcome[];
  epochWins: number;
  cached: Omit<AgentStats, 'epochWins'> | null;
}

export class PerformanceTracker {
  private readonly records = new Map<string, AgentRecord>();
  private readonly retention?: number;
  private readonly annualizationFactor: number;

  constructor(agentNames: Iterable<string> = [], opts: PerformanceTrackerOptions = {}) {
    this.retention = opts.retention;
    this.annualizationFactor = opts.annualizationFactor ?? 252;
    for (const name of agentNames) this.register(name);
  }

  register(name: string): void {
    if (this.records.has(name)) return;
    this.records.set(name, { outcomes: [], epochWins: 0, cached: null });
  }

  has(name: string): boolean {
    return this.records.has(name);
  }

  record(outcome: TradeOutcome): AgentStats {
    const rec = this.require(outcome.agentName);
    rec.outcomes.push(Object.freeze({ ...outcome }));
    if (this.retention !== undefined && rec.outcomes.length > this.retention) {
      rec.outcomes.splice(0, rec.outcomes.length - this.retention);
    }
    rec.cached = null;
    return this.stats(outcome.agentName);
  }

  recordEpochWin(name: string): void {
    this.require(name).epochWins += 1;
  }

  history(name: string): readonly TradeOutcome[] {
    return [...this.require(name).outcomes];
  }

  stats(name: string): AgentStats {
    const rec = this.require(name);
    rec.cached ??= this.compute(name, rec.outcomes);
    return { ...rec.cached, epochWins: rec.epochWins };
  }

  /** Unknown agents have no track record yet. */
  winRate(name: string): number {
    return this.records.has(name) ? this.stats(name).winRate : 0;
  }

  epochWins(name: string): number {
    return this.records.get(name)?.epochWins ?? 0;
  }

  /** All agents sorted by cumulative pnl, highest first; ties keep registration order. */
  leaderboard(): AgentStats[] {
    return [...this.records.keys()].map((name) => this.stats(name)).sort((a, b) => b.pnl - a.pnl);
  }

  private compute(name: string, outcomes: readonly TradeOutcome[]): Omit<AgentStats, 'epochWins'> {
    const trades = outcomes.length;
    if (trades === 0) return { name, trades: 0, winRate: 0, sharpe: 0, pnl: 0 };

    const pnls = outcomes.map((o) => o.pnl);
    const wins = pnls.filter((p) => p > 0).length;
    const pnl = pnls.reduce((sum, p) => sum + p, 0);
    const sharpe = (mean(pnls) / (stdDev(pnls) + SHARPE_EPSILON)) * Math.sqrt(this.annualizationFactor);

    return { name, trades, winRate: wins / trades, sharpe, pnl };
  }

  private require(name: string): AgentRecord {
    const rec = this.records.get(name);
    if (!rec) throw new UnknownAgentError(name);
    return rec;
  }
}
