/**
 * Battle Manager: runs one competition round per snapshot.
 *
 * Each round: every agent evaluates the snapshot, HOLD and empty opinions are
 * dropped, the selection engine picks one winner, the explanation provider
 * renders why, and a frozen round record is appended to the session history.
 * Rounds never overlap; a round can depend on outcomes reported for earlier
 * rounds.
 */

import type {
  AgentStats,
  BattleRound,
  RoundInput,
  Signal,
  TradeOutcome
} from '../core/types.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { ConfigError, InvalidOutcomeError, describeError } from '../core/errors.js';
import type { StrategyAgent } from '../strategies/interface.js';
import { isActionable } from '../strategies/signal.js';
import { outcomeFeedbackSchema, parseRoundInput, summarizeIssues } from '../data/snapshotSchema.js';
import { PerformanceTracker } from './performanceTracker.js';
import type { SelectionEngine, StandingsView } from './selectionEngine.js';
import { NO_SIGNAL_EXPLANATION, type ExplanationProvider } from './explanation.js';

/** What the execution layer reports once a trade has played out. */
export interface OutcomeFeedback {
  agentName: string;
  pnl: number;
  executionPrice: number;
  slippage: number;
  signal?: Signal;
  timestamp?: number;
}

export interface BattleManagerOptions {
  agents: readonly StrategyAgent[];
  engine: SelectionEngine;
  explainer: ExplanationProvider;
  logger: Logger;
  metrics: Metrics;
  tracker?: PerformanceTracker;
  /** Rounds kept in session history; oldest dropped first. */
  historyLimit?: number;
  /** Symbol used when a raw payload carries no valid market. */
  symbol?: string;
  now?: () => number;
}

export class BattleManager {
  readonly tracker: PerformanceTracker;
  private readonly agents: readonly StrategyAgent[];
  private readonly engine: SelectionEngine;
  private readonly explainer: ExplanationProvider;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly historyLimit: number;
  private readonly symbol: string;
  private readonly now: () => number;
  private readonly rounds: BattleRound[] = [];
  private currentEpoch = 0;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(opts: BattleManagerOptions) {
    const names = opts.agents.map((a) => a.name);
    const duplicate = names.find((name, i) => names.indexOf(name) !== i);
    if (duplicate) throw new ConfigError(`duplicate agent name: ${duplicate}`, { agentName: duplicate });

    this.agents = opts.agents;
    this.engine = opts.engine;
    this.explainer = opts.explainer;
    this.logger = opts.logger;
    this.metrics = opts.metrics;
    this.tracker = opts.tracker ?? new PerformanceTracker();
    for (const name of names) this.tracker.register(name);
    this.historyLimit = opts.historyLimit ?? Number.POSITIVE_INFINITY;
    this.symbol = opts.symbol ?? 'UNKNOWN';
    this.now = opts.now ?? Date.now;
  }

  get epoch(): number {
    return this.currentEpoch;
  }

  /** Queues a round behind any round still in flight. */
  runRound(input: RoundInput): Promise<BattleRound> {
    const next = this.tail.then(() => this.executeRound(input));
    // The chain only orders rounds; callers still see their own rejection
    this.tail = next.catch(() => undefined);
    return next;
  }

  /**
   * Validates an untyped `{ market, events? }` payload first. Rejected
   * sections are logged and dropped; an invalid market leaves every agent
   * without a price.
   */
  runRawRound(raw: unknown): Promise<BattleRound> {
    const { input, rejected } = parseRoundInput(raw, this.symbol);
    for (const [section, issues] of Object.entries(rejected)) {
      this.metrics.increment('snapshot.rejected');
      this.logger.warn('snapshot section rejected', { section, issues });
    }
    return this.runRound(input);
  }

  /**
   * The only path that changes an agent's trade record. Throws
   * InvalidOutcomeError for non-finite or negative figures and
   * UnknownAgentError for agents outside the roster.
   */
  recordOutcome(feedback: OutcomeFeedback): AgentStats {
    const parsed = outcomeFeedbackSchema.safeParse(feedback);
    if (!parsed.success) {
      this.metrics.increment('outcome.rejected');
      throw new InvalidOutcomeError(feedback.agentName, summarizeIssues(parsed.error));
    }
    const outcome: TradeOutcome = {
      agentName: parsed.data.agentName,
      pnl: parsed.data.pnl,
      executionPrice: parsed.data.executionPrice,
      slippage: parsed.data.slippage,
      timestamp: parsed.data.timestamp ?? this.now(),
      signal: feedback.signal
    };
    const stats = this.tracker.record(outcome);
    this.logger.info('outcome recorded', {
      agent: stats.name,
      pnl: feedback.pnl,
      totalPnl: stats.pnl,
      winRate: stats.winRate,
      trades: stats.trades
    });
    return stats;
  }

  /** Credits a realized outcome to the round's winner only. */
  settleWinner(round: BattleRound, result: Omit<OutcomeFeedback, 'agentName' | 'signal'>): AgentStats | null {
    if (!round.winner) return null;
    return this.recordOutcome({ ...result, agentName: round.winner.agentName, signal: round.winner });
  }

  history(): readonly BattleRound[] {
    return [...this.rounds];
  }

  leaderboard(): AgentStats[] {
    return this.tracker.leaderboard();
  }

  collectCandidates(input: RoundInput): Signal[] {
    const candidates: Signal[] = [];
    for (const agent of this.agents) {
      let signal: Signal | null;
      try {
        signal = agent.evaluate(input.market, input.events);
      } catch (err) {
        this.metrics.increment('agent.errors');
        this.logger.error('agent evaluation failed', { agent: agent.name, err: describeError(err) });
        continue;
      }
      if (signal && signal.agentName !== agent.name) {
        // The tracker only knows roster names
        this.metrics.increment('agent.errors');
        this.logger.error('agent signal misattributed', { agent: agent.name, claimed: signal.agentName });
        continue;
      }
      if (isActionable(signal)) candidates.push(signal);
    }
    return candidates;
  }

  private async executeRound(input: RoundInput): Promise<BattleRound> {
    this.currentEpoch += 1;
    const epoch = this.currentEpoch;
    this.metrics.increment('battle.rounds');

    const candidates = this.collectCandidates(input);
    this.metrics.gauge('battle.candidates', candidates.length);
    const standings: StandingsView = {
      winRate: (name) => this.tracker.winRate(name),
      epochWins: (name) => this.tracker.epochWins(name),
      totalEpochs: () => epoch
    };
    const selection = this.engine.select(candidates, standings);

    if (!selection) {
      this.metrics.increment('battle.empty');
      this.logger.info('round had no actionable signal', { epoch, symbol: input.market.symbol });
      return this.append({
        epoch,
        timestamp: this.now(),
        candidates,
        winner: null,
        selectionMode: 'none',
        explanation: NO_SIGNAL_EXPLANATION,
        leaderboard: this.tracker.leaderboard()
      });
    }

    const { winner, mode } = selection;
    this.tracker.recordEpochWin(winner.agentName);
    this.metrics.increment(`battle.${mode}`);

    const explanation = await this.explainer.explain({
      epoch,
      winner,
      candidates,
      market: input.market,
      events: input.events,
      performance: this.tracker.stats(winner.agentName)
    });

    this.logger.info('round winner selected', {
      epoch,
      mode,
      winner: winner.agentName,
      action: winner.action,
      confidence: winner.confidence,
      candidates: candidates.length
    });

    return this.append({
      epoch,
      timestamp: this.now(),
      candidates,
      winner,
      selectionMode: mode,
      explanation,
      leaderboard: this.tracker.leaderboard()
    });
  }

  private append(round: BattleRound): BattleRound {
    const frozen: BattleRound = Object.freeze({
      ...round,
      candidates: Object.freeze([...round.candidates]),
      leaderboard: Object.freeze(round.leaderboard.map((s) => Object.freeze({ ...s })))
    });
    this.rounds.push(frozen);
    if (this.rounds.length > this.historyLimit) this.rounds.shift();
    return frozen;
  }
}
