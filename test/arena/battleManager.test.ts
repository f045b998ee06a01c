import { describe, expect, it } from 'vitest';
import { BattleManager } from '../../src/arena/battleManager.js';
import { SelectionEngine } from '../../src/arena/selectionEngine.js';
import { ExplanationProvider, NO_SIGNAL_EXPLANATION, type ExternalExplainer } from '../../src/arena/explanation.js';
import { HybridAgent } from '../../src/strategies/hybrid.js';
import { ConfigError, InvalidOutcomeError, UnknownAgentError } from '../../src/core/errors.js';
import { SeededRandom } from '../../src/core/random.js';
import { sleep } from '../../src/core/retry.js';
import type { Signal } from '../../src/core/types.js';
import type { StrategyAgent } from '../../src/strategies/interface.js';
import { bullishEvents, createMockLogger, createMockMetrics, makeMarket, makeSignal } from '../helpers.js';

const fixedAgent = (name: string, draft: Partial<Signal> | null): StrategyAgent => ({
  name,
  evaluate: (market) => (draft ? makeSignal({ ...draft, agentName: name, price: market.price ?? 0 }) : null)
});

const throwingAgent = (name: string): StrategyAgent => ({
  name,
  evaluate: () => {
    throw new Error('indicator blew up');
  }
});

const setup = (agents: StrategyAgent[], opts: { delegate?: ExternalExplainer; historyLimit?: number } = {}) => {
  const logger = createMockLogger();
  const metrics = createMockMetrics();
  const battle = new BattleManager({
    agents,
    engine: new SelectionEngine({ random: new SeededRandom(42), epsilon: 0 }),
    explainer: new ExplanationProvider({ logger, metrics, delegate: opts.delegate }),
    logger,
    metrics,
    historyLimit: opts.historyLimit,
    now: () => 1_700_000_000_000
  });
  return { battle, logger, metrics };
};

describe('BattleManager', () => {
  it('records an empty round without touching the leaderboard', async () => {
    const { battle, metrics } = setup([fixedAgent('a', null), fixedAgent('b', { action: 'HOLD' })]);
    const before = battle.leaderboard();

    const round = await battle.runRound({ market: makeMarket() });

    expect(round.epoch).toBe(1);
    expect(round.winner).toBeNull();
    expect(round.selectionMode).toBe('none');
    expect(round.candidates).toEqual([]);
    expect(round.explanation).toBe(NO_SIGNAL_EXPLANATION);
    expect(battle.leaderboard()).toEqual(before);
    expect(battle.history()).toHaveLength(1);
    expect(metrics.counters.get('battle.empty')).toBe(1);
  });

  it('selects the best candidate and explains it', async () => {
    const { battle, metrics } = setup([
      fixedAgent('a', { confidence: 0.6 }),
      fixedAgent('b', { confidence: 0.8, action: 'SELL' }),
      fixedAgent('c', { action: 'HOLD' })
    ]);

    const round = await battle.runRound({ market: makeMarket() });

    expect(round.candidates.map((c) => c.agentName)).toEqual(['a', 'b']);
    expect(round.winner?.agentName).toBe('b');
    expect(round.selectionMode).toBe('exploit');
    expect(round.explanation).toBe(
      'b selected with 80% confidence. test signal | Performance: pnl $0.00, win rate 0%, trades 0, epoch wins 1.'
    );
    expect(battle.tracker.stats('b').epochWins).toBe(1);
    expect(battle.tracker.stats('a').epochWins).toBe(0);
    expect(metrics.counters.get('battle.exploit')).toBe(1);
  });

  it('credits outcomes to the winner only', async () => {
    const { battle } = setup([fixedAgent('a', { confidence: 0.6 }), fixedAgent('b', { confidence: 0.8 })]);
    const round = await battle.runRound({ market: makeMarket() });

    const stats = battle.settleWinner(round, { pnl: 5, executionPrice: 50010, slippage: 10 });

    expect(stats).toMatchObject({ name: 'b', trades: 1, pnl: 5, winRate: 1 });
    expect(battle.tracker.stats('a').trades).toBe(0);
    expect(battle.leaderboard().map((s) => s.name)).toEqual(['b', 'a']);
  });

  it('settles nothing for an empty round', async () => {
    const { battle } = setup([fixedAgent('a', null)]);
    const round = await battle.runRound({ market: makeMarket() });
    expect(battle.settleWinner(round, { pnl: 5, executionPrice: 1, slippage: 0 })).toBeNull();
  });

  it('rejects outcome feedback for an unknown agent', () => {
    const { battle } = setup([fixedAgent('a', null)]);
    expect(() => battle.recordOutcome({ agentName: 'ghost', pnl: 1, executionPrice: 1, slippage: 0 })).toThrow(
      UnknownAgentError
    );
  });

  it('rejects non-finite or negative outcome figures without touching stats', async () => {
    const { battle, metrics } = setup([fixedAgent('a', { confidence: 0.7 })]);
    const round = await battle.runRound({ market: makeMarket() });

    expect(() => battle.settleWinner(round, { pnl: Number.NaN, executionPrice: 50000, slippage: 0 })).toThrow(
      InvalidOutcomeError
    );
    expect(() => battle.settleWinner(round, { pnl: 5, executionPrice: 50000, slippage: -1 })).toThrow(
      InvalidOutcomeError
    );
    expect(metrics.counters.get('outcome.rejected')).toBe(2);
    expect(battle.tracker.stats('a').trades).toBe(0);

    const stats = battle.settleWinner(round, { pnl: 10, executionPrice: 50000, slippage: 0 });
    expect(stats).toMatchObject({ trades: 1, pnl: 10, winRate: 1 });
  });

  it('drops a signal stamped with another agent name and keeps the round going', async () => {
    const impostor: StrategyAgent = {
      name: 'a',
      evaluate: () => makeSignal({ agentName: 'ghost', confidence: 0.9 })
    };
    const { battle, logger, metrics } = setup([impostor, fixedAgent('b', { confidence: 0.6 })]);

    const round = await battle.runRound({ market: makeMarket() });

    expect(round.candidates.map((c) => c.agentName)).toEqual(['b']);
    expect(round.winner?.agentName).toBe('b');
    expect(battle.epoch).toBe(1);
    expect(battle.history()).toHaveLength(1);
    expect(metrics.counters.get('agent.errors')).toBe(1);
    expect(logger.calls.find((c) => c.level === 'error')).toEqual({
      level: 'error',
      message: 'agent signal misattributed',
      context: { agent: 'a', claimed: 'ghost' }
    });
  });

  it('treats a throwing agent as having no opinion', async () => {
    const { battle, logger, metrics } = setup([throwingAgent('broken'), fixedAgent('ok', { confidence: 0.7 })]);
    const round = await battle.runRound({ market: makeMarket() });

    expect(round.winner?.agentName).toBe('ok');
    expect(metrics.counters.get('agent.errors')).toBe(1);
    expect(logger.calls.find((c) => c.level === 'error')).toEqual({
      level: 'error',
      message: 'agent evaluation failed',
      context: { agent: 'broken', err: 'indicator blew up' }
    });
  });

  it('runs overlapping calls one after another', async () => {
    let call = 0;
    const delegate: ExternalExplainer = {
      name: 'slow-first',
      explain: async (request) => {
        call += 1;
        if (call === 1) await sleep(30);
        return `round ${request.epoch}`;
      }
    };
    const { battle } = setup([fixedAgent('a', { confidence: 0.7 })], { delegate });

    const [first, second] = await Promise.all([
      battle.runRound({ market: makeMarket() }),
      battle.runRound({ market: makeMarket() })
    ]);

    expect(first.explanation).toBe('round 1');
    expect(second.explanation).toBe('round 2');
    expect(battle.history().map((r) => r.epoch)).toEqual([1, 2]);
  });

  it('freezes round records and caps history', async () => {
    const { battle } = setup([fixedAgent('a', { confidence: 0.7 })], { historyLimit: 2 });
    for (let i = 0; i < 3; i += 1) await battle.runRound({ market: makeMarket() });

    const history = battle.history();
    expect(history.map((r) => r.epoch)).toEqual([2, 3]);
    expect(Object.isFrozen(history[0])).toBe(true);
    expect(Object.isFrozen(history[0]?.candidates)).toBe(true);
    expect(battle.epoch).toBe(3);
  });

  it('degrades an invalid raw market to an empty round', async () => {
    const { battle, logger, metrics } = setup([new HybridAgent()]);
    const round = await battle.runRawRound({ market: { symbol: 'BTC-USD', price: 'n/a' }, events: bullishEvents() });

    expect(round.winner).toBeNull();
    expect(metrics.counters.get('snapshot.rejected')).toBe(1);
    expect(logger.calls.some((c) => c.level === 'warn' && c.message === 'snapshot section rejected')).toBe(true);
  });

  it('runs the hybrid agent end to end on a raw payload', async () => {
    const { battle } = setup([new HybridAgent()]);
    const round = await battle.runRawRound({ market: { symbol: 'BTC-USD', price: 50000 }, events: bullishEvents() });
    expect(round.winner?.agentName).toBe('hybrid');
    expect(round.winner?.confidence).toBe(0.91);
  });

  it('refuses duplicate agent names', () => {
    expect(() => setup([fixedAgent('a', null), fixedAgent('a', null)])).toThrow(ConfigError);
    expect(() => setup([fixedAgent('a', null), fixedAgent('a', null)])).toThrow('duplicate agent name: a');
  });
});
