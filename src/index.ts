import { loadConfigFromDotenv } from './config/load.js';
import type { AppConfig } from './config/types.js';
import { JsonLogger, type Logger } from './core/logger.js';
import { InMemoryMetrics } from './core/metrics.js';
import { SeededRandom } from './core/random.js';
import { sleep } from './core/retry.js';
import { describeError } from './core/errors.js';
import type { MarketSnapshot } from './core/types.js';
import { createAgents } from './strategies/selector.js';
import { PerformanceTracker } from './arena/performanceTracker.js';
import { SelectionEngine } from './arena/selectionEngine.js';
import { ExplanationProvider } from './arena/explanation.js';
import { HttpExplainer } from './arena/httpExplainer.js';
import { BattleManager } from './arena/battleManager.js';
import { EventAssembler } from './data/eventAssembler.js';
import { SyntheticSnapshotSource } from './data/syntheticSource.js';

// Simulated slippage per fill, as a fraction of the signal price
const SIMULATED_SLIPPAGE = 0.0005;

const buildExplainer = (config: AppConfig, logger: Logger, metrics: InMemoryMetrics): ExplanationProvider => {
  const { explainer } = config;
  const delegate =
    explainer.enabled && explainer.apiKey
      ? new HttpExplainer({
          baseUrl: explainer.baseUrl,
          apiKey: explainer.apiKey,
          model: explainer.model,
          timeoutMs: explainer.timeoutMs
        })
      : undefined;
  return new ExplanationProvider({
    logger: logger.child({ component: 'explainer' }),
    metrics,
    delegate,
    timeoutMs: explainer.timeoutMs
  });
};

const main = async (): Promise<void> => {
  const config = loadConfigFromDotenv();
  const logger = new JsonLogger(config.logLevel, { service: 'signal-arena' });
  const metrics = new InMemoryMetrics();

  const agents = createAgents(config, logger.child({ component: 'agents' }));
  const tracker = new PerformanceTracker(
    agents.map((a) => a.name),
    config.performance
  );
  const engine = new SelectionEngine({
    random: new SeededRandom(config.randomSeed),
    epsilon: config.selection.epsilon,
    weights: config.selection.weights
  });
  const battle = new BattleManager({
    agents,
    engine,
    tracker,
    explainer: buildExplainer(config, logger, metrics),
    logger: logger.child({ component: 'battle' }),
    metrics,
    historyLimit: config.historyLimit,
    symbol: config.symbol
  });

  const source = new SyntheticSnapshotSource({ seed: config.randomSeed, symbol: config.symbol });
  let market: MarketSnapshot = source.nextMarket();
  const assembler = new EventAssembler({
    providers: source.providers(),
    logger: logger.child({ component: 'events' }),
    metrics,
    timeoutMs: config.events.timeoutMs,
    ttlMs: config.events.ttlMs,
    // Simulated clock: cache freshness follows snapshot time, not wall time
    now: () => market.timestamp
  });

  logger.info('arena started', {
    symbol: config.symbol,
    rounds: config.rounds,
    agents: agents.map((a) => a.name),
    epsilon: config.selection.epsilon,
    explainer: config.explainer.enabled ? config.explainer.model : 'template'
  });

  let stopping = false;
  const stop = (): void => {
    logger.info('shutdown requested');
    stopping = true;
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  for (let i = 0; i < config.rounds && !stopping; i += 1) {
    const events = await assembler.assemble();
    const round = await battle.runRound({ market, events });

    const next = source.nextMarket();
    const { winner } = round;
    if (winner && winner.price > 0 && next.price !== undefined) {
      const direction = winner.action === 'BUY' ? 1 : -1;
      const units = winner.size / winner.price;
      const slippage = winner.price * SIMULATED_SLIPPAGE;
      const pnl = direction * (next.price - winner.price) * units - slippage * units;
      battle.settleWinner(round, { pnl, executionPrice: winner.price + direction * slippage, slippage });
    }

    logger.info('round complete', {
      epoch: round.epoch,
      mode: round.selectionMode,
      winner: winner?.agentName ?? null,
      explanation: round.explanation
    });

    market = next;
    if (config.roundIntervalMs > 0) await sleep(config.roundIntervalMs);
  }

  logger.info('final leaderboard', {
    rounds: battle.epoch,
    leaderboard: battle.leaderboard(),
    metrics: metrics.snapshot()
  });
};

void main().catch((err) => {
  process.stderr.write(`Fatal error: ${describeError(err)}\n`);
  process.exit(1);
});
