import type { AgentName, AppConfig } from '../config/types.js';
import type { Logger } from '../core/logger.js';
import type { StrategyAgent } from './interface.js';
import { TrendFollowerAgent } from './trendFollower.js';
import { MeanReversionAgent } from './meanReversion.js';
import { ForecastMarketAgent } from './forecastMarket.js';
import { FlowWatcherAgent, OnChainAgent } from './onchain.js';
import { FedNewsAgent, NewsAgent, SecAgent } from './news.js';
import { HybridAgent, createStrictHybridAgent } from './hybrid.js';

type RosterConfig = Pick<AppConfig, 'sources' | 'indicators'>;

export function createAgent(name: AgentName, config: RosterConfig, logger?: Logger): StrategyAgent {
  const { sources, indicators } = config;
  const dedupMaxEntries = sources.dedupMaxEntries;
  const hybridOptions = {
    forecastThreshold: sources.forecastThreshold,
    onchainInflowThresholdUsd: sources.onchainInflowThresholdUsd,
    newsImpactThreshold: sources.newsImpactThreshold,
    dedupMaxEntries,
    logger
  };

  switch (name) {
    case 'trend_follower':
      return new TrendFollowerAgent(indicators.trendFastPeriod, indicators.trendSlowPeriod);
    case 'mean_reversion':
      return new MeanReversionAgent(indicators.meanReversionPeriod, indicators.meanReversionStdDev);
    case 'forecast_market':
      return new ForecastMarketAgent({ threshold: sources.forecastThreshold, dedupMaxEntries });
    case 'onchain':
      return new OnChainAgent({ inflowThresholdUsd: sources.onchainInflowThresholdUsd, dedupMaxEntries });
    case 'flow_watcher':
      return new FlowWatcherAgent({ flowThresholdUsd: sources.flowWatcherThresholdUsd, dedupMaxEntries });
    case 'news':
      return new NewsAgent({ impactThreshold: sources.newsImpactThreshold, dedupMaxEntries });
    case 'fed_news':
      return new FedNewsAgent(dedupMaxEntries);
    case 'sec':
      return new SecAgent(dedupMaxEntries);
    case 'hybrid':
      return new HybridAgent({ ...hybridOptions, confirmationThreshold: sources.confirmationThreshold });
    case 'strict_hybrid':
      return createStrictHybridAgent(hybridOptions);
  }
}

/** Builds the competing roster in configuration order (which is also candidate order). */
export function createAgents(
  config: RosterConfig & Pick<AppConfig, 'enabledAgents'>,
  logger?: Logger
): StrategyAgent[] {
  const unique = [...new Set(config.enabledAgents)];
  return unique.map((name) => createAgent(name, config, logger));
}
