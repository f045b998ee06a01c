export type SignalAction = 'BUY' | 'SELL' | 'HOLD';
export type DirectionalAction = Exclude<SignalAction, 'HOLD'>;

export interface MarketSnapshot {
  symbol: string;
  /** Absent or non-positive means the round carries no usable price. */
  price?: number;
  volume: number;
  timestamp: number;
  bid?: number;
  ask?: number;
  volatility?: number;
}

export interface ForecastMarket {
  yesProbability: number;
  title?: string;
  source?: string;
}

/** Market key (e.g. `btc_100k`, `fed_hike`) → latest reading. */
export type ForecastMarketData = Record<string, ForecastMarket>;

export interface ExchangeFlow {
  usdc?: number;
  usdt?: number;
}

export interface OnChainData {
  totalExchangeInflows?: number;
  totalDefiTvl?: number;
  stablecoinSupply?: {
    totalUsd?: number;
    change24hUsd?: number;
  };
  exchangeFlows?: Record<string, ExchangeFlow>;
}

export type NewsSentiment = 'bullish' | 'bearish' | 'neutral';

export interface NewsEvent {
  source: string;
  title: string;
  impactScore: number;
  sentiment: NewsSentiment;
  matchedKeywords: string[];
}

export interface NewsData {
  events: NewsEvent[];
}

/**
 * Per-round evidence keyed by source category. A missing section means the
 * source has no opinion this round.
 */
export interface EventSnapshot {
  forecastMarket?: ForecastMarketData;
  onchain?: OnChainData;
  news?: NewsData;
}

export type EventSourceKey = keyof EventSnapshot;

export interface RoundInput {
  market: MarketSnapshot;
  events?: EventSnapshot;
}

export interface Signal {
  readonly timestamp: number;
  readonly symbol: string;
  readonly action: SignalAction;
  readonly confidence: number;
  readonly size: number;
  readonly reason: string;
  readonly agentName: string;
  readonly price: number;
}

export interface TradeOutcome {
  agentName: string;
  pnl: number;
  executionPrice: number;
  slippage: number;
  timestamp: number;
  signal?: Signal;
}

export interface AgentStats {
  name: string;
  trades: number;
  winRate: number;
  sharpe: number;
  pnl: number;
  epochWins: number;
}

export type SelectionMode = 'explore' | 'exploit';

export interface BattleRound {
  readonly epoch: number;
  readonly timestamp: number;
  readonly candidates: readonly Signal[];
  readonly winner: Signal | null;
  readonly selectionMode: SelectionMode | 'none';
  readonly explanation: string;
  readonly leaderboard: readonly AgentStats[];
}
