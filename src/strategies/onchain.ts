import type { DirectionalAction, EventSnapshot, MarketSnapshot, Signal } from '../core/types.js';
import { BoundedSeenSet } from '../core/seenSet.js';
import { formatUsdMillions, isPositiveFinite } from '../core/validation.js';
import type { StrategyAgent } from './interface.js';
import { TvlMonitor } from './detectors.js';
import { buildSignal } from './signal.js';

const STABLECOIN_MINT_USD = 500_000_000;
const STABLECOIN_BURN_USD = -300_000_000;

export interface OnChainAgentOptions {
  inflowThresholdUsd?: number;
  tvlChangePct?: number;
  dedupMaxEntries?: number;
}

interface Trigger {
  action: DirectionalAction;
  confidence: number;
  reason: string;
  /** Metric name + value; a repeated trigger with the same key is ignored. */
  key: string;
}

/**
 * Trades on capital flows: exchange stablecoin inflows and new stablecoin
 * supply are dry powder (bullish), DeFi TVL drift signals risk appetite, and
 * stablecoin burns signal capital leaving.
 */
export class OnChainAgent implements StrategyAgent {
  readonly name: string;
  private readonly inflowThresholdUsd: number;
  private readonly tvlChangePct: number;
  private readonly tvl = new TvlMonitor();
  private readonly seen: BoundedSeenSet;

  constructor(opts: OnChainAgentOptions = {}, name = 'onchain') {
    this.name = name;
    this.inflowThresholdUsd = opts.inflowThresholdUsd ?? 400_000_000;
    this.tvlChangePct = opts.tvlChangePct ?? 5;
    this.seen = new BoundedSeenSet(opts.dedupMaxEntries ?? 500);
  }

  evaluate(market: MarketSnapshot, events?: EventSnapshot): Signal | null {
    const onchain = events?.onchain;
    if (!isPositiveFinite(market.price) || !onchain) return null;

    const inflows = onchain.totalExchangeInflows ?? 0;
    const stablecoinChange = onchain.stablecoinSupply?.change24hUsd ?? 0;
    const defiTvl = onchain.totalDefiTvl ?? 0;
    const tvlChange = this.tvl.update(onchain.totalDefiTvl);

    let trigger: Trigger | null = null;

    if (inflows >= this.inflowThresholdUsd) {
      trigger = {
        action: 'BUY',
        confidence: Math.min(0.85, 0.6 + (inflows / 1e9) * 0.05),
        reason:
          `${formatUsdMillions(inflows)} stablecoin inflows to exchanges. ` +
          `High buying power accumulation. Threshold: ${formatUsdMillions(this.inflowThresholdUsd)}`,
        key: `exchange_inflows:${inflows}`
      };
    } else if (stablecoinChange > STABLECOIN_MINT_USD) {
      trigger = {
        action: 'BUY',
        confidence: 0.7,
        reason: `${formatUsdMillions(stablecoinChange)} stablecoin supply increase. Capital flowing into crypto ecosystem`,
        key: `stablecoin_supply:${stablecoinChange}`
      };
    }

    if (tvlChange !== null) {
      if (tvlChange > this.tvlChangePct) {
        if (trigger?.action === 'BUY') {
          trigger.confidence = Math.min(0.9, trigger.confidence + 0.1);
          trigger.reason += ` | DeFi TVL +${tvlChange.toFixed(1)}% (risk-on confirmation)`;
        } else {
          trigger = {
            action: 'BUY',
            confidence: 0.72,
            reason: `DeFi TVL surging +${tvlChange.toFixed(1)}% ($${(defiTvl / 1e9).toFixed(1)}B). Risk-on sentiment`,
            key: `defi_tvl:${defiTvl}`
          };
        }
      } else if (tvlChange < -this.tvlChangePct) {
        trigger = {
          action: 'SELL',
          confidence: 0.75,
          reason: `DeFi TVL declining ${tvlChange.toFixed(1)}% ($${(defiTvl / 1e9).toFixed(1)}B). Capital flight detected`,
          key: `defi_tvl:${defiTvl}`
        };
      }
    }

    if (stablecoinChange < STABLECOIN_BURN_USD) {
      trigger = {
        action: 'SELL',
        confidence: 0.73,
        reason: `${formatUsdMillions(Math.abs(stablecoinChange))} stablecoin supply decrease. Capital exiting crypto`,
        key: `stablecoin_supply:${stablecoinChange}`
      };
    }

    if (!trigger || !this.seen.markIfNew(trigger.key)) return null;
    return buildSignal(this.name, market, trigger);
  }
}

export interface FlowWatcherAgentOptions {
  flowThresholdUsd?: number;
  dedupMaxEntries?: number;
}

/** Watches per-exchange USDC + USDT inflows only. */
export class FlowWatcherAgent implements StrategyAgent {
  readonly name: string;
  private readonly flowThresholdUsd: number;
  private readonly seen: BoundedSeenSet;

  constructor(opts: FlowWatcherAgentOptions = {}, name = 'flow_watcher') {
    this.name = name;
    this.flowThresholdUsd = opts.flowThresholdUsd ?? 200_000_000;
    this.seen = new BoundedSeenSet(opts.dedupMaxEntries ?? 500);
  }

  evaluate(market: MarketSnapshot, events?: EventSnapshot): Signal | null {
    const flows = events?.onchain?.exchangeFlows;
    if (!isPositiveFinite(market.price) || !flows) return null;

    let totalUsdc = 0;
    let totalUsdt = 0;
    for (const flow of Object.values(flows)) {
      totalUsdc += flow.usdc ?? 0;
      totalUsdt += flow.usdt ?? 0;
    }
    const total = totalUsdc + totalUsdt;
    if (total <= this.flowThresholdUsd) return null;
    if (!this.seen.markIfNew(`exchange_flows:${total}`)) return null;

    return buildSignal(this.name, market, {
      action: 'BUY',
      confidence: Math.min(0.85, 0.65 + (total / 1e9) * 0.05),
      reason:
        `${formatUsdMillions(total)} stablecoin exchange inflows ` +
        `(USDC: ${formatUsdMillions(totalUsdc)}, USDT: ${formatUsdMillions(totalUsdt)}). Capital ready to deploy`
    });
  }
}
