import type { MarketSnapshot, Signal, SignalAction } from '../core/types.js';
import { clamp } from '../core/validation.js';

export interface SignalDraft {
  action: SignalAction;
  confidence: number;
  reason: string;
  size?: number;
}

export const DEFAULT_SIGNAL_SIZE = 100;

/** Builds a frozen Signal stamped with the round's market data. */
export const buildSignal = (agentName: string, market: MarketSnapshot, draft: SignalDraft): Signal =>
  Object.freeze({
    timestamp: market.timestamp,
    symbol: market.symbol,
    action: draft.action,
    confidence: clamp(draft.confidence, 0, 1),
    size: Math.max(0, draft.size ?? DEFAULT_SIGNAL_SIZE),
    reason: draft.reason,
    agentName,
    price: market.price ?? 0
  });

/** HOLD signals and non-finite confidences never reach selection. */
export const isActionable = (signal: Signal | null): signal is Signal =>
  signal !== null && signal.action !== 'HOLD' && Number.isFinite(signal.confidence);
