/**
 * Round explanations for operators.
 *
 * The deterministic template is always available. An external explainer
 * (e.g. an LLM endpoint) may be plugged in; when it throws, times out or
 * returns nothing usable, the template is used instead and the round goes on.
 */

import type { AgentStats, EventSnapshot, MarketSnapshot, Signal } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { ExplainerError, describeError } from '../core/errors.js';
import { withTimeout } from '../core/retry.js';
import { formatPercent } from '../core/validation.js';

export interface ExplanationRequest {
  epoch: number;
  winner: Signal;
  candidates: readonly Signal[];
  market: MarketSnapshot;
  events?: EventSnapshot;
  performance: AgentStats;
}

export interface ExternalExplainer {
  readonly name: string;
  explain(request: ExplanationRequest): Promise<string>;
}

export const NO_SIGNAL_EXPLANATION = 'No actionable signals this round';

export const summarizePerformance = (stats: AgentStats): string =>
  `pnl $${stats.pnl.toFixed(2)}, win rate ${formatPercent(stats.winRate)}, ` +
  `trades ${stats.trades}, epoch wins ${stats.epochWins}`;

export const templateExplanation = (request: ExplanationRequest): string => {
  const { winner, performance, events } = request;
  let text =
    `${winner.agentName} selected with ${formatPercent(winner.confidence)} confidence. ${winner.reason}` +
    ` | Performance: ${summarizePerformance(performance)}.`;

  const forecast = events?.forecastMarket;
  if (forecast && Object.keys(forecast).length > 0) {
    const context = Object.entries(forecast)
      .map(([key, market]) => `${key}: ${formatPercent(market.yesProbability, 1)}`)
      .join(', ');
    text += ` Event context: ${context}.`;
  }
  return text;
};

export interface ExplanationProviderOptions {
  logger: Logger;
  metrics: Metrics;
  delegate?: ExternalExplainer;
  timeoutMs?: number;
}

export class ExplanationProvider {
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly delegate?: ExternalExplainer;
  private readonly timeoutMs: number;

  constructor(opts: ExplanationProviderOptions) {
    this.logger = opts.logger;
    this.metrics = opts.metrics;
    this.delegate = opts.delegate;
    this.timeoutMs = opts.timeoutMs ?? 5000;
  }

  /** Never rejects. */
  async explain(request: ExplanationRequest): Promise<string> {
    if (!this.delegate) return templateExplanation(request);

    try {
      const text = await withTimeout(this.delegate.explain(request), this.timeoutMs, `explainer ${this.delegate.name}`);
      if (typeof text !== 'string' || text.trim() === '') {
        throw new ExplainerError('explainer returned an empty response');
      }
      return text.trim();
    } catch (err) {
      this.metrics.increment('explainer.fallback');
      this.logger.warn('external explainer failed, using template', {
        explainer: this.delegate.name,
        epoch: request.epoch,
        err: describeError(err)
      });
      return templateExplanation(request);
    }
  }
}
