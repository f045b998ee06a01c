/**
 * Snapshot validation: the boundary between the data-collection layer and
 * the agents. Each event section is parsed on its own so one malformed source
 * only silences that source for the round.
 */

import { z } from 'zod';
import type { EventSnapshot, EventSourceKey, MarketSnapshot, RoundInput } from '../core/types.js';

const finite = z.number().finite();

export const marketSnapshotSchema = z.object({
  symbol: z.string().min(1),
  price: finite.optional(),
  volume: finite.nonnegative().default(0),
  timestamp: finite.default(() => Date.now()),
  bid: finite.optional(),
  ask: finite.optional(),
  volatility: finite.optional()
});

export const forecastMarketSchema = z.record(
  z.string(),
  z.object({
    yesProbability: finite.min(0).max(1),
    title: z.string().optional(),
    source: z.string().optional()
  })
);

export const onchainSchema = z.object({
  totalExchangeInflows: finite.optional(),
  totalDefiTvl: finite.nonnegative().optional(),
  stablecoinSupply: z
    .object({
      totalUsd: finite.optional(),
      change24hUsd: finite.optional()
    })
    .optional(),
  exchangeFlows: z
    .record(
      z.string(),
      z.object({
        usdc: finite.optional(),
        usdt: finite.optional()
      })
    )
    .optional()
});

export const newsEventSchema = z.object({
  source: z.string().min(1),
  title: z.string(),
  impactScore: finite.nonnegative().default(0),
  sentiment: z.enum(['bullish', 'bearish', 'neutral']).catch('neutral'),
  matchedKeywords: z.array(z.string()).default([])
});

export const newsSchema = z.object({
  events: z.array(newsEventSchema).default([])
});

/** Feedback reported by the execution layer once a winning trade settles. */
export const outcomeFeedbackSchema = z.object({
  agentName: z.string().min(1),
  pnl: finite,
  executionPrice: finite.nonnegative(),
  slippage: finite.nonnegative(),
  timestamp: finite.optional()
});

export const EVENT_SOURCE_KEYS: readonly EventSourceKey[] = ['forecastMarket', 'onchain', 'news'];

export type SectionParseResult<K extends EventSourceKey> =
  | { ok: true; value: NonNullable<EventSnapshot[K]> }
  | { ok: false; issues: string };

export const summarizeIssues = (error: z.ZodError): string =>
  error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');

export function parseSection<K extends EventSourceKey>(key: K, raw: unknown): SectionParseResult<K>;
export function parseSection(key: EventSourceKey, raw: unknown): SectionParseResult<EventSourceKey> {
  switch (key) {
    case 'forecastMarket': {
      const parsed = forecastMarketSchema.safeParse(raw);
      return parsed.success ? { ok: true, value: parsed.data } : { ok: false, issues: summarizeIssues(parsed.error) };
    }
    case 'onchain': {
      const parsed = onchainSchema.safeParse(raw);
      return parsed.success ? { ok: true, value: parsed.data } : { ok: false, issues: summarizeIssues(parsed.error) };
    }
    case 'news': {
      const parsed = newsSchema.safeParse(raw);
      return parsed.success ? { ok: true, value: parsed.data } : { ok: false, issues: summarizeIssues(parsed.error) };
    }
  }
}

export interface ParsedRoundInput {
  input: RoundInput;
  /** Sections that were present but failed validation, with the reason. */
  rejected: Partial<Record<EventSourceKey | 'market', string>>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parses an untyped event payload. Missing or invalid sections are left out,
 * which agents read as "no opinion from this source".
 */
export const parseEventSnapshot = (
  raw: unknown
): { events: EventSnapshot; rejected: Partial<Record<EventSourceKey, string>> } => {
  const events: EventSnapshot = {};
  const rejected: Partial<Record<EventSourceKey, string>> = {};
  if (!isRecord(raw)) return { events, rejected };

  const forecast = raw.forecastMarket === undefined ? undefined : parseSection('forecastMarket', raw.forecastMarket);
  if (forecast?.ok) events.forecastMarket = forecast.value;
  else if (forecast) rejected.forecastMarket = forecast.issues;

  const onchain = raw.onchain === undefined ? undefined : parseSection('onchain', raw.onchain);
  if (onchain?.ok) events.onchain = onchain.value;
  else if (onchain) rejected.onchain = onchain.issues;

  const news = raw.news === undefined ? undefined : parseSection('news', raw.news);
  if (news?.ok) events.news = news.value;
  else if (news) rejected.news = news.issues;

  return { events, rejected };
};

/**
 * Parses a raw `{ market, events? }` payload. A market that fails validation
 * is replaced by a price-less snapshot so every agent degrades to no signal.
 */
export const parseRoundInput = (raw: unknown, fallbackSymbol = 'UNKNOWN'): ParsedRoundInput => {
  const rejected: ParsedRoundInput['rejected'] = {};
  const body: Record<string, unknown> = isRecord(raw) ? raw : {};

  let market: MarketSnapshot;
  const parsedMarket = marketSnapshotSchema.safeParse(body.market);
  if (parsedMarket.success) {
    market = parsedMarket.data;
  } else {
    rejected.market = summarizeIssues(parsedMarket.error);
    market = { symbol: fallbackSymbol, volume: 0, timestamp: Date.now() };
  }

  if (body.events === undefined) return { input: { market }, rejected };

  const { events, rejected: rejectedEvents } = parseEventSnapshot(body.events);
  return { input: { market, events }, rejected: { ...rejected, ...rejectedEvents } };
};
