import { z } from 'zod';

export const AGENT_NAMES = [
  'trend_follower',
  'mean_reversion',
  'forecast_market',
  'onchain',
  'flow_watcher',
  'news',
  'fed_news',
  'sec',
  'hybrid',
  'strict_hybrid'
] as const;

export type AgentName = (typeof AGENT_NAMES)[number];

const parseBoolean = (v: unknown, fallback: boolean): boolean => {
  if (typeof v !== 'string') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.toLowerCase());
};

const parseList = (v: unknown): string[] | undefined => {
  if (typeof v !== 'string' || v.trim() === '') return undefined;
  return v
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
};

const probability = z.coerce.number().min(0).max(1);
const weight = z.coerce.number().nonnegative();

export const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  SYMBOL: z.string().min(1).default('BTC-USD'),
  ROUNDS: z.coerce.number().int().positive().default(30),
  ROUND_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),
  RANDOM_SEED: z.coerce.number().int().default(42),
  HISTORY_LIMIT: z.coerce.number().int().positive().default(1000),
  ENABLED_AGENTS: z
    .string()
    .optional()
    .transform((v) => parseList(v) ?? [...AGENT_NAMES])
    .pipe(z.array(z.enum(AGENT_NAMES)).min(1)),

  // Selection (epsilon-greedy)
  SELECTION_EPSILON: probability.default(0.15),
  SELECTION_WEIGHT_CONFIDENCE: weight.default(0.5),
  SELECTION_WEIGHT_WIN_RATE: weight.default(0.3),
  SELECTION_WEIGHT_EPOCH_WINS: weight.default(0.2),

  // Fusion and source thresholds
  HYBRID_CONFIRMATION_THRESHOLD: z.coerce.number().int().min(1).max(3).default(2),
  FORECAST_THRESHOLD: z.coerce.number().gt(0.5).lt(1).default(0.65),
  ONCHAIN_INFLOW_THRESHOLD_USD: z.coerce.number().positive().default(400_000_000),
  FLOW_WATCHER_THRESHOLD_USD: z.coerce.number().positive().default(200_000_000),
  NEWS_IMPACT_THRESHOLD: z.coerce.number().nonnegative().default(2.0),
  DEDUP_MAX_ENTRIES: z.coerce.number().int().positive().default(500),

  // Indicator windows
  TREND_FAST_PERIOD: z.coerce.number().int().positive().default(10),
  TREND_SLOW_PERIOD: z.coerce.number().int().positive().default(30),
  MEAN_REVERSION_PERIOD: z.coerce.number().int().min(2).default(20),
  MEAN_REVERSION_STD_DEV: z.coerce.number().positive().default(2.0),

  // Performance accounting
  PERFORMANCE_RETENTION: z.coerce.number().int().positive().optional(),
  ANNUALIZATION_FACTOR: z.coerce.number().positive().default(252),

  // Event collection
  EVENT_SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  EVENT_SOURCE_TTL_MS: z.coerce.number().int().nonnegative().default(60_000),

  // Optional external explainer
  EXPLAINER_ENABLED: z.string().optional(),
  EXPLAINER_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  EXPLAINER_MODEL: z.string().default('gpt-4o-mini'),
  EXPLAINER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  EXPLAINER_API_KEY: z.string().optional()
});

export const configSchema = rawSchema
  .refine((raw) => raw.TREND_FAST_PERIOD < raw.TREND_SLOW_PERIOD, {
    message: 'TREND_FAST_PERIOD must be shorter than TREND_SLOW_PERIOD',
    path: ['TREND_FAST_PERIOD']
  })
  .transform((raw) => {
    const explainerApiKey = raw.EXPLAINER_API_KEY?.trim() || undefined;

    return {
      nodeEnv: raw.NODE_ENV,
      logLevel: raw.LOG_LEVEL,

      symbol: raw.SYMBOL,
      rounds: raw.ROUNDS,
      roundIntervalMs: raw.ROUND_INTERVAL_MS,
      randomSeed: raw.RANDOM_SEED,
      historyLimit: raw.HISTORY_LIMIT,
      enabledAgents: raw.ENABLED_AGENTS,

      selection: {
        epsilon: raw.SELECTION_EPSILON,
        weights: {
          confidence: raw.SELECTION_WEIGHT_CONFIDENCE,
          winRate: raw.SELECTION_WEIGHT_WIN_RATE,
          epochWins: raw.SELECTION_WEIGHT_EPOCH_WINS
        }
      },

      sources: {
        confirmationThreshold: raw.HYBRID_CONFIRMATION_THRESHOLD,
        forecastThreshold: raw.FORECAST_THRESHOLD,
        onchainInflowThresholdUsd: raw.ONCHAIN_INFLOW_THRESHOLD_USD,
        flowWatcherThresholdUsd: raw.FLOW_WATCHER_THRESHOLD_USD,
        newsImpactThreshold: raw.NEWS_IMPACT_THRESHOLD,
        dedupMaxEntries: raw.DEDUP_MAX_ENTRIES
      },

      indicators: {
        trendFastPeriod: raw.TREND_FAST_PERIOD,
        trendSlowPeriod: raw.TREND_SLOW_PERIOD,
        meanReversionPeriod: raw.MEAN_REVERSION_PERIOD,
        meanReversionStdDev: raw.MEAN_REVERSION_STD_DEV
      },

      performance: {
        retention: raw.PERFORMANCE_RETENTION,
        annualizationFactor: raw.ANNUALIZATION_FACTOR
      },

      events: {
        timeoutMs: raw.EVENT_SOURCE_TIMEOUT_MS,
        ttlMs: raw.EVENT_SOURCE_TTL_MS
      },

      explainer: {
        // An endpoint without a key is treated as disabled
        enabled: parseBoolean(raw.EXPLAINER_ENABLED, false) && explainerApiKey !== undefined,
        baseUrl: raw.EXPLAINER_BASE_URL,
        model: raw.EXPLAINER_MODEL,
        timeoutMs: raw.EXPLAINER_TIMEOUT_MS,
        apiKey: explainerApiKey
      }
    };
  });
