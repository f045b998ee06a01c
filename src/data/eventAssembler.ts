import type { EventSnapshot, EventSourceKey } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { describeError } from '../core/errors.js';
import { withTimeout } from '../core/retry.js';
import { EVENT_SOURCE_KEYS, parseSection } from './snapshotSchema.js';

/** Fetches one source's raw payload; validation happens in the assembler. */
export type EventProvider = () => Promise<unknown>;

export type EventProviders = Partial<Record<EventSourceKey, EventProvider>>;

export interface EventAssemblerOptions {
  providers: EventProviders;
  logger: Logger;
  metrics: Metrics;
  timeoutMs?: number;
  /** How long a successful fetch is reused before the source is asked again. */
  ttlMs?: number;
  now?: () => number;
}

/**
 * Builds the per-round EventSnapshot from independent sources. A source that
 * rejects, times out or returns something the schema refuses is simply left
 * out of the snapshot; agents read that as "no opinion".
 */
export class EventAssembler {
  private readonly providers: EventProviders;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly timeoutMs: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly cache: EventSnapshot = {};
  private readonly fetchedAt = new Map<EventSourceKey, number>();

  constructor(opts: EventAssemblerOptions) {
    this.providers = opts.providers;
    this.logger = opts.logger;
    this.metrics = opts.metrics;
    this.timeoutMs = opts.timeoutMs ?? 3000;
    this.ttlMs = opts.ttlMs ?? 60_000;
    this.now = opts.now ?? Date.now;
  }

  async assemble(): Promise<EventSnapshot> {
    const events: EventSnapshot = {};
    await Promise.all(
      EVENT_SOURCE_KEYS.map(async (key) => {
        const provider = this.providers[key];
        if (provider) await this.resolve(key, provider, events);
      })
    );
    return events;
  }

  /** Drops every cached section so the next assemble refetches all sources. */
  invalidate(): void {
    for (const key of EVENT_SOURCE_KEYS) delete this.cache[key];
    this.fetchedAt.clear();
  }

  private async resolve<K extends EventSourceKey>(key: K, provider: EventProvider, target: EventSnapshot): Promise<void> {
    const fetchedAt = this.fetchedAt.get(key);
    if (fetchedAt !== undefined && this.now() - fetchedAt < this.ttlMs) {
      target[key] = this.cache[key];
      return;
    }

    let raw: unknown;
    try {
      raw = await withTimeout(provider(), this.timeoutMs, `event source ${key}`);
    } catch (err) {
      this.markAbsent(key, describeError(err));
      return;
    }

    const parsed = parseSection(key, raw);
    if (!parsed.ok) {
      this.markAbsent(key, parsed.issues);
      return;
    }
    this.cache[key] = parsed.value;
    this.fetchedAt.set(key, this.now());
    target[key] = parsed.value;
  }

  private markAbsent(key: EventSourceKey, reason: string): void {
    delete this.cache[key];
    this.fetchedAt.delete(key);
    this.metrics.increment('events.source_absent');
    this.logger.warn('event source absent this round', { source: key, reason });
  }
}
