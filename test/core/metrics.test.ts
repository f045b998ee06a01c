import { describe, expect, it } from 'vitest';
import { InMemoryMetrics } from '../../src/core/metrics.js';

describe('InMemoryMetrics', () => {
  it('accumulates counters and keeps the latest gauge', () => {
    const metrics = new InMemoryMetrics();
    metrics.increment('battle.rounds');
    metrics.increment('battle.rounds', 2);
    metrics.gauge('battle.candidates', 4);
    metrics.gauge('battle.candidates', 1);

    expect(metrics.counter('battle.rounds')).toBe(3);
    expect(metrics.counter('battle.empty')).toBe(0);
    expect(metrics.snapshot()).toEqual({
      counters: { 'battle.rounds': 3 },
      gauges: { 'battle.candidates': 1 }
    });
  });
});
