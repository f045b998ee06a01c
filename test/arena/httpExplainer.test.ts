import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/core/http.js', () => ({
  createHttpClient: vi.fn(() => ({})),
  postJson: vi.fn(),
}));

import { postJson } from '../../src/core/http.js';
import { HttpExplainer, buildExplanationPrompt } from '../../src/arena/httpExplainer.js';
import type { ExplanationRequest } from '../../src/arena/explanation.js';
import { ExplainerError } from '../../src/core/errors.js';
import { makeMarket, makeSignal } from '../helpers.js';

const mockPostJson = vi.mocked(postJson);

const request = (): ExplanationRequest => {
  const winner = makeSignal({ agentName: 'hybrid', confidence: 0.84, reason: 'two sources agree' });
  return {
    epoch: 2,
    winner,
    candidates: [winner, makeSignal({ agentName: 'news', action: 'SELL', confidence: 0.65, reason: 'fed' })],
    market: makeMarket({ price: 50123.456, volume: 1500 }),
    events: { forecastMarket: { btc_100k: { yesProbability: 0.7 } } },
    performance: { name: 'hybrid', trades: 0, winRate: 0, sharpe: 0, pnl: 0, epochWins: 1 }
  };
};

describe('buildExplanationPrompt', () => {
  it('lists the market, events and every candidate', () => {
    const lines = buildExplanationPrompt(request()).split('\n');
    expect(lines).toContain('Market: BTC-USD @ $50123.46');
    expect(lines).toContain('Volume: 1,500');
    expect(lines).toContain('- btc_100k: 70.0%');
    expect(lines).toContain('- hybrid: BUY (84%): two sources agree');
    expect(lines).toContain('- news: SELL (65%): fed');
    expect(lines).toContain('Selected: hybrid BUY at 84% confidence.');
    expect(lines).toContain('Track record: pnl $0.00, win rate 0%, trades 0, epoch wins 1.');
  });
});

describe('HttpExplainer', () => {
  beforeEach(() => {
    mockPostJson.mockReset();
  });

  it('posts a chat completion request and returns the content', async () => {
    mockPostJson.mockResolvedValue({ choices: [{ message: { content: ' Hybrid led on agreement. ' } }] });
    const explainer = new HttpExplainer({ baseUrl: 'http://localhost:9', apiKey: 'test-secret', model: 'test-model' });

    await expect(explainer.explain(request())).resolves.toBe('Hybrid led on agreement.');

    expect(mockPostJson).toHaveBeenCalledTimes(1);
    const call = mockPostJson.mock.calls[0];
    expect(call?.[1]).toBe('/chat/completions');
    expect(call?.[2]).toMatchObject({ model: 'test-model', max_tokens: 200 });
    expect(call?.[3]).toEqual({ Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' });
  });

  it('rejects a malformed response', async () => {
    mockPostJson.mockResolvedValue({ choices: [] });
    const explainer = new HttpExplainer({ baseUrl: 'http://localhost:9', apiKey: 'test-secret', model: 'test-model' });
    await expect(explainer.explain(request())).rejects.toBeInstanceOf(ExplainerError);
  });

  it('rejects an empty completion', async () => {
    mockPostJson.mockResolvedValue({ choices: [{ message: { content: null } }] });
    const explainer = new HttpExplainer({ baseUrl: 'http://localhost:9', apiKey: 'test-secret', model: 'test-model' });
    await expect(explainer.explain(request())).rejects.toThrow('chat completion had no content');
  });
});
