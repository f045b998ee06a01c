import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { createHttpClient, postJson } from '../core/http.js';
import { ExplainerError } from '../core/errors.js';
import { formatPercent } from '../core/validation.js';
import { summarizePerformance, type ExplanationRequest, type ExternalExplainer } from './explanation.js';

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable()
        })
      })
    )
    .min(1)
});

export interface HttpExplainerOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutMs?: number;
  maxTokens?: number;
}

export const buildExplanationPrompt = (request: ExplanationRequest): string => {
  const { epoch, market, candidates, winner, performance, events } = request;
  const lines = [
    `Trading competition round ${epoch}.`,
    '',
    `Market: ${market.symbol} @ $${(market.price ?? 0).toFixed(2)}`,
    `Volume: ${market.volume.toLocaleString('en-US')}`,
    ''
  ];

  const forecast = events?.forecastMarket;
  if (forecast && Object.keys(forecast).length > 0) {
    lines.push('Event probabilities:');
    for (const [key, m] of Object.entries(forecast)) lines.push(`- ${key}: ${formatPercent(m.yesProbability, 1)}`);
    lines.push('');
  }

  lines.push('Candidate signals:');
  for (const c of candidates) {
    lines.push(`- ${c.agentName}: ${c.action} (${formatPercent(c.confidence)}): ${c.reason}`);
  }
  lines.push(
    '',
    `Selected: ${winner.agentName} ${winner.action} at ${formatPercent(winner.confidence)} confidence.`,
    `Track record: ${summarizePerformance(performance)}.`,
    '',
    'In two or three sentences, explain to a trader why this signal was chosen over the others.'
  );
  return lines.join('\n');
};

/** OpenAI-compatible chat-completions explainer. */
export class HttpExplainer implements ExternalExplainer {
  readonly name = 'http_chat';
  private readonly client: AxiosInstance;

  constructor(private readonly opts: HttpExplainerOptions) {
    this.client = createHttpClient(opts.baseUrl, opts.timeoutMs ?? 10000);
  }

  async explain(request: ExplanationRequest): Promise<string> {
    const body = {
      model: this.opts.model,
      max_tokens: this.opts.maxTokens ?? 200,
      messages: [
        { role: 'system', content: 'You explain automated trading decisions concisely and factually.' },
        { role: 'user', content: buildExplanationPrompt(request) }
      ]
    };
    const raw = await postJson<typeof body, unknown>(this.client, '/chat/completions', body, {
      Authorization: `Bearer ${this.opts.apiKey}`,
      'Content-Type': 'application/json'
    });

    const parsed = chatCompletionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExplainerError('malformed chat completion response', { issues: parsed.error.issues.length });
    }
    const content = parsed.data.choices[0]?.message.content?.trim();
    if (!content) throw new ExplainerError('chat completion had no content');
    return content;
  }
}
