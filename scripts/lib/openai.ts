import { z } from 'zod';
import { CollaboratorError } from './errors.js';
import { aggregateRecordSchema } from './storage.js';
import type { AggregateRecord, ChannelMessage } from './types.js';

const chatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    })
  ),
});

const SYSTEM_PROMPT = 'You are a helpful assistant that reviews messages collected from Telegram channels.';

const FILTER_FORMAT = `Return ONLY valid JSON (no markdown, no backticks) with exactly the shape of the input:
{
  "summary": { "id": 1, "timestamp": "...", "text": "..." } or null,
  "channels": { "channel-name": [ { "id": 1, "timestamp": "...", "text": "..." } ] }
}

IMPORTANT RULES:
- Keep every channel key, use an empty array when nothing in it is relevant
- Copy kept messages unchanged, never invent or rewrite messages`;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface OpenAIConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
  temperature: number;
  timeoutMs: number;
  fetch?: FetchLike;
}

export const DEFAULT_OPENAI_CONFIG = {
  model: 'gpt-4o-mini',
  baseUrl: 'https://api.openai.com/v1',
  temperature: 0.3,
  timeoutMs: 120_000,
} satisfies Omit<OpenAIConfig, 'apiKey'>;

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export class OpenAIClient {
  private config: OpenAIConfig;
  private fetchImpl: FetchLike;

  constructor(config: OpenAIConfig) {
    this.config = config;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  /** Asks the model to drop irrelevant messages; the result is always a subset of `record`. */
  async filterRecord(
    record: AggregateRecord,
    instruction: string,
    signal?: AbortSignal
  ): Promise<AggregateRecord> {
    let content = await this.complete(
      'filter',
      [
        { role: 'system', content: `${SYSTEM_PROMPT}\n\n${FILTER_FORMAT}` },
        { role: 'user', content: `${instruction}\n\n${JSON.stringify(record, null, 2)}` },
      ],
      true,
      signal
    );

    // Clean up the response - remove markdown code blocks if present
    content = content.trim();
    if (content.startsWith('```json')) {
      content = content.slice(7);
    } else if (content.startsWith('```')) {
      content = content.slice(3);
    }
    if (content.endsWith('```')) {
      content = content.slice(0, -3);
    }
    content = content.trim();

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (e) {
      throw new CollaboratorError(
        `Invalid JSON response from model: ${e instanceof Error ? e.message : String(e)}`,
        'filter',
        undefined,
        e
      );
    }

    const result = aggregateRecordSchema.safeParse(parsed);
    if (!result.success) {
      throw new CollaboratorError(`Unexpected filter response shape: ${result.error.message}`, 'filter');
    }

    return restrictToRecord(record, result.data);
  }

  /** Returns the model's markdown verbatim. */
  async summarize(record: AggregateRecord, instruction: string, signal?: AbortSignal): Promise<string> {
    return this.complete(
      'summarize',
      [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: `${instruction}\n\n${JSON.stringify(record, null, 2)}` },
      ],
      false,
      signal
    );
  }

  private async complete(
    step: string,
    messages: ChatMessage[],
    jsonObject: boolean,
    signal?: AbortSignal
  ): Promise<string> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.config.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.config.model,
          messages,
          temperature: this.config.temperature,
          ...(jsonObject ? { response_format: { type: 'json_object' } } : {}),
        }),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CollaboratorError(`OpenAI request failed: ${reason}`, step, undefined, error);
    }

    if (!response.ok) {
      const error = await response.text();
      throw new CollaboratorError(`OpenAI API error: ${response.status} - ${error}`, step);
    }

    const data = chatCompletionSchema.safeParse(await response.json());
    if (!data.success) {
      throw new CollaboratorError(`Unexpected OpenAI response: ${data.error.message}`, step);
    }

    const content = data.data.choices[0]?.message.content;
    if (!content) {
      throw new CollaboratorError('No content in OpenAI response', step);
    }
    return content;
  }
}

/**
 * Keeps only what the model returned that also exists in `original`, using the
 * original copies, one entry per original channel in original order.
 */
export function restrictToRecord(original: AggregateRecord, filtered: AggregateRecord): AggregateRecord {
  const channels: Record<string, ChannelMessage[]> = {};

  for (const [channel, messages] of Object.entries(original.channels)) {
    const kept = new Set((filtered.channels[channel] ?? []).map((m) => m.id));
    channels[channel] = messages.filter((m) => kept.has(m.id));
  }

  const summary =
    original.summary && filtered.summary && filtered.summary.id === original.summary.id
      ? original.summary
      : null;

  return { summary, channels };
}
