import { describe, expect, it, vi } from 'vitest';
import { CollaboratorError } from './errors.js';
import { DEFAULT_OPENAI_CONFIG, OpenAIClient, restrictToRecord } from './openai.js';
import type { AggregateRecord } from './types.js';

const record: AggregateRecord = {
  summary: { id: 10, timestamp: '2026-10-19T06:00:00.000Z', text: 'Summary ⚡' },
  channels: {
    c1: [
      { id: 1, timestamp: '2026-10-19T08:00:00.000Z', text: 'convoy moving north' },
      { id: 2, timestamp: '2026-10-19T09:00:00.000Z', text: 'weather is nice' },
    ],
    c2: [{ id: 3, timestamp: '2026-10-19T10:00:00.000Z', text: 'sighting near the bridge' }],
  },
};

function completion(content: string | null, status = 200) {
  const body = status === 200 ? JSON.stringify({ choices: [{ message: { content } }] }) : 'rate limited';
  return vi.fn(async (_input: string, _init: RequestInit) => new Response(body, { status }));
}

function client(fetchMock: ReturnType<typeof completion>) {
  return new OpenAIClient({
    ...DEFAULT_OPENAI_CONFIG,
    apiKey: 'test-key',
    baseUrl: 'https://llm.example.test/v1',
    fetch: fetchMock,
  });
}

function requestBody(fetchMock: ReturnType<typeof completion>): Record<string, unknown> {
  return JSON.parse(String(fetchMock.mock.calls[0][1].body));
}

describe('OpenAIClient.summarize', () => {
  it('sends the instruction and record and returns the text verbatim', async () => {
    const fetchMock = completion('# Report\n\n- convoy moving north (c1)\n');

    const text = await client(fetchMock).summarize(record, 'Summarize this');

    expect(text).toBe('# Report\n\n- convoy moving north (c1)\n');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://llm.example.test/v1/chat/completions');
    expect(init.headers).toMatchObject({ Authorization: 'Bearer test-key' });

    const body = requestBody(fetchMock);
    expect(body.model).toBe(DEFAULT_OPENAI_CONFIG.model);
    expect(body.response_format).toBeUndefined();
    expect(body.messages).toEqual([
      { role: 'system', content: expect.any(String) },
      { role: 'user', content: `Summarize this\n\n${JSON.stringify(record, null, 2)}` },
    ]);
  });

  it('raises CollaboratorError on an error status', async () => {
    const promise = client(completion(null, 429)).summarize(record, 'Summarize this');

    await expect(promise).rejects.toThrow(CollaboratorError);
    await expect(client(completion(null, 429)).summarize(record, 'x')).rejects.toThrow(
      'OpenAI API error: 429 - rate limited'
    );
  });

  it('raises CollaboratorError on empty content', async () => {
    await expect(client(completion(null)).summarize(record, 'x')).rejects.toThrow(
      'No content in OpenAI response'
    );
  });
});

describe('OpenAIClient.filterRecord', () => {
  it('requests JSON and keeps only messages from the input', async () => {
    const response = {
      summary: null,
      channels: {
        c1: [
          { id: 1, timestamp: 'ignored', text: 'rewritten by the model' },
          { id: 99, timestamp: '2026-10-19T09:30:00.000Z', text: 'invented' },
        ],
      },
    };
    const fetchMock = completion('```json\n' + JSON.stringify(response) + '\n```');

    const filtered = await client(fetchMock).filterRecord(record, 'Keep movement only');

    expect(filtered).toEqual({
      summary: null,
      channels: {
        c1: [{ id: 1, timestamp: '2026-10-19T08:00:00.000Z', text: 'convoy moving north' }],
        c2: [],
      },
    });
    expect(requestBody(fetchMock).response_format).toEqual({ type: 'json_object' });
  });

  it('rejects a response that is not JSON', async () => {
    const error = await client(completion('Sorry, I cannot help.'))
      .filterRecord(record, 'Keep movement only')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CollaboratorError);
    expect(error).toMatchObject({ step: 'filter' });
  });
});

describe('restrictToRecord', () => {
  it('keeps the summary only when the model kept it', () => {
    const kept = restrictToRecord(record, { summary: record.summary, channels: {} });
    const dropped = restrictToRecord(record, {
      summary: { id: 11, timestamp: '', text: 'other' },
      channels: {},
    });

    expect(kept).toEqual({ summary: record.summary, channels: { c1: [], c2: [] } });
    expect(dropped.summary).toBeNull();
  });
});
