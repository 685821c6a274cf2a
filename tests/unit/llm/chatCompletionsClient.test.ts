import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../../src/shared/logging/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { ChatCompletionsClient, normalizeMessages } from '../../../src/core/llm/chat-completions-client';
import { LLMRequestError, responseText } from '../../../src/core/llm/llm-types';

const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function requestBody(callIndex: number): unknown {
  const init = fetchMock.mock.calls[callIndex][1];
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

describe('ChatCompletionsClient', () => {
  const client = new ChatCompletionsClient({
    baseUrl: 'https://llm.test.invalid/v1/',
    model: 'test-model',
    apiKey: 'test-secret',
    maxRetries: 1,
    retryBaseDelayMs: 1,
  });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts to /chat/completions with bearer auth and returns content and usage', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        choices: [{ message: { content: 'Hello there' } }],
        usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
      }),
    );

    const response = await client.chat({ messages: [{ role: 'user', content: 'Hi' }], maxTokens: 128 });

    expect(response).toEqual({
      content: 'Hello there',
      contentBlocks: undefined,
      usage: { promptTokens: 3, completionTokens: 2, totalTokens: 5 },
    });
    expect(fetchMock.mock.calls[0][0]).toBe('https://llm.test.invalid/v1/chat/completions');
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(requestBody(0)).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'Hi' }],
      temperature: 0.7,
      max_tokens: 128,
    });
  });

  it('serializes native tool calls into the tool-call envelope', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [{ function: { name: 'parallel_search', arguments: '{"objective":"solar costs"}' } }],
            },
          },
        ],
      }),
    );

    const response = await client.chat({ messages: [{ role: 'user', content: 'Research solar' }] });

    expect(JSON.parse(response.content)).toEqual({
      type: 'tool_calls',
      calls: [{ name: 'parallel_search', args: { objective: 'solar costs' } }],
    });
  });

  it('exposes segmented content blocks', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        choices: [
          {
            message: {
              content: [
                { type: 'text', text: 'Part one.' },
                { type: 'image', text: 'ignored' },
                { type: 'text', text: 'Part two.' },
              ],
            },
          },
        ],
      }),
    );

    const response = await client.chat({ messages: [{ role: 'user', content: 'Hi' }] });

    expect(response.content).toBe('');
    expect(responseText(response)).toBe('Part one. Part two.');
  });

  it('retries rate-limited requests', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
      .mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: 'ok' } }] }));

    const response = await client.chat({ messages: [{ role: 'user', content: 'Hi' }] });

    expect(response.content).toBe('ok');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry invalid requests', async () => {
    fetchMock.mockResolvedValueOnce(new Response('bad payload', { status: 400 }));

    const error = await client.chat({ messages: [{ role: 'user', content: 'Hi' }] }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LLMRequestError);
    expect(error).toMatchObject({ kind: 'invalid_request', status: 400, code: 'EXTERNAL_CALL_FAILED' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('wraps exhausted retries of server errors', async () => {
    fetchMock.mockImplementation(async () => new Response('unavailable', { status: 503 }));

    await expect(client.chat({ messages: [{ role: 'user', content: 'Hi' }] })).rejects.toMatchObject({
      code: 'EXTERNAL_CALL_FAILED',
      message: 'chat completion (test-model) failed after 2 attempts',
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe('normalizeMessages', () => {
  it('consolidates system prompts and merges adjacent turns of the same role', () => {
    expect(
      normalizeMessages([
        { role: 'system', content: 'Rule A' },
        { role: 'user', content: 'First' },
        { role: 'system', content: 'Rule B' },
        { role: 'user', content: 'Second' },
        { role: 'assistant', content: 'Reply' },
      ]),
    ).toEqual([
      { role: 'system', content: 'Rule A\n\nRule B' },
      { role: 'user', content: 'First\n\nSecond' },
      { role: 'assistant', content: 'Reply' },
    ]);
  });
});
