import { z } from 'zod';
import { retry } from '../../shared/async/resilience';
import { logger } from '../../shared/logging/logger';
import {
  LLMChatMessage,
  LLMClient,
  LLMRequest,
  LLMRequestError,
  LLMResponse,
  LLMTextPart,
  ToolSpec,
} from './llm-types';

export interface ChatCompletionsConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

interface ChatCompletionsPayload {
  model: string;
  messages: LLMChatMessage[];
  temperature: number;
  max_tokens?: number;
  tools?: ToolSpec[];
  tool_choice?: 'auto' | 'none';
}

const textPartSchema = z.object({ type: z.literal('text'), text: z.string() });

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.union([z.string(), z.array(z.object({ type: z.string(), text: z.string().optional() })), z.null()]).optional(),
            tool_calls: z
              .array(
                z.object({
                  function: z.object({
                    name: z.string(),
                    arguments: z.string().default('{}'),
                  }),
                }),
              )
              .optional(),
          })
          .optional(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

function assertHttpBaseUrl(rawBaseUrl: string): string {
  const trimmed = rawBaseUrl.trim().replace(/\/$/, '').replace(/\/chat\/completions$/, '');
  const parsed = new URL(trimmed);
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new Error('LLM base URL must use HTTP(S).');
  }
  return parsed.toString().replace(/\/$/, '');
}

function extractSystemText(content: LLMChatMessage['content']): string {
  if (typeof content === 'string') return content;
  return content.map((part) => part.text).filter((value) => value.length > 0).join('\n');
}

/**
 * Ensure provider calls receive one consolidated system prompt block and
 * strictly alternating user/assistant turns.
 */
export function normalizeMessages(messages: LLMChatMessage[]): LLMChatMessage[] {
  const systemParts: string[] = [];
  const merged: LLMChatMessage[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      const systemText = extractSystemText(message.content).trim();
      if (systemText.length > 0) systemParts.push(systemText);
      continue;
    }

    const prev = merged[merged.length - 1];
    if (prev && prev.role === message.role) {
      prev.content = `${extractSystemText(prev.content)}\n\n${extractSystemText(message.content)}`;
      continue;
    }
    merged.push({ role: message.role, content: message.content });
  }

  if (systemParts.length === 0) return merged;
  return [{ role: 'system', content: systemParts.join('\n\n') }, ...merged];
}

function classifyStatus(status: number): LLMRequestError['kind'] {
  if (status === 429) return 'rate_limited';
  if (status === 408 || status === 504) return 'timeout';
  if (status >= 500) return 'service_unavailable';
  return 'invalid_request';
}

function parseToolArguments(raw: string, toolName: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    logger.warn({ toolName, error }, '[LLM] Native tool call arguments were not valid JSON');
  }
  return {};
}

/**
 * Client for any OpenAI-compatible `/chat/completions` endpoint.
 *
 * Native tool calls are serialized into the `{"type":"tool_calls"}` envelope so the
 * tool-call loop handles native and prompted tool use the same way.
 */
export class ChatCompletionsClient implements LLMClient {
  private readonly config: ChatCompletionsConfig;

  constructor(config: Partial<ChatCompletionsConfig> & { baseUrl: string; model: string }) {
    this.config = {
      baseUrl: assertHttpBaseUrl(config.baseUrl),
      model: config.model,
      apiKey: config.apiKey,
      temperature: config.temperature ?? 0.7,
      maxTokens: config.maxTokens ?? 4096,
      timeoutMs: config.timeoutMs ?? 180_000,
      maxRetries: config.maxRetries ?? 2,
      retryBaseDelayMs: config.retryBaseDelayMs ?? 500,
    };
  }

  async chat(request: LLMRequest): Promise<LLMResponse> {
    const model = request.model || this.config.model;
    return retry(() => this.send(request, model), {
      retries: this.config.maxRetries,
      baseDelayMs: this.config.retryBaseDelayMs,
      operationName: `chat completion (${model})`,
      shouldRetry: (error) => error instanceof LLMRequestError && error.retryable,
      onRetry: (error, attempt, delayMs) => {
        logger.warn({ model, attempt, delayMs, error }, '[LLM] Retrying chat completion');
      },
    });
  }

  private async send(request: LLMRequest, model: string): Promise<LLMResponse> {
    const url = `${this.config.baseUrl}/chat/completions`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    const payload: ChatCompletionsPayload = {
      model,
      messages: normalizeMessages(request.messages),
      temperature: request.temperature ?? this.config.temperature,
      max_tokens: request.maxTokens ?? this.config.maxTokens,
      tools: request.tools && request.tools.length > 0 ? request.tools : undefined,
      tool_choice: request.tools && request.tools.length > 0 ? request.toolChoice : undefined,
    };

    logger.debug({ url, model, messageCount: payload.messages.length }, '[LLM] Request');

    const timeout = request.timeout ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutHandle = setTimeout(() => controller.abort(), timeout);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new LLMRequestError('timeout', `Chat completion timed out after ${timeout}ms`, undefined, error);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new LLMRequestError('service_unavailable', `Chat completion request failed: ${message}`, undefined, error);
    } finally {
      clearTimeout(timeoutHandle);
    }

    if (!response.ok) {
      const text = await response.text();
      const kind = classifyStatus(response.status);
      logger.warn({ status: response.status, kind, model, error: text.slice(0, 200) }, '[LLM] API error');
      throw new LLMRequestError(
        kind,
        `Chat completion error: ${response.status} ${response.statusText} - ${text.slice(0, 200)}`,
        response.status,
      );
    }

    const parsed = completionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new LLMRequestError('service_unavailable', 'Chat completion returned an unexpected payload', response.status, parsed.error);
    }

    const message = parsed.data.choices[0]?.message;
    let content = '';
    let contentBlocks: LLMTextPart[] | undefined;
    if (typeof message?.content === 'string') {
      content = message.content;
    } else if (Array.isArray(message?.content)) {
      contentBlocks = message.content.flatMap((block) => {
        const part = textPartSchema.safeParse(block);
        return part.success ? [part.data] : [];
      });
    }

    const toolCalls = message?.tool_calls ?? [];
    if (toolCalls.length > 0) {
      logger.debug({ count: toolCalls.length }, '[LLM] Native tool calls detected, serializing to envelope');
      content = JSON.stringify({
        type: 'tool_calls',
        calls: toolCalls.map((call) => ({
          name: call.function.name,
          args: parseToolArguments(call.function.arguments, call.function.name),
        })),
      });
      contentBlocks = undefined;
    }

    const usage = parsed.data.usage;
    logger.debug({ usage, model }, '[LLM] Success');

    return {
      content,
      contentBlocks,
      usage: usage
        ? {
            promptTokens: usage.prompt_tokens,
            completionTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens,
          }
        : undefined,
    };
  }
}
