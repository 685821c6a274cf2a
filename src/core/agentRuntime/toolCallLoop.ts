import { LLMChatMessage, LLMClient, responseText } from '../llm/llm-types';
import { ToolRegistry, ToolExecutionContext } from './toolRegistry';
import { logger } from '../../shared/logging/logger';
import { executeToolCall, ToolResult } from './toolCallExecution';
import { looksLikeJson, parseToolCallEnvelope, RETRY_PROMPT } from './toolCallParser';
import { ToolResultCache } from './toolCache';
import { ToolExecutionError } from './toolErrors';
import { limitConcurrency } from '../utils/concurrency';

/** Loop bounds and per-round behaviour. */
export interface ToolCallLoopConfig {
  /** Tool rounds allowed before the loop forces a final answer. */
  maxRounds?: number;
  maxCallsPerRound?: number;
  cacheEnabled?: boolean;
  cacheMaxEntries?: number;
  /** Calls within one round that may run at the same time. */
  maxParallelTools?: number;
  maxToolResultChars?: number;
}

const DEFAULT_CONFIG: Required<ToolCallLoopConfig> = {
  maxRounds: 10,
  maxCallsPerRound: 3,
  cacheEnabled: true,
  cacheMaxEntries: 50,
  maxParallelTools: 3,
  maxToolResultChars: 12_000,
};

export const FINALIZE_PROMPT =
  'You have reached the tool-use limit. Do not request more tools. Write your final answer now in plain text, using only the tool results above.';

export const FINALIZE_FALLBACK_TEXT =
  'No final answer was produced before the tool-use limit was reached.';

function assertPositiveInteger(value: number, field: keyof Required<ToolCallLoopConfig>): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${field} must be a positive integer`);
  }
}

function getValidatedConfig(config: Required<ToolCallLoopConfig>): Required<ToolCallLoopConfig> {
  assertPositiveInteger(config.maxRounds, 'maxRounds');
  assertPositiveInteger(config.maxCallsPerRound, 'maxCallsPerRound');
  assertPositiveInteger(config.cacheMaxEntries, 'cacheMaxEntries');
  assertPositiveInteger(config.maxParallelTools, 'maxParallelTools');
  assertPositiveInteger(config.maxToolResultChars, 'maxToolResultChars');
  return config;
}

function truncateText(value: string, maxChars: number): string {
  if (value.length <= maxChars) return value;
  const headChars = Math.max(300, Math.floor(maxChars * 0.65));
  const tailChars = Math.max(120, Math.floor(maxChars * 0.25));
  const omittedChars = Math.max(0, value.length - headChars - tailChars);
  return (
    `${value.slice(0, headChars).trimEnd()}\n` +
    `[... ${omittedChars} chars omitted ...]\n` +
    `${value.slice(-tailChars).trimStart()}`
  );
}

function stringifyResult(value: unknown): string {
  try {
    return JSON.stringify(value) ?? 'null';
  } catch {
    return '[unserializable tool result]';
  }
}

export function formatToolResultsMessage(results: ToolResult[], maxToolResultChars: number): LLMChatMessage {
  const parts = results.map((r) => {
    if (r.success) {
      return `[OK] Tool "${r.name}" succeeded: ${truncateText(stringifyResult(r.result), maxToolResultChars)}`;
    }
    return (
      `[ERROR] Tool "${r.name}" rejected the call: ${r.error ?? 'Invalid tool call'}\n` +
      'Suggestion: check the argument format and try again with corrected parameters.'
    );
  });

  return {
    role: 'user',
    content: `[Tool Results]\n${parts.join('\n\n')}`,
  };
}

export interface ToolCallLoopParams {
  client: LLMClient;
  messages: LLMChatMessage[];
  registry: ToolRegistry;
  ctx: ToolExecutionContext;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
  maxTokens?: number;
  config?: ToolCallLoopConfig;
}

export interface ToolCallLoopResult {
  replyText: string;
  toolsExecuted: boolean;
  roundsCompleted: number;
  /** True when the round cap was hit and the answer came from the forced finalization request. */
  finalized: boolean;
  toolResults: ToolResult[];
  /** Calls answered from the per-loop cache instead of executing the tool. */
  cacheHits: number;
}

/**
 * Execute tool-call rounds until the model answers in plain text or the round cap is reached.
 *
 * Invalid JSON envelopes trigger one retry prompt. Argument validation failures are fed back to
 * the model; a tool that throws aborts the loop with a ToolExecutionError. Generation failures
 * propagate unchanged.
 */
export async function runToolCallLoop(params: ToolCallLoopParams): Promise<ToolCallLoopResult> {
  const { client, registry, ctx, model } = params;
  const config = getValidatedConfig({ ...DEFAULT_CONFIG, ...params.config });
  const toolSpecs = registry.listToolSpecs();
  const tools = toolSpecs.length > 0 ? toolSpecs : undefined;

  const messages = [...params.messages];
  const cache = config.cacheEnabled ? new ToolResultCache(config.cacheMaxEntries) : null;
  const runWithLimit = limitConcurrency(config.maxParallelTools);
  const allToolResults: ToolResult[] = [];
  let roundsCompleted = 0;
  let retryAttempted = false;

  const requestText = async (withTools: boolean): Promise<string> => {
    const response = await client.chat({
      messages: [...messages],
      model,
      temperature: params.temperature,
      timeout: params.timeoutMs,
      maxTokens: params.maxTokens,
      tools: withTools ? tools : undefined,
      toolChoice: withTools && tools ? 'auto' : undefined,
    });
    return responseText(response);
  };

  const finish = (replyText: string, finalized: boolean): ToolCallLoopResult => {
    const cacheHits = cache?.hits ?? 0;
    logger.debug(
      {
        traceId: ctx.traceId,
        agentId: ctx.agentId,
        roundsCompleted,
        toolCalls: allToolResults.length,
        cacheHits,
        cacheEntries: cache?.size ?? 0,
        finalized,
      },
      'Tool call loop finished',
    );
    return {
      replyText,
      toolsExecuted: allToolResults.length > 0,
      roundsCompleted,
      finalized,
      toolResults: allToolResults,
      cacheHits,
    };
  };

  const executeCall = async (call: { name: string; args: Record<string, unknown> }): Promise<ToolResult> => {
    const cached = cache?.get(call.name, call.args) ?? null;
    if (cached) {
      logger.debug({ traceId: ctx.traceId, agentId: ctx.agentId, toolName: call.name }, 'Tool cache hit');
      return { name: call.name, args: call.args, success: true, result: cached.result, cached: true, latencyMs: 0 };
    }
    const result = await executeToolCall(registry, call, ctx);
    if (result.success && cache) {
      cache.set(call.name, call.args, result.result);
    }
    return result;
  };

  while (roundsCompleted < config.maxRounds) {
    const text = await requestText(true);
    let envelope = parseToolCallEnvelope(text);
    let assistantText = text;

    if (!envelope && !retryAttempted && looksLikeJson(text)) {
      retryAttempted = true;
      logger.debug({ traceId: ctx.traceId, responseLength: text.length }, 'JSON parse failed, attempting retry');

      messages.push({ role: 'assistant', content: text });
      messages.push({ role: 'user', content: RETRY_PROMPT });

      assistantText = await requestText(true);
      envelope = parseToolCallEnvelope(assistantText);
    }

    if (!envelope) {
      if (looksLikeJson(assistantText)) {
        logger.warn(
          { traceId: ctx.traceId, responseLength: assistantText.length },
          'Tool call envelope parsing failed, returning response',
        );
      }
      return finish(assistantText, false);
    }

    const calls = envelope.calls.slice(0, config.maxCallsPerRound);
    if (envelope.calls.length > config.maxCallsPerRound) {
      logger.warn(
        { traceId: ctx.traceId, requested: envelope.calls.length, limit: config.maxCallsPerRound },
        'Truncating tool calls to limit',
      );
    }

    const roundResults = await Promise.all(calls.map((call) => runWithLimit(() => executeCall(call))));
    allToolResults.push(...roundResults);
    roundsCompleted++;

    const failed = roundResults.find((result) => result.errorType === 'execution');
    if (failed) {
      throw new ToolExecutionError(failed.name, failed.error ?? 'Tool execution failed', failed.cause);
    }

    messages.push({ role: 'assistant', content: assistantText });
    messages.push(formatToolResultsMessage(roundResults, config.maxToolResultChars));
  }

  logger.info(
    { traceId: ctx.traceId, agentId: ctx.agentId, roundsCompleted },
    'Tool round limit reached, requesting final answer',
  );
  messages.push({ role: 'user', content: FINALIZE_PROMPT });
  const finalText = await requestText(false);

  let replyText = finalText;
  if (parseToolCallEnvelope(finalText)) {
    logger.warn({ traceId: ctx.traceId, agentId: ctx.agentId }, 'Finalization response was still a tool envelope');
    replyText = FINALIZE_FALLBACK_TEXT;
  }

  return finish(replyText, true);
}
