/** Execute validated tool calls with structured result logging. */
import { ToolExecutionContext, ToolRegistry } from './toolRegistry';
import { logger } from '../../shared/logging/logger';
import { ToolErrorKind } from './toolErrors';

/** One completed tool invocation. */
export interface ToolResult {
  name: string;
  args: unknown;
  success: boolean;
  result?: unknown;
  error?: string;
  errorType?: ToolErrorKind;
  /** Original thrown value for execution failures. */
  cause?: unknown;
  cached?: boolean;
  latencyMs: number;
}

/**
 * Execute one tool call and normalize the outcome.
 *
 * Never rejects: validation and execution failures come back as unsuccessful results.
 */
export async function executeToolCall(
  registry: ToolRegistry,
  call: { name: string; args: unknown },
  ctx: ToolExecutionContext,
): Promise<ToolResult> {
  const start = Date.now();
  const bindings = { traceId: ctx.traceId, agentId: ctx.agentId, toolName: call.name };
  logger.debug({ ...bindings, event: 'tool_invocation_start' }, 'Tool invocation started');

  const outcome = await registry.executeValidated(call, ctx);
  const latencyMs = Math.max(0, Date.now() - start);

  if (outcome.success) {
    logger.info({ ...bindings, latencyMs }, 'Tool invocation succeeded');
    return { name: call.name, args: call.args, success: true, result: outcome.result, latencyMs };
  }

  logger.warn(
    { ...bindings, errorType: outcome.errorType, error: outcome.error, latencyMs },
    outcome.errorType === 'validation' ? 'Tool invocation rejected' : 'Tool invocation failed',
  );
  return {
    name: call.name,
    args: call.args,
    success: false,
    error: outcome.error,
    errorType: outcome.errorType,
    cause: outcome.cause,
    latencyMs,
  };
}
