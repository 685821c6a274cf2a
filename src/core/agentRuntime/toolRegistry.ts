/**
 * Register, validate, and expose tool definitions for runtime execution.
 */
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ToolSpec } from '../llm/llm-types';

const MAX_ARGS_SIZE = 10 * 1024;

/** Immutable context passed into every tool execution. */
export interface ToolExecutionContext {
  traceId: string;
  agentId: string;
}

/** One runtime tool with schema validation and async execution. */
export interface ToolDefinition<TArgs = unknown> {
  name: string;
  description: string;
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  execute: (args: TArgs, ctx: ToolExecutionContext) => Promise<unknown>;
}

/** Return shape for validating tool calls before execution. */
export type ToolValidationResult =
  | { success: true; run: (ctx: ToolExecutionContext) => Promise<unknown> }
  | { success: false; error: string };

export type ToolExecutionResult =
  | { success: true; result: unknown }
  | { success: false; error: string; errorType: 'validation' | 'execution'; cause?: unknown };

interface RegisteredTool {
  name: string;
  description: string;
  parameters: object;
  bind(args: unknown): ToolValidationResult;
}

/**
 * Mutable registry of tool definitions. Each worker owns its own registry instance.
 */
export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();

  /**
   * @throws Error when a duplicate tool name is registered.
   */
  register<TArgs>(tool: ToolDefinition<TArgs>): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, {
      name: tool.name,
      description: tool.description,
      parameters: zodToJsonSchema(tool.schema, { $refStrategy: 'none' }),
      bind: (args) => {
        const parseResult = tool.schema.safeParse(args);
        if (!parseResult.success) {
          const issues = parseResult.error.issues
            .map((i) => `${i.path.join('.')}: ${i.message}`)
            .join('; ');
          return { success: false, error: `Invalid arguments for tool "${tool.name}": ${issues}` };
        }
        const parsedArgs = parseResult.data;
        return { success: true, run: (ctx) => tool.execute(parsedArgs, ctx) };
      },
    });
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /** Convert registered tools into OpenAI function-tool specifications. */
  listToolSpecs(): ToolSpec[] {
    return Array.from(this.tools.values()).map((tool) => ({
      type: 'function' as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    }));
  }

  /**
   * Validate an inbound tool call against registry and schema constraints.
   *
   * On success the result carries a runner bound to the parsed arguments.
   */
  validateToolCall(call: { name: string; args: unknown }): ToolValidationResult {
    const { name, args } = call;

    const tool = this.tools.get(name);
    if (!tool) {
      return {
        success: false,
        error: `Unknown tool: "${name}". Allowed tools: ${this.listNames().join(', ') || 'none'}`,
      };
    }

    let argsJson: string | undefined;
    try {
      argsJson = JSON.stringify(args);
    } catch {
      argsJson = undefined;
    }
    if (typeof argsJson !== 'string') {
      return { success: false, error: `Tool arguments for "${name}" must be JSON-serializable` };
    }

    if (argsJson.length > MAX_ARGS_SIZE) {
      return {
        success: false,
        error: `Tool arguments exceed maximum size (${argsJson.length} > ${MAX_ARGS_SIZE} bytes)`,
      };
    }

    return tool.bind(args);
  }

  /** Validate and execute a tool call, normalizing thrown errors into a result. */
  async executeValidated(
    call: { name: string; args: unknown },
    ctx: ToolExecutionContext,
  ): Promise<ToolExecutionResult> {
    const validation = this.validateToolCall(call);
    if (!validation.success) {
      return { success: false, error: validation.error, errorType: 'validation' };
    }

    try {
      const result = await validation.run(ctx);
      return { success: true, result };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        success: false,
        error: `Tool execution failed: ${message}`,
        errorType: 'execution',
        cause: err,
      };
    }
  }
}
