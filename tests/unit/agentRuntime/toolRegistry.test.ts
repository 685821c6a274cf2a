import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { ToolRegistry } from '../../../src/core/agentRuntime/toolRegistry';
import { looksLikeJson, parseToolCallEnvelope } from '../../../src/core/agentRuntime/toolCallParser';

const ctx = { traceId: 'trace-1', agentId: 'subagent_0' };

function buildRegistry() {
  const registry = new ToolRegistry();
  const execute = vi.fn(async (args: { a: number; b: number }) => ({ sum: args.a + args.b }));
  registry.register({
    name: 'add_numbers',
    description: 'Add two numbers',
    schema: z.object({ a: z.number(), b: z.number() }),
    execute,
  });
  return { registry, execute };
}

describe('ToolRegistry', () => {
  it('rejects duplicate registrations', () => {
    const { registry } = buildRegistry();
    expect(() =>
      registry.register({ name: 'add_numbers', description: 'again', schema: z.object({}), execute: async () => null }),
    ).toThrow('Tool "add_numbers" is already registered');
  });

  it('lists function specs with JSON schema parameters', () => {
    const { registry } = buildRegistry();
    const [spec] = registry.listToolSpecs();

    expect(spec.type).toBe('function');
    expect(spec.function.name).toBe('add_numbers');
    expect(spec.function.parameters).toMatchObject({
      type: 'object',
      properties: { a: { type: 'number' }, b: { type: 'number' } },
      required: ['a', 'b'],
    });
  });

  it('reports unknown tools and invalid arguments as validation failures', async () => {
    const { registry, execute } = buildRegistry();

    await expect(registry.executeValidated({ name: 'missing', args: {} }, ctx)).resolves.toEqual({
      success: false,
      error: 'Unknown tool: "missing". Allowed tools: add_numbers',
      errorType: 'validation',
    });
    await expect(registry.executeValidated({ name: 'add_numbers', args: { a: 'x', b: 2 } }, ctx)).resolves.toEqual({
      success: false,
      error: 'Invalid arguments for tool "add_numbers": a: Expected number, received string',
      errorType: 'validation',
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it('executes with parsed arguments and the execution context', async () => {
    const { registry, execute } = buildRegistry();

    await expect(registry.executeValidated({ name: 'add_numbers', args: { a: 2, b: 3 } }, ctx)).resolves.toEqual({
      success: true,
      result: { sum: 5 },
    });
    expect(execute).toHaveBeenCalledWith({ a: 2, b: 3 }, ctx);
  });

  it('normalizes thrown errors into execution failures', async () => {
    const registry = new ToolRegistry();
    const failure = new Error('provider down');
    registry.register({
      name: 'flaky',
      description: 'Always throws',
      schema: z.object({}),
      execute: async () => {
        throw failure;
      },
    });

    await expect(registry.executeValidated({ name: 'flaky', args: {} }, ctx)).resolves.toEqual({
      success: false,
      error: 'Tool execution failed: provider down',
      errorType: 'execution',
      cause: failure,
    });
  });
});

describe('toolCallParser', () => {
  it('parses fenced envelopes', () => {
    const text = '```json\n{"type":"tool_calls","calls":[{"name":"parallel_search","args":{"objective":"x"}}]}\n```';
    expect(parseToolCallEnvelope(text)).toEqual({
      type: 'tool_calls',
      calls: [{ name: 'parallel_search', args: { objective: 'x' } }],
    });
  });

  it('returns null for plain text and for other JSON shapes', () => {
    expect(parseToolCallEnvelope('The answer is 42.')).toBeNull();
    expect(parseToolCallEnvelope('{"type":"tool_calls","calls":[{"name":"x","args":[]}]}')).toBeNull();
    expect(parseToolCallEnvelope('{"type":"answer"}')).toBeNull();
  });

  it('flags JSON-looking text', () => {
    expect(looksLikeJson('{"type": "tool_calls", "calls": [')).toBe(true);
    expect(looksLikeJson('Plain answer with {braces}')).toBe(false);
  });
});
