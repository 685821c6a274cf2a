/** Parse and validate structured tool-call envelopes emitted by the model. */
import { z } from 'zod';

const toolCallEnvelopeSchema = z.object({
  type: z.literal('tool_calls'),
  calls: z.array(
    z.object({
      name: z.string().min(1),
      args: z.record(z.unknown()),
    }),
  ),
});

export type ToolCallEnvelope = z.infer<typeof toolCallEnvelopeSchema>;

/** Deterministic retry guidance when model output is invalid JSON. */
export const RETRY_PROMPT = `Your previous response was not valid JSON. Output ONLY valid JSON matching the exact schema:
{
  "type": "tool_calls",
  "calls": [{ "name": "<tool_name>", "args": { ... } }]
}
OR respond with a plain text answer if you don't need to use tools.`;

function stripCodeFences(text: string): string {
  const fencePattern = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/;
  const match = text.trim().match(fencePattern);
  return match ? match[1].trim() : text.trim();
}

/** Detect whether a response is likely intended as JSON tool output. */
export function looksLikeJson(text: string): boolean {
  const trimmed = stripCodeFences(text);
  return (
    (trimmed.startsWith('{') || trimmed.startsWith('[')) &&
    (trimmed.includes('"type"') || trimmed.includes('"name"') || trimmed.includes('"calls"'))
  );
}

/**
 * Parse a model response into a validated tool-call envelope.
 *
 * Returns null for plain text, malformed JSON, and JSON of any other shape.
 */
export function parseToolCallEnvelope(text: string): ToolCallEnvelope | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(text));
  } catch {
    return null;
  }
  const result = toolCallEnvelopeSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
