/** Grammar for the tagged plan block returned by the planning request. */

export type ParsedField<T> = { found: true; value: T } | { found: false };

export interface ParsedPlan {
  tasks: string[];
  rationale: ParsedField<string>;
  estimatedDurationSec: ParsedField<number>;
}

const TASK_PATTERN = /<task>([\s\S]*?)<\/task>/gi;
const RATIONALE_PATTERN = /<rationale>([\s\S]*?)<\/rationale>/i;
const DURATION_PATTERN = /<estimated_duration>\s*(\d+(?:\.\d+)?)[\s\S]*?<\/estimated_duration>/i;

const notFound = { found: false } as const;

/**
 * Parse `<task>`, `<rationale>` and `<estimated_duration>` markers.
 *
 * Empty task blocks are dropped. Only the first rationale and duration count. Fallback policy for
 * missing fields belongs to the caller.
 */
export function parseResearchPlan(content: string): ParsedPlan {
  const tasks = Array.from(content.matchAll(TASK_PATTERN), (match) => match[1].trim()).filter(
    (task) => task.length > 0,
  );

  const rationaleMatch = content.match(RATIONALE_PATTERN);
  const rationale: ParsedField<string> = rationaleMatch
    ? { found: true, value: rationaleMatch[1].trim() }
    : notFound;

  const durationMatch = content.match(DURATION_PATTERN);
  const duration = durationMatch ? Number(durationMatch[1]) : Number.NaN;
  const estimatedDurationSec: ParsedField<number> = Number.isFinite(duration)
    ? { found: true, value: duration }
    : notFound;

  return { tasks, rationale, estimatedDurationSec };
}
