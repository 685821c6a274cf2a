import { LLMChatMessage } from '../../llm/llm-types';

export interface PlanningPromptInput {
  query: string;
  minSubagents: number;
  maxSubagents: number;
}

export function buildPlanningMessages(input: PlanningPromptInput): LLMChatMessage[] {
  return [
    {
      role: 'system',
      content: [
        'You are the lead researcher of a team of research agents that work in parallel.',
        'Break the research query into focused sub-tasks that can each be answered through web research.',
        '',
        'Guidelines:',
        `- Create between ${input.minSubagents} and ${input.maxSubagents} tasks.`,
        '- Each task is specific and does not overlap with the others.',
        '- Tasks have no dependencies on each other.',
        '- Cover different angles of the query, such as technical, economic, social or historical.',
        '',
        'Output the plan in exactly this format:',
        '<research_plan>',
        '<task>First research task</task>',
        '<task>Second research task</task>',
        '<rationale>Why this decomposition answers the query</rationale>',
        '<estimated_duration>Expected research time in seconds (optional)</estimated_duration>',
        '</research_plan>',
      ].join('\n'),
    },
    {
      role: 'user',
      content: `Research query: ${input.query}\n\nCreate a research plan for this query.`,
    },
  ];
}
