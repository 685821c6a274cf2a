import { LLMChatMessage } from '../../llm/llm-types';

export function buildWorkerMessages(task: string, searchToolName: string): LLMChatMessage[] {
  return [
    {
      role: 'system',
      content: [
        'You are a research agent with one focused objective.',
        `Your objective: ${task}`,
        '',
        `Use the ${searchToolName} tool to gather authoritative information. Start broad, then refine with more specific objectives.`,
        'Prefer recent, authoritative sources: data, expert analysis, peer-reviewed research and institutional reports.',
        'To call a tool, reply with JSON only:',
        `{"type":"tool_calls","calls":[{"name":"${searchToolName}","args":{"objective":"..."}}]}`,
        '',
        'When your research is complete, answer in plain text with these sections:',
        '## Summary',
        '2-3 sentences on what you found.',
        '## Key Findings',
        '- Specific findings with details',
        '## Supporting Data',
        'Statistics and figures, if any.',
        '## Sources Consulted',
        'The URLs you relied on, one per line.',
        '## Confidence Assessment',
        'High, Medium or Low, and why.',
        '## Additional Notes',
        'Contradictions, uncertainties and open questions.',
      ].join('\n'),
    },
    {
      role: 'user',
      content: `Research this topic thoroughly: ${task}`,
    },
  ];
}
