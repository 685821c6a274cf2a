import { LLMChatMessage } from '../../llm/llm-types';

export function buildCitationMessages(report: string, sourcesText: string): LLMChatMessage[] {
  return [
    {
      role: 'system',
      content: [
        'You add citations to research reports.',
        'Match each factual claim, statistic or quote in the report to the most relevant of the numbered sources.',
        'Insert inline citations as [Source N]; cite several sources as [Source 1, Source 3].',
        'Do not cite general knowledge. Keep the report text otherwise unchanged.',
        '',
        'After the report, add a bibliography in exactly this format, listing every source:',
        '## Bibliography',
        '[1] Title of the source',
        '    URL: https://example.org/page',
        '    Accessed: YYYY-MM-DD',
      ].join('\n'),
    },
    {
      role: 'user',
      content: ['Report:', report, '', 'Sources:', sourcesText || '[none]'].join('\n'),
    },
  ];
}
