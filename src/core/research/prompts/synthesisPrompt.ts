import { LLMChatMessage } from '../../llm/llm-types';
import { WorkerResult } from '../research-types';

const MAX_LISTED_SOURCES = 10;

/** Render worker results as one findings block, in task order. */
export function formatFindings(results: WorkerResult[]): string {
  const divider = '='.repeat(80);
  return results
    .map((result, i) => {
      const lines = [divider, `SUBAGENT ${i + 1}: ${result.task}`, divider, ''];
      lines.push(`Summary:\n${result.summary || 'N/A'}`, '');
      lines.push(`Detailed Findings:\n${result.findings || 'N/A'}`, '');
      if (result.sources.length > 0) {
        lines.push(`Sources Consulted (${result.sources.length}):`);
        for (const source of result.sources.slice(0, MAX_LISTED_SOURCES)) {
          lines.push(`  - ${source}`);
        }
        if (result.sources.length > MAX_LISTED_SOURCES) {
          lines.push(`  ... and ${result.sources.length - MAX_LISTED_SOURCES} more`);
        }
      }
      lines.push(`Confidence: ${result.confidence}`);
      return lines.join('\n');
    })
    .join('\n\n');
}

export function buildSynthesisMessages(query: string, results: WorkerResult[]): LLMChatMessage[] {
  return [
    {
      role: 'system',
      content: [
        'You are the lead researcher combining the findings of several research agents into one report.',
        'Identify common themes, note contradictions, and organize the report by theme, not by agent.',
        '',
        'Structure:',
        '# Executive Summary',
        '# Detailed Findings (one ## section per theme)',
        '# Key Insights',
        '# Limitations and Uncertainties',
        '# Recommendations for Further Research',
        '',
        'Use specific facts and data from the findings. Do not add citations or source markers; they are added in a later step.',
      ].join('\n'),
    },
    {
      role: 'user',
      content: [
        `Original query: ${query}`,
        '',
        `Findings from ${results.length} research agents:`,
        formatFindings(results),
        '',
        'Write the research report.',
      ].join('\n'),
    },
  ];
}
