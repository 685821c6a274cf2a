import { ResearchResult } from '../research/research-types';

const BIBLIOGRAPHY_HEADING = /^\s*(?:#{1,6}\s*)?(?:\*\*)?\s*(?:bibliography|references)\b/im;

/** `YYYY-MM-DD HH:MM:SS` (UTC) from an ISO timestamp. */
export function formatGeneratedAt(createdAt: string): string {
  return createdAt.replace('T', ' ').slice(0, 19);
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function formatAsMarkdown(result: ResearchResult): string {
  const lines = [
    `# Research Report: ${result.query}`,
    '',
    `*Generated: ${formatGeneratedAt(result.createdAt)}*`,
    '',
    `*Subagents used: ${result.metadata.subagentsCount} | Sources consulted: ${result.metadata.sourcesCount}*`,
    '',
    '---',
    '',
    result.citedReport,
    '',
    '---',
    '',
  ];

  // The citation response usually carries its own bibliography.
  if (!BIBLIOGRAPHY_HEADING.test(result.citedReport)) {
    lines.push('## Bibliography', '');
    for (const cite of result.bibliography) {
      lines.push(`${cite.index}. ${cite.title}`, `   URL: ${cite.url}`);
      if (cite.accessedDate) lines.push(`   Accessed: ${cite.accessedDate}`);
      lines.push('');
    }
  }

  return lines.join('\n');
}

export function formatAsJson(result: ResearchResult): string {
  return JSON.stringify(result, null, 2);
}

function renderLink(url: string): string {
  const escaped = escapeHtml(url);
  return /^https?:\/\//i.test(url) ? `<a href="${escaped}">${escaped}</a>` : escaped;
}

export function formatAsHtml(result: ResearchResult): string {
  const title = `Research Report: ${escapeHtml(result.query)}`;
  const citations = result.bibliography.map((cite) =>
    [
      '      <div class="citation">',
      `        [${cite.index}] <strong>${escapeHtml(cite.title)}</strong><br>`,
      `        ${renderLink(cite.url)}<br>`,
      `        Accessed: ${escapeHtml(cite.accessedDate)}`,
      '      </div>',
    ].join('\n'),
  );

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="UTF-8">',
    '  <meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `  <title>${title}</title>`,
    '  <style>',
    '    body { font-family: Arial, sans-serif; max-width: 800px; margin: 0 auto; padding: 20px; }',
    '    .metadata { color: #666; font-style: italic; margin-bottom: 20px; }',
    '    .report { line-height: 1.6; }',
    '    .citation { margin-bottom: 10px; }',
    '  </style>',
    '</head>',
    '<body>',
    `  <h1>${title}</h1>`,
    '  <div class="metadata">',
    `    Generated: ${formatGeneratedAt(result.createdAt)}<br>`,
    `    Subagents: ${result.metadata.subagentsCount} | Sources: ${result.metadata.sourcesCount}`,
    '  </div>',
    '  <hr>',
    '  <div class="report">',
    `    ${escapeHtml(result.citedReport).replace(/\n/g, '<br>\n')}`,
    '  </div>',
    '  <hr>',
    '  <div class="bibliography">',
    '    <h2>Bibliography</h2>',
    ...citations,
    '  </div>',
    '</body>',
    '</html>',
  ].join('\n');
}
