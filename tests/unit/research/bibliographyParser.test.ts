import { describe, expect, it } from 'vitest';

import { bibliographyFromSources, parseBibliography } from '../../../src/core/research/bibliographyParser';

const CITED_REPORT = [
  'Heat pumps reach 300% efficiency [Source 1] and costs keep falling [Source 2].',
  '',
  '## Bibliography',
  '[1] Heat pump outlook',
  '    URL: https://iea.example/heat-pumps',
  '    Accessed: 2026-02-27',
  '    Excerpt: Efficiency is 300% in mild climates.',
  '2. https://costs.example/2026',
  '',
  '## Appendix',
  '[3] Methodology notes https://appendix.example/notes',
].join('\n');

describe('parseBibliography', () => {
  it('parses numbered entries in order and stops at the next heading', () => {
    const parsed = parseBibliography(CITED_REPORT, '2026-03-01');

    expect(parsed).toEqual({
      found: true,
      value: [
        {
          index: 1,
          title: 'Heat pump outlook',
          url: 'https://iea.example/heat-pumps',
          accessedDate: '2026-02-27',
          excerpt: 'Efficiency is 300% in mild climates.',
        },
        {
          index: 2,
          title: 'https://costs.example/2026',
          url: 'https://costs.example/2026',
          accessedDate: '2026-03-01',
        },
      ],
    });
  });

  it('recognizes a bold references heading', () => {
    const parsed = parseBibliography('Report.\n\n**References:**\n[1] Grid data\n    URL: https://grid.example/a', '2026-03-01');

    expect(parsed).toEqual({
      found: true,
      value: [{ index: 1, title: 'Grid data', url: 'https://grid.example/a', accessedDate: '2026-03-01' }],
    });
  });

  it('reads labels wrapped in bold markers', () => {
    const text = [
      '## Bibliography',
      '[1] **Heat pump outlook**',
      '    **URL:** https://iea.example/heat-pumps',
      '    **Accessed:** 2026-02-27',
      '    __Excerpt__: Efficiency is 300%.',
    ].join('\n');

    expect(parseBibliography(text, '2026-03-01')).toEqual({
      found: true,
      value: [
        {
          index: 1,
          title: 'Heat pump outlook',
          url: 'https://iea.example/heat-pumps',
          accessedDate: '2026-02-27',
          excerpt: 'Efficiency is 300%.',
        },
      ],
    });
  });

  it('splits an entry written on one line at its labels', () => {
    const text = '## Bibliography\n[1] Grid data. URL: https://grid.example/a. Accessed: 2026-02-27';

    expect(parseBibliography(text, '2026-03-01')).toEqual({
      found: true,
      value: [{ index: 1, title: 'Grid data', url: 'https://grid.example/a', accessedDate: '2026-02-27' }],
    });
  });

  it('drops entries whose URL label holds no http link', () => {
    const text = '## Bibliography\n[1] **Internal memo**\n    **URL:** (not available)\n    **Accessed:** 2026-02-27';

    expect(parseBibliography(text, '2026-03-01')).toEqual({ found: true, value: [] });
  });

  it('reports a missing section as not found', () => {
    expect(parseBibliography('A report with [Source 1] but no bibliography.', '2026-03-01')).toEqual({ found: false });
  });

  it('drops entries that carry no URL', () => {
    expect(parseBibliography('## References\n[1] A printed book without a link', '2026-03-01')).toEqual({
      found: true,
      value: [],
    });
  });
});

describe('bibliographyFromSources', () => {
  it('numbers every URL from one and titles it by the URL', () => {
    expect(bibliographyFromSources(['https://a.example/1', 'https://b.example/2'], '2026-03-01')).toEqual([
      { index: 1, title: 'https://a.example/1', url: 'https://a.example/1', accessedDate: '2026-03-01' },
      { index: 2, title: 'https://b.example/2', url: 'https://b.example/2', accessedDate: '2026-03-01' },
    ]);
  });
});
