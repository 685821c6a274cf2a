import { describe, expect, it } from 'vitest';
import {
  cleanUrl,
  dedupeOrdered,
  extractConfidence,
  extractSummary,
  extractUrls,
} from '../../../src/core/research/textExtraction';

describe('extractUrls', () => {
  it('finds URLs in order, strips trailing punctuation and dedupes', () => {
    const text = [
      'See https://example.org/report.',
      'Also (https://data.example.com/x?y=1), and [link](https://example.org/report).',
      'Plain http://old.example.net/page; done',
    ].join('\n');

    expect(extractUrls(text)).toEqual([
      'https://example.org/report',
      'https://data.example.com/x?y=1',
      'http://old.example.net/page',
    ]);
  });

  it('keeps balanced parentheses and underscores that belong to the path', () => {
    const url = 'https://en.wikipedia.org/wiki/Heat_pump_(disambiguation)';

    expect(extractUrls(`See ${url} for details.`)).toEqual([url]);
    expect(extractUrls(`(also ${url}).`)).toEqual([url]);
    expect(extractUrls('Docs at https://docs.example.org/snake_case_')).toEqual(['https://docs.example.org/snake_case_']);
  });

  it('dedupes a search URL against the same URL quoted in prose', () => {
    const searchUrl = 'https://en.wikipedia.org/wiki/Heat_pump_(disambiguation)';

    expect(dedupeOrdered([searchUrl, ...extractUrls(`See ${searchUrl} for details.`)])).toEqual([searchUrl]);
  });
});

describe('cleanUrl', () => {
  it('strips punctuation, emphasis and unbalanced closing parentheses', () => {
    expect(cleanUrl('https://grid.example/a.')).toBe('https://grid.example/a');
    expect(cleanUrl('https://grid.example/a**')).toBe('https://grid.example/a');
    expect(cleanUrl('https://grid.example/a),')).toBe('https://grid.example/a');
    expect(cleanUrl('https://grid.example/x_(y))')).toBe('https://grid.example/x_(y)');
  });
});

describe('extractConfidence', () => {
  it.each([
    ['## Confidence Assessment\nHigh confidence, several sources agree.', 'high'],
    ['**Confidence:** Low', 'low'],
    ['Confidence Level: **Medium**', 'medium'],
    ['confidence - HIGH', 'high'],
  ] as const)('reads %j', (text, expected) => {
    expect(extractConfidence(text)).toBe(expected);
  });

  it('defaults to medium without a marker', () => {
    expect(extractConfidence('We have low certainty here.')).toBe('medium');
  });

  it('uses the first marker', () => {
    expect(extractConfidence('Confidence: low\n\nConfidence: high')).toBe('low');
  });
});

describe('extractSummary', () => {
  it('reads the Summary section up to the next heading', () => {
    const text = '## Summary\nHeat pumps are efficient.\nThey save money.\n\n## Key Findings\n- More detail';
    expect(extractSummary(text)).toBe('Heat pumps are efficient.\nThey save money.');
  });

  it('falls back to the first non-empty paragraph', () => {
    expect(extractSummary('\n\nFirst paragraph here.\n\nSecond paragraph.')).toBe('First paragraph here.');
  });

  it('truncates long summaries', () => {
    expect(extractSummary('a'.repeat(450))).toBe(`${'a'.repeat(400)}...`);
  });
});

describe('dedupeOrdered', () => {
  it('keeps first occurrences by exact string', () => {
    expect(dedupeOrdered(['b', 'a', 'b', 'A'])).toEqual(['b', 'a', 'A']);
  });
});
