import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../../src/shared/logging/logger', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { formatFileTimestamp, querySlug, saveResult } from '../../../src/core/output/saveResult';
import { AppError } from '../../../src/shared/errors/app-error';
import { ResearchResult } from '../../../src/core/research/research-types';

const result: ResearchResult = {
  query: 'Heat pumps vs. gas boilers?',
  plan: { tasks: ['costs'], rationale: '' },
  workerResults: [],
  synthesis: 'Narrative.',
  citedReport: 'Narrative [Source 1].',
  bibliography: [{ index: 1, title: 'Survey', url: 'https://a.example/1', accessedDate: '2026-03-01' }],
  metadata: {
    subagentsCount: 1,
    failedSubagents: 0,
    sourcesCount: 1,
    citationCount: 1,
    bibliographySource: 'registry',
    durationSeconds: 3,
  },
  createdAt: '2026-03-01T09:15:30.000Z',
};

describe('formatFileTimestamp', () => {
  it('uses local date and time', () => {
    expect(formatFileTimestamp(new Date(2026, 2, 1, 9, 5, 7))).toBe('20260301_090507');
  });
});

describe('querySlug', () => {
  it('replaces non-alphanumerics and keeps the first 50 characters', () => {
    expect(querySlug('Heat pumps vs. gas boilers?')).toBe('Heat_pumps_vs__gas_boilers_');
    expect(querySlug('x'.repeat(60))).toHaveLength(50);
  });
});

describe('saveResult', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'research-output-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes markdown, json and html files named after the time and query', async () => {
    const outputDir = path.join(dir, 'nested');

    const paths = await saveResult(result, outputDir, new Date(2026, 2, 1, 9, 5, 7));

    const base = path.join(outputDir, 'research_20260301_090507_Heat_pumps_vs__gas_boilers_');
    expect(paths).toEqual({ markdown: `${base}.md`, json: `${base}.json`, html: `${base}.html` });
    expect(JSON.parse(await readFile(paths.json, 'utf8'))).toEqual(result);
    expect((await readFile(paths.markdown, 'utf8')).startsWith('# Research Report: Heat pumps vs. gas boilers?\n')).toBe(
      true,
    );
    expect(await readFile(paths.html, 'utf8')).toContain('<h1>Research Report: Heat pumps vs. gas boilers?</h1>');
  });

  it('reports an unwritable output location as OUTPUT_WRITE_FAILED', async () => {
    const blocker = path.join(dir, 'not-a-directory');
    await writeFile(blocker, 'file', 'utf8');

    const failure = saveResult(result, path.join(blocker, 'out'));

    await expect(failure).rejects.toBeInstanceOf(AppError);
    await expect(failure).rejects.toMatchObject({ code: 'OUTPUT_WRITE_FAILED' });
  });
});
