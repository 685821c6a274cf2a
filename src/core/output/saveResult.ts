import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { AppError } from '../../shared/errors/app-error';
import { logger } from '../../shared/logging/logger';
import { ResearchResult } from '../research/research-types';
import { formatAsHtml, formatAsJson, formatAsMarkdown } from './formatters';

export interface SavedResultPaths {
  markdown: string;
  json: string;
  html: string;
}

const pad = (value: number) => String(value).padStart(2, '0');

/** Local-time `YYYYMMDD_HHMMSS`. */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** First 50 characters of the query with every non-alphanumeric character replaced by `_`. */
export function querySlug(query: string): string {
  return query.slice(0, 50).replace(/[^a-zA-Z0-9]/g, '_');
}

/**
 * Write the Markdown, JSON and HTML renditions of a result into `outputDir`.
 *
 * @throws AppError OUTPUT_WRITE_FAILED when the directory or a file cannot be written.
 */
export async function saveResult(
  result: ResearchResult,
  outputDir: string,
  now: Date = new Date(),
): Promise<SavedResultPaths> {
  const base = path.join(outputDir, `research_${formatFileTimestamp(now)}_${querySlug(result.query)}`);
  const paths: SavedResultPaths = {
    markdown: `${base}.md`,
    json: `${base}.json`,
    html: `${base}.html`,
  };

  try {
    await mkdir(outputDir, { recursive: true });
    await writeFile(paths.markdown, formatAsMarkdown(result), 'utf8');
    await writeFile(paths.json, formatAsJson(result), 'utf8');
    await writeFile(paths.html, formatAsHtml(result), 'utf8');
  } catch (error) {
    throw new AppError('OUTPUT_WRITE_FAILED', `Could not write research output to ${outputDir}`, error);
  }

  logger.info({ ...paths }, 'Research output saved');
  return paths;
}
