import { Confidence } from './research-types';

const URL_PATTERN = /https?:\/\/[^\s<>"'`[\]{}]+/gi;
const TRAILING_PUNCTUATION = /[.,;:!?*]+$/;
const CONFIDENCE_PATTERN = /confidence(?:\s+(?:assessment|level))?\s*[:-]?\s*\**\s*(high|medium|low)\b/i;
const SUMMARY_PATTERN = /#{1,6}\s*\**summary\**:?[ \t]*\n?([\s\S]*?)(?=\n#{1,6}\s|$)/i;

export const MAX_SUMMARY_CHARS = 400;

/** Keep the first occurrence of each value, by exact string equality. */
export function dedupeOrdered(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}

function count(text: string, char: string): number {
  return text.split(char).length - 1;
}

/**
 * Strip sentence punctuation, emphasis markers and unbalanced closing parentheses from the end of a
 * URL. Balanced parentheses are part of the path (`/wiki/Heat_pump_(disambiguation)`).
 */
export function cleanUrl(raw: string): string {
  let url = raw;
  for (;;) {
    const stripped = url.replace(TRAILING_PUNCTUATION, '');
    if (stripped !== url) {
      url = stripped;
    } else if (url.endsWith(')') && count(url, '(') < count(url, ')')) {
      url = url.slice(0, -1);
    } else {
      return url;
    }
  }
}

/** Pull http(s) URLs out of free text, first-seen order, without trailing sentence punctuation. */
export function extractUrls(text: string): string[] {
  const urls: string[] = [];
  for (const match of text.matchAll(URL_PATTERN)) {
    const url = cleanUrl(match[0]);
    if (url.length > 'https://'.length) urls.push(url);
  }
  return dedupeOrdered(urls);
}

/** First confidence marker wins; `medium` when none is present. */
export function extractConfidence(text: string): Confidence {
  const match = text.match(CONFIDENCE_PATTERN);
  if (!match) return 'medium';
  const level = match[1].toLowerCase();
  return level === 'high' || level === 'low' ? level : 'medium';
}

function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars).trimEnd()}...`;
}

/**
 * Text under a Summary heading up to the next heading, else the first non-empty paragraph.
 */
export function extractSummary(text: string): string {
  const section = text.match(SUMMARY_PATTERN)?.[1]?.trim();
  if (section) return truncate(section, MAX_SUMMARY_CHARS);

  const paragraph = text
    .split(/\n\s*\n/)
    .map((part) => part.trim())
    .find((part) => part.length > 0);
  return truncate(paragraph ?? '', MAX_SUMMARY_CHARS);
}
