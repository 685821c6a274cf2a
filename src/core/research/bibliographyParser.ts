import { ParsedField } from './planParser';
import { Citation } from './research-types';
import { cleanUrl, extractUrls } from './textExtraction';

const SECTION_HEADING =
  /^\s*(?:#{1,6}\s*)?(?:\*\*|__)?\s*(?:bibliography|references|sources|works cited)\s*:?\s*(?:\*\*|__)?\s*:?\s*$/i;
const NEXT_HEADING = /^\s*#{1,6}\s/;
const ENTRY_START = /^\s*(?:\[(\d+)\]|(\d+)\.)\s*(.*)$/;
// Labels may carry markdown emphasis on either side of the colon: `**URL:**`, `__Accessed__:`.
const EMPHASIS = '(?:\\*\\*|__)?';
const label = (name: string) => new RegExp(`${EMPHASIS}(?<![a-z0-9])${name}${EMPHASIS}:${EMPHASIS}[ \\t]*`, 'i');
const URL_LABEL = label('URL');
const ACCESSED_LABEL = label('Accessed');
const EXCERPT_LABEL = label('Excerpt');
const ANY_LABEL = label('(?:URL|Accessed|Excerpt)');
const LABELED_URL = /^<?(https?:\/\/[^\s>]+)/i;
const HTTP_URL = /^https?:\/\/\S+$/i;

interface RawEntry {
  index: number;
  lead: string;
  body: string[];
}

function collectEntries(sectionLines: string[]): RawEntry[] {
  const entries: RawEntry[] = [];
  for (const line of sectionLines) {
    if (NEXT_HEADING.test(line)) break;
    const start = line.match(ENTRY_START);
    if (start) {
      entries.push({ index: Number(start[1] ?? start[2]), lead: start[3].trim(), body: [] });
      continue;
    }
    const current = entries[entries.length - 1];
    if (current && line.trim()) current.body.push(line.trim());
  }
  return entries;
}

/** Text after a label, up to the end of its line or the next label on the same line. */
function readLabel(text: string, pattern: RegExp): string | undefined {
  const match = pattern.exec(text);
  if (!match) return undefined;
  const rest = text.slice(match.index + match[0].length).split('\n')[0];
  const next = rest.search(ANY_LABEL);
  const value = (next === -1 ? rest : rest.slice(0, next))
    .trim()
    .replace(/^(?:\*\*|__)|(?:\*\*|__)$/g, '')
    .trim();
  return value || undefined;
}

function readUrl(text: string): string | undefined {
  const labeled = readLabel(text, URL_LABEL)?.match(LABELED_URL)?.[1];
  const url = labeled ? cleanUrl(labeled) : extractUrls(text)[0];
  return url && HTTP_URL.test(url) ? url : undefined;
}

/** Lead text before any label, without emphasis, trailing separators or the entry's own URL. */
function readTitle(lead: string, url: string): string {
  const labelAt = lead.search(ANY_LABEL);
  const title = (labelAt === -1 ? lead : lead.slice(0, labelAt))
    .replace(url, '')
    .replace(/^[*_\s]+/, '')
    .replace(/[\s*_.,;:|\u2013\u2014-]+$/, '');
  return title || url;
}

function toCitation(entry: RawEntry, defaultAccessedDate: string): Citation | null {
  const text = [entry.lead, ...entry.body].join('\n');
  const url = readUrl(text);
  if (!url) return null;

  const citation: Citation = {
    index: entry.index,
    title: readTitle(entry.lead, url),
    url,
    accessedDate: readLabel(text, ACCESSED_LABEL)?.replace(/[.,;]+$/, '') || defaultAccessedDate,
  };
  const excerpt = readLabel(text, EXCERPT_LABEL);
  if (excerpt) citation.excerpt = excerpt;
  return citation;
}

/**
 * Locate the bibliography section in generated text and parse its numbered entries.
 *
 * Not found when there is no section heading. Entries without an http(s) URL are dropped, so a
 * found section may still hold zero citations.
 */
export function parseBibliography(text: string, defaultAccessedDate: string): ParsedField<Citation[]> {
  const lines = text.split(/\r?\n/);
  const headingIndex = lines.findIndex((line) => SECTION_HEADING.test(line));
  if (headingIndex === -1) return { found: false };

  const citations = collectEntries(lines.slice(headingIndex + 1))
    .map((entry) => toCitation(entry, defaultAccessedDate))
    .filter((citation): citation is Citation => citation !== null);
  return { found: true, value: citations };
}

/** Synthesized bibliography: one citation per registered URL, titled by its URL. */
export function bibliographyFromSources(urls: string[], accessedDate: string): Citation[] {
  return urls.map((url, i) => ({ index: i + 1, title: url, url, accessedDate }));
}
