import { LLMClient, responseText } from '../llm/llm-types';
import { logger } from '../../shared/logging/logger';
import { errorMessage } from '../../shared/errors/app-error';
import { buildCitationMessages } from './prompts/citationPrompt';
import { bibliographyFromSources, parseBibliography } from './bibliographyParser';
import { CitationError } from './research-errors';
import { Citation, CitationResolution, WorkerResult } from './research-types';
import { SourceRegistry } from './sourceRegistry';

export interface CitationResolverOptions {
  temperature?: number;
  maxTokens?: number;
  /** Clock for the access date stamped on every source of a run. */
  now?: () => Date;
}

export function formatAccessDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function warnOnSuspectIndices(citations: Citation[], registrySize: number): void {
  const seen = new Set<number>();
  for (const citation of citations) {
    if (citation.index < 1 || citation.index > registrySize) {
      logger.warn({ index: citation.index, registrySize, url: citation.url }, 'Bibliography index outside the source list');
    }
    if (seen.has(citation.index)) {
      logger.warn({ index: citation.index, url: citation.url }, 'Duplicate bibliography index');
    }
    seen.add(citation.index);
  }
}

/** Adds inline citations to a narrative and resolves its bibliography against the worker sources. */
export class CitationResolver {
  constructor(
    private readonly client: LLMClient,
    private readonly options: CitationResolverOptions = {},
  ) {}

  /**
   * @throws CitationError when the generation request fails. A bibliography that cannot be
   * parsed is not an error; the registry fallback is used instead.
   */
  async resolve(narrative: string, results: WorkerResult[]): Promise<CitationResolution> {
    const registry = SourceRegistry.fromResults(results);
    const accessedDate = formatAccessDate((this.options.now ?? (() => new Date()))());
    logger.info({ sources: registry.size }, 'Adding citations to research report');

    let citedReport: string;
    try {
      const response = await this.client.chat({
        messages: buildCitationMessages(narrative, registry.formatForPrompt(accessedDate)),
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
      });
      citedReport = responseText(response);
    } catch (error) {
      throw new CitationError(`Citation generation failed: ${errorMessage(error)}`, error);
    }

    const parsed = parseBibliography(citedReport, accessedDate);
    if (parsed.found && parsed.value.length > 0) {
      warnOnSuspectIndices(parsed.value, registry.size);
      logger.info({ citations: parsed.value.length }, 'Parsed bibliography from citation response');
      return {
        citedReport,
        bibliography: parsed.value,
        sourceCount: registry.size,
        bibliographySource: 'parsed',
      };
    }

    logger.warn(
      { sectionFound: parsed.found, sources: registry.size },
      'No parsable bibliography, building it from the source registry',
    );
    return {
      citedReport,
      bibliography: bibliographyFromSources(
        registry.list().map((entry) => entry.url),
        accessedDate,
      ),
      sourceCount: registry.size,
      bibliographySource: 'registry',
    };
  }
}
