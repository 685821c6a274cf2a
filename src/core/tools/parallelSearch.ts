import { z } from 'zod';
import { AppError } from '../../shared/errors/app-error';
import { logger } from '../../shared/logging/logger';
import { ToolDefinition } from '../agentRuntime/toolRegistry';

export type SearchProcessor = 'base' | 'pro';

export interface SearchRequest {
  objective: string;
  maxResults: number;
  maxCharsPerResult: number;
  processor: SearchProcessor;
}

export interface SearchResult {
  title: string;
  url: string;
  excerpt: string;
}

/** Web-search collaborator used by research workers. */
export interface SearchClient {
  search(request: SearchRequest): Promise<SearchResult[]>;
}

export interface ParallelSearchClientConfig {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
}

const searchResponseSchema = z.object({
  results: z
    .array(
      z.object({
        url: z.string().optional(),
        title: z.string().nullish(),
        excerpts: z.array(z.string()).nullish(),
        excerpt: z.string().nullish(),
      }),
    )
    .default([]),
});

const MAX_EXCERPT_CHARS = 1_000;

async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new AppError('TIMEOUT', `Search request timed out after ${timeoutMs}ms`, error);
    }
    throw error;
  } finally {
    clearTimeout(timeoutHandle);
  }
}

function truncateExcerpt(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_EXCERPT_CHARS ? `${trimmed.slice(0, MAX_EXCERPT_CHARS)}...` : trimmed;
}

/** Client for the Parallel.ai search endpoint (`POST /v1beta/search`). */
export class ParallelSearchClient implements SearchClient {
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  /**
   * @throws AppError CONFIG_INVALID when no API key is configured.
   */
  constructor(config: ParallelSearchClientConfig) {
    const apiKey = config.apiKey?.trim();
    if (!apiKey) {
      throw new AppError('CONFIG_INVALID', 'PARALLEL_API_KEY is not set. Add it to your environment or .env file.');
    }
    this.apiKey = apiKey;
    this.endpoint = `${config.baseUrl.replace(/\/+$/, '')}/v1beta/search`;
    this.timeoutMs = config.timeoutMs;
  }

  async search(request: SearchRequest): Promise<SearchResult[]> {
    const response = await fetchWithTimeout(
      this.endpoint,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'x-api-key': this.apiKey },
        body: JSON.stringify({
          objective: request.objective,
          processor: request.processor,
          max_results: request.maxResults,
          max_chars_per_result: request.maxCharsPerResult,
        }),
      },
      this.timeoutMs,
    );

    const raw = await response.text();
    if (!response.ok) {
      throw new AppError('EXTERNAL_CALL_FAILED', `Search failed with status ${response.status}: ${raw.slice(0, 240)}`, undefined, {
        status: response.status,
      });
    }

    let payload: unknown;
    try {
      payload = raw.trim() ? JSON.parse(raw) : {};
    } catch (error) {
      throw new AppError('EXTERNAL_CALL_FAILED', 'Search returned a non-JSON payload', error);
    }

    const parsed = searchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AppError('EXTERNAL_CALL_FAILED', 'Search returned an unexpected payload', parsed.error);
    }

    const results: SearchResult[] = [];
    for (const item of parsed.data.results) {
      const url = item.url?.trim();
      if (!url) continue;
      const excerpt = item.excerpts?.join('\n') ?? item.excerpt ?? '';
      results.push({ title: item.title?.trim() || url, url, excerpt: truncateExcerpt(excerpt) });
    }

    logger.debug({ objective: request.objective, resultCount: results.length }, '[Search] Completed');
    return results;
  }
}

export const PARALLEL_SEARCH_TOOL_NAME = 'parallel_search';

export interface ParallelSearchToolOptions {
  maxResults: number;
  maxCharsPerResult: number;
  processor: SearchProcessor;
}

/** Shape of the value the search tool hands back to the model. */
export const searchToolResultSchema = z.object({
  objective: z.string(),
  results: z.array(z.object({ title: z.string(), url: z.string(), excerpt: z.string() })),
});

export type SearchToolResult = z.infer<typeof searchToolResultSchema>;

export function createParallelSearchTool(
  client: SearchClient,
  options: ParallelSearchToolOptions,
): ToolDefinition<{ objective: string }> {
  return {
    name: PARALLEL_SEARCH_TOOL_NAME,
    description:
      'Search the web for a natural-language research objective. Returns ranked URLs with titles and content excerpts.',
    schema: z.object({
      objective: z.string().trim().min(2).max(1_000),
    }),
    execute: async ({ objective }, ctx): Promise<SearchToolResult> => {
      logger.debug({ traceId: ctx.traceId, agentId: ctx.agentId, objective }, '[Search] Tool invoked');
      const results = await client.search({ objective, ...options });
      return { objective, results };
    },
  };
}
