import { LLMClient } from '../llm/llm-types';
import { childLogger } from '../../shared/logging/logger';
import { errorMessage } from '../../shared/errors/app-error';
import { ToolRegistry } from '../agentRuntime/toolRegistry';
import { runToolCallLoop } from '../agentRuntime/toolCallLoop';
import { ToolResult } from '../agentRuntime/toolCallExecution';
import {
  createParallelSearchTool,
  PARALLEL_SEARCH_TOOL_NAME,
  SearchClient,
  searchToolResultSchema,
} from '../tools/parallelSearch';
import { buildWorkerMessages } from './prompts/workerPrompt';
import { WorkerError } from './research-errors';
import { ResearchConfig } from './research-config';
import { toWorkerResult, WorkerOutcome, WorkerResult } from './research-types';
import { dedupeOrdered, extractConfidence, extractSummary, extractUrls } from './textExtraction';

export interface ResearchWorkerDeps {
  client: LLMClient;
  search: SearchClient;
  config: Pick<ResearchConfig, 'workerMaxIterations' | 'maxCallsPerRound' | 'maxToolResultChars' | 'search' | 'generation'>;
  /** Correlates log lines of one pipeline run. */
  traceId?: string;
}

/** URLs returned by successful search calls, in call order. */
export function collectSearchUrls(toolResults: ToolResult[]): string[] {
  const urls: string[] = [];
  for (const result of toolResults) {
    if (!result.success || result.name !== PARALLEL_SEARCH_TOOL_NAME) continue;
    const parsed = searchToolResultSchema.safeParse(result.result);
    if (!parsed.success) continue;
    urls.push(...parsed.data.results.map((entry) => entry.url));
  }
  return urls;
}

/**
 * Researches one task through the bounded tool-call loop with the search tool.
 *
 * Each call builds its own tool registry, so concurrent workers share nothing but the clients.
 */
export class ResearchWorker {
  constructor(private readonly deps: ResearchWorkerDeps) {}

  async run(task: string, agentId: string): Promise<WorkerResult> {
    return toWorkerResult(await this.execute(task, agentId));
  }

  /** Never rejects: every failure comes back as a `failure` outcome. */
  async execute(task: string, agentId: string): Promise<WorkerOutcome> {
    const { client, search, config } = this.deps;
    const traceId = this.deps.traceId ?? agentId;
    const log = childLogger({ traceId, agentId });
    const startedAt = Date.now();
    log.info({ task: task.slice(0, 80) }, 'Research worker started');

    try {
      const registry = new ToolRegistry();
      registry.register(createParallelSearchTool(search, config.search));

      const loop = await runToolCallLoop({
        client,
        registry,
        ctx: { traceId, agentId },
        messages: buildWorkerMessages(task, PARALLEL_SEARCH_TOOL_NAME),
        temperature: config.generation.temperature,
        maxTokens: config.generation.maxTokens,
        config: {
          maxRounds: config.workerMaxIterations,
          maxCallsPerRound: config.maxCallsPerRound,
          maxToolResultChars: config.maxToolResultChars,
        },
      });

      const findings = loop.replyText.trim();
      if (!findings) {
        throw new WorkerError(agentId, 'Model returned an empty answer');
      }

      const sources = dedupeOrdered([...collectSearchUrls(loop.toolResults), ...extractUrls(findings)]);
      const durationMs = Date.now() - startedAt;
      log.info(
        {
          sources: sources.length,
          rounds: loop.roundsCompleted,
          cacheHits: loop.cacheHits,
          finalized: loop.finalized,
          durationMs,
        },
        'Research worker complete',
      );

      return {
        status: 'success',
        agentId,
        task,
        summary: extractSummary(findings),
        findings,
        sources,
        confidence: extractConfidence(findings),
        toolCalls: loop.toolResults.length,
        rounds: loop.roundsCompleted,
        durationMs,
      };
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      log.error({ error, durationMs }, 'Research worker failed');
      return { status: 'failure', agentId, task, reason: errorMessage(error), durationMs };
    }
  }
}
