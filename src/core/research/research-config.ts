import { AppEnv } from '../../shared/config/env';
import { SearchProcessor } from '../tools/parallelSearch';

/** Settings the research core consumes. Built once from the environment and passed explicitly. */
export interface ResearchConfig {
  minSubagents: number;
  maxSubagents: number;
  maxParallelWorkers: number;
  workerMaxIterations: number;
  maxCallsPerRound: number;
  maxToolResultChars: number;
  search: {
    maxResults: number;
    maxCharsPerResult: number;
    processor: SearchProcessor;
  };
  generation: {
    temperature: number;
    maxTokens: number;
  };
}

export function buildResearchConfig(env: AppEnv): ResearchConfig {
  return {
    minSubagents: env.MIN_SUBAGENTS,
    maxSubagents: env.MAX_SUBAGENTS,
    maxParallelWorkers: env.MAX_PARALLEL_WORKERS,
    workerMaxIterations: env.WORKER_MAX_ITERATIONS,
    maxCallsPerRound: env.WORKER_MAX_CALLS_PER_ROUND,
    maxToolResultChars: env.TOOL_RESULT_MAX_CHARS,
    search: {
      maxResults: env.PARALLEL_MAX_RESULTS,
      maxCharsPerResult: env.PARALLEL_MAX_CHARS,
      processor: env.PARALLEL_PROCESSOR,
    },
    generation: {
      temperature: env.MODEL_TEMPERATURE,
      maxTokens: env.MAX_TOKENS,
    },
  };
}

export const DEFAULT_RESEARCH_CONFIG: ResearchConfig = {
  minSubagents: 3,
  maxSubagents: 5,
  maxParallelWorkers: 5,
  workerMaxIterations: 10,
  maxCallsPerRound: 3,
  maxToolResultChars: 12_000,
  search: { maxResults: 10, maxCharsPerResult: 6_000, processor: 'base' },
  generation: { temperature: 0.7, maxTokens: 4_096 },
};
