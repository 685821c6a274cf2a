import { config, AppEnv } from '../shared/config/env';
import { toErrorWithCode } from '../shared/errors/app-error';
import { logger } from '../shared/logging/logger';
import { createLLMClient } from '../core/llm';
import { ParallelSearchClient } from '../core/tools/parallelSearch';
import { buildResearchConfig } from '../core/research/research-config';
import { createResearchPipeline, ResearchPipeline } from '../core/research/researchPipeline';
import { ProgressListener } from '../core/research/research-types';

export interface BootstrapOptions {
  env?: AppEnv;
  onProgress?: ProgressListener;
}

/**
 * Composition root: build the generation and search clients from the environment and wire the pipeline.
 *
 * @throws AppError CONFIG_INVALID when a collaborator cannot be configured.
 */
export function bootstrapResearch(options: BootstrapOptions = {}): ResearchPipeline {
  const env = options.env ?? config;
  try {
    if (!env.LLM_API_KEY) {
      logger.warn('No LLM API key found. Requests go out unauthenticated.');
    }
    const client = createLLMClient(env);
    const search = new ParallelSearchClient({
      apiKey: env.PARALLEL_API_KEY,
      baseUrl: env.PARALLEL_BASE_URL,
      timeoutMs: env.PARALLEL_TIMEOUT_MS,
    });
    return createResearchPipeline(buildResearchConfig(env), { client, search, onProgress: options.onProgress });
  } catch (error) {
    throw toErrorWithCode(error, 'CONFIG_INVALID');
  }
}
