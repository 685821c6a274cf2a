import { LLMClient, responseText } from '../llm/llm-types';
import { logger } from '../../shared/logging/logger';
import { errorMessage } from '../../shared/errors/app-error';
import { buildSynthesisMessages } from './prompts/synthesisPrompt';
import { SynthesisError } from './research-errors';
import { WorkerResult } from './research-types';

export interface SynthesisStageOptions {
  temperature?: number;
  maxTokens?: number;
}

export class SynthesisStage {
  constructor(
    private readonly client: LLMClient,
    private readonly options: SynthesisStageOptions = {},
  ) {}

  /**
   * Merge worker findings into one narrative organized by theme.
   *
   * @throws SynthesisError when the generation request fails.
   */
  async synthesize(query: string, results: WorkerResult[]): Promise<string> {
    logger.info({ workers: results.length }, 'Synthesizing worker findings');
    try {
      const response = await this.client.chat({
        messages: buildSynthesisMessages(query, results),
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
      });
      const narrative = responseText(response);
      logger.info({ length: narrative.length }, 'Synthesis complete');
      return narrative;
    } catch (error) {
      throw new SynthesisError(`Synthesis failed: ${errorMessage(error)}`, error);
    }
  }
}
