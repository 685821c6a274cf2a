import { LLMClient, responseText } from '../llm/llm-types';
import { logger } from '../../shared/logging/logger';
import { buildPlanningMessages } from './prompts/planningPrompt';
import { parseResearchPlan } from './planParser';
import { PlanningError } from './research-errors';
import { ResearchPlan } from './research-types';
import { errorMessage } from '../../shared/errors/app-error';

export interface PlanStageOptions {
  minSubagents: number;
  maxSubagents: number;
  temperature?: number;
  maxTokens?: number;
}

/** Turns a query into an ordered set of independent research tasks. */
export class PlanStage {
  constructor(
    private readonly client: LLMClient,
    private readonly options: PlanStageOptions,
  ) {}

  /**
   * @throws PlanningError when the generation request fails.
   */
  async createPlan(query: string): Promise<ResearchPlan> {
    const { minSubagents, maxSubagents } = this.options;
    logger.info({ query: query.slice(0, 100) }, 'Creating research plan');

    let content: string;
    try {
      const response = await this.client.chat({
        messages: buildPlanningMessages({ query, minSubagents, maxSubagents }),
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
      });
      content = responseText(response);
    } catch (error) {
      throw new PlanningError(`Plan generation failed: ${errorMessage(error)}`, error);
    }

    const parsed = parseResearchPlan(content);
    let tasks = parsed.tasks;

    if (tasks.length === 0) {
      logger.warn({ responseLength: content.length }, 'Plan response contained no tasks, researching the query directly');
      tasks = [query];
    }
    if (tasks.length > maxSubagents) {
      logger.info({ parsed: tasks.length, maxSubagents }, 'Truncating plan to the subagent limit');
      tasks = tasks.slice(0, maxSubagents);
    } else if (tasks.length < minSubagents) {
      logger.warn({ parsed: tasks.length, minSubagents }, 'Plan has fewer tasks than the configured minimum');
    }

    const plan: ResearchPlan = {
      tasks,
      rationale: parsed.rationale.found ? parsed.rationale.value : '',
    };
    if (parsed.estimatedDurationSec.found) {
      plan.estimatedDurationSec = parsed.estimatedDurationSec.value;
    }

    logger.info({ taskCount: plan.tasks.length }, 'Research plan created');
    return plan;
  }
}
