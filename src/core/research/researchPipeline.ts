import { randomUUID } from 'node:crypto';
import { LLMClient } from '../llm/llm-types';
import { childLogger } from '../../shared/logging/logger';
import { errorMessage } from '../../shared/errors/app-error';
import { SearchClient } from '../tools/parallelSearch';
import { CitationResolver } from './citationResolver';
import { PlanStage } from './planStage';
import { interpolatePercent, logProgress, MILESTONES, ProgressAggregator, WORKER_RANGE } from './progressAggregator';
import { ResearchConfig } from './research-config';
import { PlanningError } from './research-errors';
import { ProgressListener, ResearchResult, WorkerProgressSink } from './research-types';
import { ResearchWorker } from './researchWorker';
import { SynthesisStage } from './synthesisStage';
import { WorkerCoordinator } from './workerCoordinator';

export interface ResearchPipelineStages {
  planner: Pick<PlanStage, 'createPlan'>;
  coordinator: Pick<WorkerCoordinator, 'runAll'>;
  synthesizer: Pick<SynthesisStage, 'synthesize'>;
  citations: Pick<CitationResolver, 'resolve'>;
}

/**
 * Runs plan, fan-out research, synthesis and citation for one query at a time.
 */
export class ResearchPipeline {
  constructor(
    private readonly stages: ResearchPipelineStages,
    private readonly onProgress: ProgressListener = logProgress,
  ) {}

  /**
   * Fatal stage errors emit one `error` update at 0%, are logged, and are rethrown.
   */
  async research(query: string): Promise<ResearchResult> {
    const log = childLogger({ runId: randomUUID().slice(0, 8) });
    const progress = new ProgressAggregator(this.onProgress);
    const startedAt = Date.now();

    try {
      if (!query.trim()) {
        throw new PlanningError('Research query must not be empty');
      }
      log.info({ query: query.slice(0, 100) }, 'Research started');

      progress.emit('planning', 'Analyzing query and creating research plan', MILESTONES.planning);
      const plan = await this.stages.planner.createPlan(query);
      const total = plan.tasks.length;
      progress.emit('planning_complete', `Created plan with ${total} research tasks`, MILESTONES.planning_complete, {
        tasks: plan.tasks,
        rationale: plan.rationale,
      });

      progress.emit('subagent_research', `Deploying ${total} research subagents`, MILESTONES.subagent_research);
      let settled = 0;
      const sink: WorkerProgressSink = {
        workerStarted: (index, agentId, task) => {
          progress.emit(
            'subagent_started',
            `Subagent ${index + 1}/${total} started: ${task}`,
            interpolatePercent(WORKER_RANGE, settled, total),
            { agentId, index },
          );
        },
        workerFinished: (index, result) => {
          settled += 1;
          progress.emit(
            'subagent_finished',
            `Subagent ${index + 1}/${total} ${result.failed ? 'failed' : 'finished'} (${settled}/${total} done)`,
            interpolatePercent(WORKER_RANGE, settled, total),
            { agentId: result.agentId, index, failed: result.failed, confidence: result.confidence },
          );
        },
      };
      const workerResults = await this.stages.coordinator.runAll(plan.tasks, sink);
      const failedSubagents = workerResults.filter((result) => result.failed).length;
      progress.emit(
        'subagent_complete',
        `Research complete: ${total - failedSubagents}/${total} subagents succeeded`,
        MILESTONES.subagent_complete,
        { failedSubagents },
      );

      progress.emit('synthesis', 'Synthesizing findings from all subagents', MILESTONES.synthesis);
      const synthesis = await this.stages.synthesizer.synthesize(query, workerResults);

      progress.emit('citation', 'Adding citations and building bibliography', MILESTONES.citation);
      const resolution = await this.stages.citations.resolve(synthesis, workerResults);

      const durationSeconds = Math.round((Date.now() - startedAt) / 100) / 10;
      const result: ResearchResult = {
        query,
        plan,
        workerResults,
        synthesis,
        citedReport: resolution.citedReport,
        bibliography: resolution.bibliography,
        metadata: {
          subagentsCount: total,
          failedSubagents,
          sourcesCount: resolution.sourceCount,
          citationCount: resolution.bibliography.length,
          bibliographySource: resolution.bibliographySource,
          durationSeconds,
        },
        createdAt: new Date().toISOString(),
      };

      progress.emit('complete', `Research complete in ${durationSeconds}s`, MILESTONES.complete, {
        sources: resolution.sourceCount,
        citations: resolution.bibliography.length,
      });
      log.info({ ...result.metadata }, 'Research finished');
      return result;
    } catch (error) {
      log.error({ error }, 'Research failed');
      progress.emit('error', `Research failed: ${errorMessage(error)}`, MILESTONES.error);
      throw error;
    }
  }
}

export interface ResearchPipelineDeps {
  client: LLMClient;
  search: SearchClient;
  onProgress?: ProgressListener;
}

/** Wire the real stages around shared generation and search clients. */
export function createResearchPipeline(config: ResearchConfig, deps: ResearchPipelineDeps): ResearchPipeline {
  const generation = config.generation;
  const worker = new ResearchWorker({ client: deps.client, search: deps.search, config });
  return new ResearchPipeline(
    {
      planner: new PlanStage(deps.client, {
        minSubagents: config.minSubagents,
        maxSubagents: config.maxSubagents,
        ...generation,
      }),
      coordinator: new WorkerCoordinator(worker, { maxParallelWorkers: config.maxParallelWorkers }),
      synthesizer: new SynthesisStage(deps.client, generation),
      citations: new CitationResolver(deps.client, generation),
    },
    deps.onProgress,
  );
}
