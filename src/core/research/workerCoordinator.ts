import { limitConcurrency } from '../utils/concurrency';
import { logger } from '../../shared/logging/logger';
import { errorMessage } from '../../shared/errors/app-error';
import { toWorkerResult, WorkerOutcome, WorkerProgressSink, WorkerResult } from './research-types';

/** Anything that can execute one task in isolation. */
export interface TaskExecutor {
  execute(task: string, agentId: string): Promise<WorkerOutcome>;
}

export interface WorkerCoordinatorOptions {
  maxParallelWorkers: number;
}

export function agentIdFor(index: number): string {
  return `subagent_${index}`;
}

/**
 * Fans tasks out to workers through a bounded pool and joins every result in task order.
 */
export class WorkerCoordinator {
  constructor(
    private readonly worker: TaskExecutor,
    private readonly options: WorkerCoordinatorOptions,
  ) {}

  /**
   * Resolves once every worker has settled. `result[i].task === tasks[i]`; failures are degraded
   * results, never rejections.
   */
  async runAll(tasks: string[], progress?: WorkerProgressSink): Promise<WorkerResult[]> {
    const runWithLimit = limitConcurrency(this.options.maxParallelWorkers);
    logger.info(
      { workers: tasks.length, maxParallel: this.options.maxParallelWorkers },
      'Dispatching research workers',
    );

    const runOne = async (task: string, index: number): Promise<WorkerResult> => {
      const agentId = agentIdFor(index);
      const startedAt = Date.now();
      let outcome: WorkerOutcome;
      try {
        outcome = await runWithLimit(() => {
          progress?.workerStarted(index, agentId, task);
          return this.worker.execute(task, agentId);
        });
      } catch (error) {
        logger.error({ agentId, error }, 'Worker rejected outside its isolation boundary');
        outcome = { status: 'failure', agentId, task, reason: errorMessage(error), durationMs: Date.now() - startedAt };
      }

      const result = toWorkerResult(outcome);
      progress?.workerFinished(index, result);
      return result;
    };

    const results = await Promise.all(tasks.map((task, index) => runOne(task, index)));
    const failed = results.filter((result) => result.failed).length;
    logger.info({ workers: results.length, failed }, 'Research workers joined');
    return results;
  }
}
