import { AppError } from '../../shared/errors/app-error';

/** Plan generation failed. Fatal to the run. */
export class PlanningError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('PLANNING_FAILED', message, cause);
    this.name = 'PlanningError';
  }
}

/** Worker failure. Always recovered into a degraded result by the worker or the coordinator. */
export class WorkerError extends AppError {
  constructor(
    public readonly agentId: string,
    message: string,
    cause?: unknown,
  ) {
    super('WORKER_FAILED', message, cause, { agentId });
    this.name = 'WorkerError';
  }
}

export class SynthesisError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('SYNTHESIS_FAILED', message, cause);
    this.name = 'SynthesisError';
  }
}

export class CitationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('CITATION_FAILED', message, cause);
    this.name = 'CitationError';
  }
}
