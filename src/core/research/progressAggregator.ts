import { logger } from '../../shared/logging/logger';
import { ProgressListener, ProgressPhase, ProgressUpdate } from './research-types';

export type PercentRange = readonly [start: number, end: number];

/** Phase milestones, in percent. Workers report inside `WORKER_RANGE`. */
export const MILESTONES = {
  planning: 10,
  planning_complete: 20,
  subagent_research: 25,
  subagent_complete: 70,
  synthesis: 75,
  citation: 90,
  complete: 100,
  error: 0,
} as const;

export const WORKER_RANGE: PercentRange = [MILESTONES.subagent_research, MILESTONES.subagent_complete];

export function clampPercent(percent: number): number {
  if (!Number.isFinite(percent)) return 0;
  return Math.min(100, Math.max(0, Math.round(percent)));
}

/** Map `completed / total` sub-progress into a percent range. */
export function interpolatePercent(range: PercentRange, completed: number, total: number): number {
  const [start, end] = range;
  if (total <= 0) return clampPercent(end);
  const fraction = Math.min(1, Math.max(0, completed / total));
  return clampPercent(start + (end - start) * fraction);
}

export const logProgress: ProgressListener = (update) => {
  logger.info({ phase: update.phase, percent: update.percent, details: update.details }, update.message);
};

/**
 * Push-only progress stream for one pipeline run.
 *
 * Regressions are logged, never reordered or dropped. A throwing listener is logged and ignored.
 */
export class ProgressAggregator {
  private last = 0;

  constructor(private readonly listener: ProgressListener = logProgress) {}

  get lastPercent(): number {
    return this.last;
  }

  emit(phase: ProgressPhase, message: string, percent: number, details?: Record<string, unknown>): ProgressUpdate {
    const update: ProgressUpdate = { phase, message, percent: clampPercent(percent) };
    if (details) update.details = details;

    if (phase !== 'error' && update.percent < this.last) {
      logger.warn({ phase, percent: update.percent, lastPercent: this.last }, 'Progress regressed');
    }
    this.last = update.percent;

    try {
      this.listener(update);
    } catch (error) {
      logger.error({ error, phase }, 'Progress listener threw');
    }
    return update;
  }
}
