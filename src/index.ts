export { bootstrapResearch } from './app/bootstrap';
export type { BootstrapOptions } from './app/bootstrap';
export { parseEnv, envSchema } from './shared/config/env';
export type { AppEnv } from './shared/config/env';
export { AppError } from './shared/errors/app-error';
export type { ErrorCode } from './shared/errors/app-error';

export * from './core/llm';
export * from './core/tools/parallelSearch';
export * from './core/research/research-types';
export * from './core/research/research-errors';
export { buildResearchConfig, DEFAULT_RESEARCH_CONFIG } from './core/research/research-config';
export type { ResearchConfig } from './core/research/research-config';
export { PlanStage } from './core/research/planStage';
export { parseResearchPlan } from './core/research/planParser';
export { ResearchWorker } from './core/research/researchWorker';
export { WorkerCoordinator } from './core/research/workerCoordinator';
export { SynthesisStage } from './core/research/synthesisStage';
export { SourceRegistry } from './core/research/sourceRegistry';
export { parseBibliography, bibliographyFromSources } from './core/research/bibliographyParser';
export { CitationResolver } from './core/research/citationResolver';
export { ProgressAggregator, interpolatePercent, MILESTONES } from './core/research/progressAggregator';
export { ResearchPipeline, createResearchPipeline } from './core/research/researchPipeline';
export { formatAsMarkdown, formatAsJson, formatAsHtml } from './core/output/formatters';
export { saveResult } from './core/output/saveResult';
