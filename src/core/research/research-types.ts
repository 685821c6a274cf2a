export type Confidence = 'low' | 'medium' | 'high';

export interface ResearchPlan {
  tasks: string[];
  rationale: string;
  estimatedDurationSec?: number;
}

export interface WorkerSuccess {
  status: 'success';
  agentId: string;
  task: string;
  summary: string;
  findings: string;
  sources: string[];
  confidence: Confidence;
  toolCalls: number;
  rounds: number;
  durationMs: number;
}

export interface WorkerFailure {
  status: 'failure';
  agentId: string;
  task: string;
  reason: string;
  durationMs: number;
}

export type WorkerOutcome = WorkerSuccess | WorkerFailure;

/** Flattened per-task record consumed by synthesis, citation and output. */
export interface WorkerResult {
  agentId: string;
  task: string;
  summary: string;
  findings: string;
  sources: string[];
  confidence: Confidence;
  failed: boolean;
  durationMs?: number;
}

export interface Citation {
  /** 1-based position in the bibliography. */
  index: number;
  title: string;
  url: string;
  accessedDate: string;
  excerpt?: string;
}

export type BibliographySource = 'parsed' | 'registry';

export interface CitationResolution {
  citedReport: string;
  bibliography: Citation[];
  sourceCount: number;
  bibliographySource: BibliographySource;
}

export interface ResearchMetadata {
  subagentsCount: number;
  failedSubagents: number;
  sourcesCount: number;
  citationCount: number;
  bibliographySource: BibliographySource;
  durationSeconds: number;
}

export interface ResearchResult {
  query: string;
  plan: ResearchPlan;
  workerResults: WorkerResult[];
  synthesis: string;
  citedReport: string;
  bibliography: Citation[];
  metadata: ResearchMetadata;
  /** ISO-8601 timestamp. */
  createdAt: string;
}

export type ProgressPhase =
  | 'planning'
  | 'planning_complete'
  | 'subagent_research'
  | 'subagent_started'
  | 'subagent_finished'
  | 'subagent_complete'
  | 'synthesis'
  | 'citation'
  | 'complete'
  | 'error';

export interface ProgressUpdate {
  phase: ProgressPhase;
  message: string;
  /** Integer in [0, 100]. */
  percent: number;
  details?: Record<string, unknown>;
}

export type ProgressListener = (update: ProgressUpdate) => void;

/** Receives worker lifecycle events from the coordinator. */
export interface WorkerProgressSink {
  workerStarted(index: number, agentId: string, task: string): void;
  workerFinished(index: number, result: WorkerResult): void;
}

export function toWorkerResult(outcome: WorkerOutcome): WorkerResult {
  if (outcome.status === 'success') {
    return {
      agentId: outcome.agentId,
      task: outcome.task,
      summary: outcome.summary,
      findings: outcome.findings,
      sources: outcome.sources,
      confidence: outcome.confidence,
      failed: false,
      durationMs: outcome.durationMs,
    };
  }
  return {
    agentId: outcome.agentId,
    task: outcome.task,
    summary: `Failed: ${outcome.reason}`,
    findings: `Error: ${outcome.reason}`,
    sources: [],
    confidence: 'low',
    failed: true,
    durationMs: outcome.durationMs,
  };
}
