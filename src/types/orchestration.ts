import type { AgentName, AgentResult } from './agents.js';

export type JobStatus = 'PENDING' | 'RUNNING' | 'COMPLETED' | 'PARTIAL' | 'FAILED';

export type AgentTaskStatus =
  | 'QUEUED'
  | 'RUNNING'
  | 'SUCCEEDED'
  | 'FAILED'
  | 'FALLBACK_USED'
  | 'TIMED_OUT';

/** Source of the data behind a task outcome. Null until the task starts. */
export type TaskSource = 'LIVE' | 'FALLBACK';

export type AgentTaskErrorCode =
  | 'AGENT_TIMEOUT'
  | 'AGENT_UPSTREAM_ERROR'
  | 'AGENT_INVALID_INPUT'
  | 'AGENT_INTERNAL_ERROR';

export type CompositeStatus = 'COMPLETE' | 'PARTIAL' | 'FAILED';

export type AnalysisType = 'comprehensive' | 'patent_focus' | 'clinical_focus' | 'market_focus';

export interface AgentTaskError {
  code: AgentTaskErrorCode;
  message: string;
}

export interface AgentTask {
  agent: AgentName;
  subStatus: AgentTaskStatus;
  source: TaskSource | null;
  startedAt: string | null;
  finishedAt: string | null;
  result: AgentResult | null;
  error: AgentTaskError | null;
}

/** Partial write applied to one task by the dispatcher. */
export type AgentTaskUpdate = Pick<AgentTask, 'subStatus'> & Partial<Omit<AgentTask, 'agent' | 'subStatus'>>;

export interface JobErrorEntry {
  agent: AgentName;
  code: AgentTaskErrorCode;
  message: string;
  at: string;
}

export type ReportEntry =
  | {
    outcome: 'result';
    subStatus: 'SUCCEEDED' | 'FALLBACK_USED';
    source: TaskSource;
    result: AgentResult;
  }
  | {
    outcome: 'failure';
    subStatus: 'FAILED' | 'TIMED_OUT';
    source: TaskSource | null;
    error: AgentTaskError;
  };

export interface Report {
  jobId: string;
  query: string;
  compositeStatus: CompositeStatus;
  /** (succeeded + fallback-used) / requested, in [0, 1]. */
  coverageRatio: number;
  requested: number;
  succeeded: number;
  failed: number;
  agents: Partial<Record<AgentName, ReportEntry>>;
  summary: string;
  generatedAt: string;
}

export interface JobSnapshot {
  id: string;
  query: string;
  analysisType: AnalysisType;
  requestedAgents: AgentName[];
  status: JobStatus;
  createdAt: string;
  updatedAt: string;
  deadlineAt: string;
  tasks: AgentTask[];
  report: Report | null;
  errors: JobErrorEntry[];
}

export interface CreateJobInput {
  query: string;
  analysisType: AnalysisType;
  agents: AgentName[];
  deadlineAt: string;
}

export type TaskUpdateOutcome =
  | { accepted: true }
  | { accepted: false; reason: 'LATE_UPDATE' | 'UNKNOWN_JOB' | 'UNKNOWN_TASK' };

export interface JobStatusView {
  jobId: string;
  status: JobStatus;
  perAgent: Array<{ name: AgentName; subStatus: AgentTaskStatus; source: TaskSource | null }>;
  progressFraction: number;
}

export interface SubmitOptions {
  agents?: string[];
  analysisType?: string;
  agentOptions?: Record<string, unknown>;
}

export interface GcQuery {
  /** Terminal jobs created before `now - olderThanMs` are eligible. */
  olderThanMs: number;
  /** When more jobs are held, the oldest terminal jobs beyond this count are eligible. */
  maxJobs: number;
  now?: number;
}
