import { ANALYSIS_PRESETS, isAnalysisType } from '../agents/catalog.js';
import { AGENT_NAMES, isAgentName, type AgentName } from '../types/agents.js';
import type { CircuitSnapshot } from '../types/circuit-breaker.js';
import type {
  AnalysisType,
  JobSnapshot,
  JobStatus,
  JobStatusView,
  Report,
  SubmitOptions,
} from '../types/orchestration.js';
import { OrchestrationError, errorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import { clampTimerMs } from '../utils/retry.js';
import type { AgentRegistry } from './agent-registry.js';
import { ReportAggregator } from './aggregator.js';
import type { CircuitBreakerRegistry } from './circuit-breaker.js';
import { AgentDispatcher } from './dispatcher.js';
import { isTerminalJobStatus, isTerminalTaskStatus, type JobStateStore } from './job-store.js';
import type { LiveResultCache } from './result-cache.js';

const DEFAULT_JOB_DEADLINE_MS = 30_000;
const DEFAULT_MAX_QUERY_LENGTH = 500;

export interface OrchestratorOptions {
  store: JobStateStore;
  registry: AgentRegistry;
  breakers: CircuitBreakerRegistry;
  cache?: LiveResultCache;
  jobDeadlineMs?: number;
  maxQueryLength?: number;
  /** Subset used when a submission names neither agents nor an analysis type. */
  defaultAgents?: readonly AgentName[];
}

export interface OrchestratorDiagnostics {
  breakers: CircuitSnapshot[];
  jobs: Record<JobStatus, number>;
  inFlight: number;
}

interface InFlightJob {
  controller: AbortController;
  settled: Promise<void>;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Public entry point of the engine: accepts queries, owns the job lifecycle
 * `PENDING -> RUNNING -> COMPLETED | PARTIAL | FAILED` and answers status and
 * result lookups. Never throws out of a running job; failures degrade the job.
 */
export class Orchestrator {
  readonly #store: JobStateStore;
  readonly #registry: AgentRegistry;
  readonly #breakers: CircuitBreakerRegistry;
  readonly #dispatcher: AgentDispatcher;
  readonly #aggregator = new ReportAggregator();
  readonly #jobDeadlineMs: number;
  readonly #maxQueryLength: number;
  readonly #defaultAgents: readonly AgentName[];
  readonly #inFlight: Map<string, InFlightJob> = new Map();

  constructor(options: OrchestratorOptions) {
    this.#store = options.store;
    this.#registry = options.registry;
    this.#breakers = options.breakers;
    this.#dispatcher = new AgentDispatcher({
      registry: options.registry,
      breakers: options.breakers,
      store: options.store,
      cache: options.cache,
    });
    this.#jobDeadlineMs = Math.max(1, clampTimerMs(options.jobDeadlineMs ?? DEFAULT_JOB_DEADLINE_MS));
    this.#maxQueryLength = Math.max(1, options.maxQueryLength ?? DEFAULT_MAX_QUERY_LENGTH);
    this.#defaultAgents = options.defaultAgents && options.defaultAgents.length > 0
      ? [...options.defaultAgents]
      : [...AGENT_NAMES];
  }

  /**
   * Validate and enqueue a query. Returns the job id once the job exists and
   * its agents have been dispatched; the job itself settles in the background.
   */
  submit(query: unknown, options: SubmitOptions = {}): string {
    if (typeof query !== 'string' || !query.trim()) {
      throw new OrchestrationError('INVALID_QUERY', 'Query must be a non-empty string.');
    }
    const trimmed = query.trim();
    if (trimmed.length > this.#maxQueryLength) {
      throw new OrchestrationError(
        'INVALID_QUERY',
        `Query is ${trimmed.length} characters long; the maximum is ${this.#maxQueryLength}.`,
      );
    }
    if (options.agentOptions !== undefined && !isPlainObject(options.agentOptions)) {
      throw new OrchestrationError('INVALID_QUERY', 'agentOptions must be an object.');
    }

    const analysisType = this.#resolveAnalysisType(options.analysisType);
    const agents = this.#resolveAgents(options.agents, options.analysisType === undefined ? undefined : analysisType);

    const job = this.#store.create({
      query: trimmed,
      analysisType,
      agents,
      deadlineAt: new Date(Date.now() + this.#jobDeadlineMs).toISOString(),
    });

    const controller = new AbortController();
    const settled = this.#run(job, options.agentOptions ?? {}, controller.signal)
      .catch((error: unknown) => {
        void logThought(`[Orchestrator] Job ${job.id} pipeline failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.#inFlight.delete(job.id);
      });
    this.#inFlight.set(job.id, { controller, settled });

    void logThought(
      `[Orchestrator] Accepted job ${job.id} (${analysisType}) for '${trimmed}' with agents: ${agents.join(', ')}.`,
    );
    return job.id;
  }

  status(jobId: string): JobStatusView {
    const job = this.#require(jobId);
    const terminal = job.tasks.filter((task) => isTerminalTaskStatus(task.subStatus)).length;
    return {
      jobId: job.id,
      status: job.status,
      perAgent: job.tasks.map((task) => ({ name: task.agent, subStatus: task.subStatus, source: task.source })),
      progressFraction: job.tasks.length === 0 ? 0 : terminal / job.tasks.length,
    };
  }

  result(jobId: string): Report {
    const job = this.#require(jobId);
    if (!isTerminalJobStatus(job.status) || !job.report) {
      throw new OrchestrationError('NOT_READY', `Job ${jobId} is still ${job.status}.`);
    }
    return job.report;
  }

  /** Resolves with the job snapshot once its pipeline has finished. */
  async waitForSettlement(jobId: string): Promise<JobSnapshot> {
    const inFlight = this.#inFlight.get(jobId);
    if (inFlight) {
      await inFlight.settled;
    }
    return this.#require(jobId);
  }

  diagnostics(): OrchestratorDiagnostics {
    return {
      breakers: this.#breakers.snapshots(this.#registry.names()),
      jobs: this.#store.countByStatus(),
      inFlight: this.#inFlight.size,
    };
  }

  /** Cancel every running dispatch; each job still settles with TIMED_OUT tasks. */
  async shutdown(): Promise<void> {
    const running = [...this.#inFlight.values()];
    for (const job of running) {
      job.controller.abort();
    }
    await Promise.allSettled(running.map((job) => job.settled));
    if (running.length > 0) {
      void logThought(`[Orchestrator] Shutdown settled ${running.length} in-flight job(s).`);
    }
  }

  async #run(job: JobSnapshot, agentOptions: Record<string, unknown>, signal: AbortSignal): Promise<void> {
    if (!this.#store.markRunning(job.id)) {
      throw new Error(`Job ${job.id} could not move from PENDING to RUNNING.`);
    }

    const outcome = await this.#dispatcher.dispatch({
      jobId: job.id,
      query: job.query,
      agents: job.requestedAgents,
      options: agentOptions,
      deadlineAt: Date.parse(job.deadlineAt),
      signal,
    });

    const settledJob = this.#require(job.id);
    const report = this.#aggregator.aggregate(settledJob);
    const finalJob = this.#store.setFinalReport(job.id, report);

    void logThought(
      `[Orchestrator] Job ${job.id} ${finalJob.status} (${outcome.settledBy}): coverage ${report.succeeded}/${report.requested}.`,
    );
  }

  #resolveAnalysisType(value: string | undefined): AnalysisType {
    if (value === undefined) {
      return 'comprehensive';
    }
    if (!isAnalysisType(value)) {
      throw new OrchestrationError('INVALID_QUERY', `Unknown analysis type '${value}'.`);
    }
    return value;
  }

  #resolveAgents(requested: unknown, analysisType: AnalysisType | undefined): AgentName[] {
    if (requested === undefined) {
      return [...(analysisType ? ANALYSIS_PRESETS[analysisType] : this.#defaultAgents)];
    }
    if (!Array.isArray(requested) || requested.length === 0) {
      throw new OrchestrationError('INVALID_QUERY', 'agents must be a non-empty list of agent names.');
    }

    const agents: AgentName[] = [];
    for (const name of requested) {
      if (typeof name !== 'string' || !isAgentName(name) || !this.#registry.has(name)) {
        throw new OrchestrationError('INVALID_QUERY', `Unknown agent '${String(name)}'.`);
      }
      if (!agents.includes(name)) {
        agents.push(name);
      }
    }
    return agents;
  }

  #require(jobId: string): JobSnapshot {
    const job = this.#store.get(jobId);
    if (!job) {
      throw new OrchestrationError('NOT_FOUND', `Job ${jobId} not found.`);
    }
    return job;
  }
}
