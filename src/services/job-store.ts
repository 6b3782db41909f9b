import { randomUUID } from 'node:crypto';
import type { AgentName } from '../types/agents.js';
import type {
    AgentTask,
    AgentTaskStatus,
    AgentTaskUpdate,
    CompositeStatus,
    CreateJobInput,
    GcQuery,
    JobSnapshot,
    JobStatus,
    Report,
    TaskUpdateOutcome,
} from '../types/orchestration.js';
import { logThought } from '../utils/logger.js';

export const JOB_STATUSES: readonly JobStatus[] = ['PENDING', 'RUNNING', 'COMPLETED', 'PARTIAL', 'FAILED'];

const TERMINAL_TASK_STATUSES: ReadonlySet<AgentTaskStatus> = new Set([
    'SUCCEEDED',
    'FAILED',
    'FALLBACK_USED',
    'TIMED_OUT',
]);

const JOB_STATUS_BY_COMPOSITE: Record<CompositeStatus, JobStatus> = {
    COMPLETE: 'COMPLETED',
    PARTIAL: 'PARTIAL',
    FAILED: 'FAILED',
};

export function emptyStatusCounts(): Record<JobStatus, number> {
    return { PENDING: 0, RUNNING: 0, COMPLETED: 0, PARTIAL: 0, FAILED: 0 };
}

export function isTerminalTaskStatus(status: AgentTaskStatus): boolean {
    return TERMINAL_TASK_STATUSES.has(status);
}

export function isTerminalJobStatus(status: JobStatus): boolean {
    return status === 'COMPLETED' || status === 'PARTIAL' || status === 'FAILED';
}

export function jobStatusForComposite(status: CompositeStatus): JobStatus {
    return JOB_STATUS_BY_COMPOSITE[status];
}

/**
 * Storage contract for job records.
 *
 * Every method is synchronous and applies its whole write before returning,
 * so a reader can never observe half of an update. Reads return copies.
 */
export interface JobStateStore {
    create(input: CreateJobInput): JobSnapshot;
    /** PENDING -> RUNNING. Returns false when the job is missing or already past PENDING. */
    markRunning(jobId: string): boolean;
    recordTaskUpdate(jobId: string, agent: AgentName, update: AgentTaskUpdate): TaskUpdateOutcome;
    get(jobId: string): JobSnapshot | undefined;
    /** Writes the report and the matching terminal status together. Throws if the job cannot accept it. */
    setFinalReport(jobId: string, report: Report): JobSnapshot;
    listByStatus(status: JobStatus): JobSnapshot[];
    countByStatus(): Record<JobStatus, number>;
    /** Ids of terminal jobs that a retention policy may evict, oldest first. */
    listGcEligible(query: GcQuery): string[];
    /** Reserved for the retention sweeper; the orchestrator never deletes jobs. */
    delete(jobId: string): boolean;
}

export function buildJobRecord(input: CreateJobInput, now = new Date()): JobSnapshot {
    const timestamp = now.toISOString();
    return {
        id: randomUUID(),
        query: input.query,
        analysisType: input.analysisType,
        requestedAgents: [...input.agents],
        status: 'PENDING',
        createdAt: timestamp,
        updatedAt: timestamp,
        deadlineAt: input.deadlineAt,
        tasks: input.agents.map((agent): AgentTask => ({
            agent,
            subStatus: 'QUEUED',
            source: null,
            startedAt: null,
            finishedAt: null,
            result: null,
            error: null,
        })),
        report: null,
        errors: [],
    };
}

/**
 * Apply a task update to a job record in place. Shared by every store so the
 * terminal-task rule is enforced identically.
 */
export function applyTaskUpdate(
    job: JobSnapshot,
    agent: AgentName,
    update: AgentTaskUpdate,
    now = new Date(),
): TaskUpdateOutcome {
    const task = job.tasks.find((candidate) => candidate.agent === agent);
    if (!task) {
        return { accepted: false, reason: 'UNKNOWN_TASK' };
    }

    if (isTerminalTaskStatus(task.subStatus) || isTerminalJobStatus(job.status)) {
        void logThought(
            `[JobStore] LATE_UPDATE rejected for job ${job.id} agent '${agent}': task already ${task.subStatus}, attempted ${update.subStatus}.`,
        );
        return { accepted: false, reason: 'LATE_UPDATE' };
    }

    const timestamp = now.toISOString();
    const next: AgentTask = { ...task, ...update, agent };
    if (next.subStatus === 'RUNNING' && !next.startedAt) {
        next.startedAt = timestamp;
    }
    if (isTerminalTaskStatus(next.subStatus) && !next.finishedAt) {
        next.finishedAt = timestamp;
    }

    const index = job.tasks.indexOf(task);
    job.tasks[index] = next;
    job.updatedAt = timestamp;

    if (isTerminalTaskStatus(next.subStatus) && next.error) {
        job.errors.push({ agent, code: next.error.code, message: next.error.message, at: timestamp });
    }

    return { accepted: true };
}

/** Validate and apply the final report in place. */
export function applyFinalReport(job: JobSnapshot, report: Report, now = new Date()): void {
    if (job.status !== 'RUNNING') {
        throw new Error(`[JobStore] Job ${job.id} cannot accept a report while ${job.status}.`);
    }

    const pending = job.tasks.filter((task) => !isTerminalTaskStatus(task.subStatus));
    if (pending.length > 0) {
        throw new Error(
            `[JobStore] Job ${job.id} still has non-terminal tasks: ${pending.map((task) => task.agent).join(', ')}.`,
        );
    }

    job.report = report;
    job.status = jobStatusForComposite(report.compositeStatus);
    job.updatedAt = now.toISOString();
}

export function selectGcEligible(jobs: JobSnapshot[], query: GcQuery): string[] {
    const now = query.now ?? Date.now();
    const cutoff = now - query.olderThanMs;
    const terminal = jobs
        .filter((job) => isTerminalJobStatus(job.status))
        .sort((left, right) => Date.parse(left.createdAt) - Date.parse(right.createdAt));

    const aged = terminal.filter((job) => Date.parse(job.createdAt) < cutoff);
    const agedIds = new Set(aged.map((job) => job.id));
    const excess = Math.max(0, jobs.length - aged.length - Math.max(0, query.maxJobs));
    const overflow = terminal.filter((job) => !agedIds.has(job.id)).slice(0, excess);

    return [...aged, ...overflow].map((job) => job.id);
}

/** Process-local store. Writes mutate one Map entry; reads hand out deep copies. */
export class InMemoryJobStore implements JobStateStore {
    readonly #jobs: Map<string, JobSnapshot> = new Map();

    create(input: CreateJobInput): JobSnapshot {
        const job = buildJobRecord(input);
        this.#jobs.set(job.id, job);
        return structuredClone(job);
    }

    markRunning(jobId: string): boolean {
        const job = this.#jobs.get(jobId);
        if (!job || job.status !== 'PENDING') {
            return false;
        }
        job.status = 'RUNNING';
        job.updatedAt = new Date().toISOString();
        return true;
    }

    recordTaskUpdate(jobId: string, agent: AgentName, update: AgentTaskUpdate): TaskUpdateOutcome {
        const job = this.#jobs.get(jobId);
        if (!job) {
            return { accepted: false, reason: 'UNKNOWN_JOB' };
        }
        return applyTaskUpdate(job, agent, structuredClone(update));
    }

    get(jobId: string): JobSnapshot | undefined {
        const job = this.#jobs.get(jobId);
        return job ? structuredClone(job) : undefined;
    }

    setFinalReport(jobId: string, report: Report): JobSnapshot {
        const job = this.#jobs.get(jobId);
        if (!job) {
            throw new Error(`[JobStore] Job ${jobId} not found.`);
        }
        applyFinalReport(job, structuredClone(report));
        return structuredClone(job);
    }

    listByStatus(status: JobStatus): JobSnapshot[] {
        return [...this.#jobs.values()]
            .filter((job) => job.status === status)
            .map((job) => structuredClone(job));
    }

    countByStatus(): Record<JobStatus, number> {
        const counts = emptyStatusCounts();
        for (const job of this.#jobs.values()) {
            counts[job.status] += 1;
        }
        return counts;
    }

    listGcEligible(query: GcQuery): string[] {
        return selectGcEligible([...this.#jobs.values()], query);
    }

    delete(jobId: string): boolean {
        return this.#jobs.delete(jobId);
    }
}
