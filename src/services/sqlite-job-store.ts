import type { AgentName, AgentResult } from '../types/agents.js';
import type {
  AgentTask,
  AgentTaskError,
  AgentTaskStatus,
  AgentTaskUpdate,
  AnalysisType,
  CreateJobInput,
  GcQuery,
  JobErrorEntry,
  JobSnapshot,
  JobStatus,
  Report,
  TaskSource,
  TaskUpdateOutcome,
} from '../types/orchestration.js';
import type { SqliteDatabase } from './db.js';
import {
  applyFinalReport,
  applyTaskUpdate,
  buildJobRecord,
  emptyStatusCounts,
  selectGcEligible,
  type JobStateStore,
} from './job-store.js';

interface JobRow {
  id: string;
  query: string;
  analysis_type: AnalysisType;
  requested_agents_json: string;
  status: JobStatus;
  created_at: string;
  updated_at: string;
  deadline_at: string;
  report_json: string | null;
}

interface TaskRow {
  agent: AgentName;
  sub_status: AgentTaskStatus;
  source: TaskSource | null;
  started_at: string | null;
  finished_at: string | null;
  result_json: string | null;
  error_json: string | null;
}

interface ErrorRow {
  agent: AgentName;
  code: JobErrorEntry['code'];
  message: string;
  at: string;
}

function parseJson<T>(text: string): T {
  return JSON.parse(text);
}

function parseNullableJson<T>(text: string | null): T | null {
  return text === null ? null : parseJson<T>(text);
}

/**
 * better-sqlite3 backed job store. Each write runs in one transaction and
 * better-sqlite3 is synchronous, so readers only ever see committed jobs.
 */
export class SqliteJobStore implements JobStateStore {
  readonly #db: SqliteDatabase;

  constructor(db: SqliteDatabase) {
    this.#db = db;
  }

  create(input: CreateJobInput): JobSnapshot {
    const job = buildJobRecord(input);
    const insertJob = this.#db.prepare(`
      INSERT INTO jobs (id, query, analysis_type, requested_agents_json, status, created_at, updated_at, deadline_at, report_json)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, NULL)
    `);
    const insertTask = this.#db.prepare(`
      INSERT INTO agent_tasks (job_id, agent, position, sub_status)
      VALUES (?, ?, ?, ?)
    `);

    this.#db.transaction(() => {
      insertJob.run(
        job.id,
        job.query,
        job.analysisType,
        JSON.stringify(job.requestedAgents),
        job.status,
        job.createdAt,
        job.updatedAt,
        job.deadlineAt,
      );
      job.tasks.forEach((task, position) => {
        insertTask.run(job.id, task.agent, position, task.subStatus);
      });
    })();

    return job;
  }

  markRunning(jobId: string): boolean {
    const result = this.#db
      .prepare(`UPDATE jobs SET status = 'RUNNING', updated_at = ? WHERE id = ? AND status = 'PENDING'`)
      .run(new Date().toISOString(), jobId);
    return result.changes > 0;
  }

  recordTaskUpdate(jobId: string, agent: AgentName, update: AgentTaskUpdate): TaskUpdateOutcome {
    return this.#db.transaction((): TaskUpdateOutcome => {
      const job = this.#load(jobId);
      if (!job) {
        return { accepted: false, reason: 'UNKNOWN_JOB' };
      }

      const knownErrors = job.errors.length;
      const outcome = applyTaskUpdate(job, agent, update);
      if (!outcome.accepted) {
        return outcome;
      }

      const task = job.tasks.find((candidate) => candidate.agent === agent);
      if (task) {
        this.#saveTask(jobId, task);
      }
      for (const entry of job.errors.slice(knownErrors)) {
        this.#db
          .prepare(`INSERT INTO job_errors (job_id, agent, code, message, at) VALUES (?, ?, ?, ?, ?)`)
          .run(jobId, entry.agent, entry.code, entry.message, entry.at);
      }
      this.#db.prepare(`UPDATE jobs SET updated_at = ? WHERE id = ?`).run(job.updatedAt, jobId);
      return outcome;
    })();
  }

  get(jobId: string): JobSnapshot | undefined {
    return this.#db.transaction(() => this.#load(jobId))();
  }

  setFinalReport(jobId: string, report: Report): JobSnapshot {
    return this.#db.transaction((): JobSnapshot => {
      const job = this.#load(jobId);
      if (!job) {
        throw new Error(`[JobStore] Job ${jobId} not found.`);
      }
      applyFinalReport(job, report);
      this.#db
        .prepare(`UPDATE jobs SET status = ?, report_json = ?, updated_at = ? WHERE id = ?`)
        .run(job.status, JSON.stringify(job.report), job.updatedAt, jobId);
      return job;
    })();
  }

  listByStatus(status: JobStatus): JobSnapshot[] {
    return this.#db.transaction(() => {
      const ids = this.#db
        .prepare<[string], { id: string }>(`SELECT id FROM jobs WHERE status = ? ORDER BY created_at ASC`)
        .all(status);
      return ids
        .map((row) => this.#load(row.id))
        .filter((job): job is JobSnapshot => !!job);
    })();
  }

  countByStatus(): Record<JobStatus, number> {
    const counts = emptyStatusCounts();
    const rows = this.#db
      .prepare<[], { status: JobStatus; total: number }>(`SELECT status, COUNT(*) AS total FROM jobs GROUP BY status`)
      .all();
    for (const row of rows) {
      counts[row.status] = row.total;
    }
    return counts;
  }

  listGcEligible(query: GcQuery): string[] {
    const rows = this.#db.prepare<[], JobRow>(`SELECT * FROM jobs`).all();
    return selectGcEligible(rows.map((row) => this.#hydrate(row, [], [])), query);
  }

  delete(jobId: string): boolean {
    return this.#db.prepare(`DELETE FROM jobs WHERE id = ?`).run(jobId).changes > 0;
  }

  #load(jobId: string): JobSnapshot | undefined {
    const row = this.#db.prepare<[string], JobRow>(`SELECT * FROM jobs WHERE id = ?`).get(jobId);
    if (!row) {
      return undefined;
    }
    const tasks = this.#db
      .prepare<[string], TaskRow>(`
        SELECT agent, sub_status, source, started_at, finished_at, result_json, error_json
        FROM agent_tasks WHERE job_id = ? ORDER BY position ASC
      `)
      .all(jobId);
    const errors = this.#db
      .prepare<[string], ErrorRow>(`SELECT agent, code, message, at FROM job_errors WHERE job_id = ? ORDER BY id ASC`)
      .all(jobId);
    return this.#hydrate(row, tasks, errors);
  }

  #hydrate(row: JobRow, tasks: TaskRow[], errors: ErrorRow[]): JobSnapshot {
    return {
      id: row.id,
      query: row.query,
      analysisType: row.analysis_type,
      requestedAgents: parseJson<AgentName[]>(row.requested_agents_json),
      status: row.status,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      deadlineAt: row.deadline_at,
      tasks: tasks.map((task): AgentTask => ({
        agent: task.agent,
        subStatus: task.sub_status,
        source: task.source,
        startedAt: task.started_at,
        finishedAt: task.finished_at,
        result: parseNullableJson<AgentResult>(task.result_json),
        error: parseNullableJson<AgentTaskError>(task.error_json),
      })),
      report: parseNullableJson<Report>(row.report_json),
      errors: errors.map((entry) => ({ ...entry })),
    };
  }

  #saveTask(jobId: string, task: AgentTask): void {
    this.#db
      .prepare(`
        UPDATE agent_tasks
        SET sub_status = ?, source = ?, started_at = ?, finished_at = ?, result_json = ?, error_json = ?
        WHERE job_id = ? AND agent = ?
      `)
      .run(
        task.subStatus,
        task.source,
        task.startedAt,
        task.finishedAt,
        task.result === null ? null : JSON.stringify(task.result),
        task.error === null ? null : JSON.stringify(task.error),
        jobId,
        task.agent,
      );
  }
}
