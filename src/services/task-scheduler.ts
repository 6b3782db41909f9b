import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import type {
    MaintenanceRun,
    MaintenanceTaskConfig,
    MaintenanceTaskSnapshot,
} from '../types/scheduler.js';

interface MaintenanceTask {
    config: MaintenanceTaskConfig;
    cronTask: ScheduledTask | null;
    running: boolean;
    runs: number;
    skippedRuns: number;
    lastRunAt: number | null;
    lastDurationMs: number | null;
    lastError: string | null;
}

/**
 * Cron-driven maintenance passes such as job retention. A pass that is still
 * running when the next tick (or a `runNow`) arrives is skipped and counted,
 * and a throwing handler is logged without stopping its schedule.
 */
export class TaskScheduler {
    readonly #tasks: Map<string, MaintenanceTask> = new Map();
    readonly #now: () => number;

    constructor(now: () => number = Date.now) {
        this.#now = now;
    }

    register(config: MaintenanceTaskConfig): void {
        if (this.#tasks.has(config.id)) {
            throw new Error(`[TaskScheduler] Task '${config.id}' is already registered.`);
        }
        if (!cron.validate(config.cronExpression)) {
            throw new Error(
                `[TaskScheduler] Invalid cron expression for task '${config.id}': ${config.cronExpression}`,
            );
        }

        const task: MaintenanceTask = {
            config,
            cronTask: null,
            running: false,
            runs: 0,
            skippedRuns: 0,
            lastRunAt: null,
            lastDurationMs: null,
            lastError: null,
        };
        this.#tasks.set(config.id, task);

        if (config.autoStart ?? true) {
            task.cronTask = cron.schedule(config.cronExpression, async () => {
                await this.#pass(task);
            });
        }
    }

    /** Run a pass outside the schedule. */
    async runNow(taskId: string): Promise<MaintenanceRun> {
        const task = this.#tasks.get(taskId);
        if (!task) {
            throw new Error(`[TaskScheduler] Task '${taskId}' is not registered.`);
        }
        return this.#pass(task);
    }

    stopAll(): void {
        for (const task of this.#tasks.values()) {
            task.cronTask?.stop();
            task.cronTask = null;
        }
    }

    listTasks(): MaintenanceTaskSnapshot[] {
        return [...this.#tasks.values()].map((task) => ({
            id: task.config.id,
            cronExpression: task.config.cronExpression,
            description: task.config.description,
            status: task.running ? 'running' : task.cronTask ? 'idle' : 'stopped',
            runs: task.runs,
            skippedRuns: task.skippedRuns,
            lastRunAt: task.lastRunAt === null ? null : new Date(task.lastRunAt).toISOString(),
            lastDurationMs: task.lastDurationMs,
            lastError: task.lastError,
        }));
    }

    async #pass(task: MaintenanceTask): Promise<MaintenanceRun> {
        if (task.running) {
            task.skippedRuns += 1;
            return { ran: false };
        }

        task.running = true;
        const startedAt = this.#now();
        let error: string | null = null;
        try {
            await task.config.handler();
        } catch (err: unknown) {
            error = err instanceof Error ? err.message : String(err);
            await logThought(`[TaskScheduler] Task '${task.config.id}' failed: ${error}`);
        } finally {
            task.running = false;
        }

        const durationMs = this.#now() - startedAt;
        task.runs += 1;
        task.lastRunAt = startedAt;
        task.lastDurationMs = durationMs;
        task.lastError = error;
        return { ran: true, durationMs, error };
    }
}
