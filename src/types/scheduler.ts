export type MaintenanceTaskStatus = 'idle' | 'running' | 'stopped';

export interface MaintenanceTaskConfig {
    /** e.g. 'job-retention' */
    id: string;
    /** node-cron format. */
    cronExpression: string;
    description: string;
    handler: () => Promise<void> | void;
    /** Schedule on registration. @default true */
    autoStart?: boolean;
}

/** Outcome of one pass; `ran` is false when a previous pass was still running. */
export type MaintenanceRun =
    | { ran: true; durationMs: number; error: string | null }
    | { ran: false };

export interface MaintenanceTaskSnapshot {
    id: string;
    cronExpression: string;
    description: string;
    status: MaintenanceTaskStatus;
    runs: number;
    skippedRuns: number;
    lastRunAt: string | null;
    lastDurationMs: number | null;
    lastError: string | null;
}
