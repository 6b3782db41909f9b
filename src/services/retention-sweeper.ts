import { logThought } from '../utils/logger.js';
import type { JobStateStore } from './job-store.js';

export interface RetentionPolicy {
    /** Finished jobs created longer ago than this are evicted. */
    maxAgeMs: number;
    /** Jobs beyond this count are evicted oldest-finished first. */
    maxJobs: number;
}

export interface SweepResult {
    evicted: string[];
    sweptAt: string;
}

/**
 * Evicts finished jobs from the store. It is the only caller of
 * `JobStateStore.delete`; running jobs are never eligible.
 */
export class RetentionSweeper {
    readonly #store: JobStateStore;
    readonly #policy: RetentionPolicy;
    readonly #now: () => number;

    constructor(store: JobStateStore, policy: RetentionPolicy, now: () => number = Date.now) {
        this.#store = store;
        this.#policy = {
            maxAgeMs: Math.max(0, policy.maxAgeMs),
            maxJobs: Math.max(0, policy.maxJobs),
        };
        this.#now = now;
    }

    sweep(): SweepResult {
        const now = this.#now();
        const eligible = this.#store.listGcEligible({
            olderThanMs: this.#policy.maxAgeMs,
            maxJobs: this.#policy.maxJobs,
            now,
        });

        const evicted = eligible.filter((jobId) => this.#store.delete(jobId));
        if (evicted.length > 0) {
            void logThought(`[RetentionSweeper] Evicted ${evicted.length} finished job(s).`);
        }
        return { evicted, sweptAt: new Date(now).toISOString() };
    }
}
