import { createAgentCatalog } from '../agents/catalog.js';
import type { FetchLike } from '../agents/http-agent.js';
import type { RuntimeSettings } from '../config/json-config.js';
import { AgentRegistry } from '../services/agent-registry.js';
import { CircuitBreakerRegistry } from '../services/circuit-breaker.js';
import { openDatabase, type SqliteDatabase } from '../services/db.js';
import { InMemoryJobStore, type JobStateStore } from '../services/job-store.js';
import { Orchestrator } from '../services/orchestrator.js';
import { LiveResultCache } from '../services/result-cache.js';
import { RetentionSweeper } from '../services/retention-sweeper.js';
import { SqliteJobStore } from '../services/sqlite-job-store.js';
import { TaskScheduler } from '../services/task-scheduler.js';
import { logThought } from '../utils/logger.js';

export const RETENTION_TASK_ID = 'job-retention';

export interface RuntimeOverrides {
    /** Replaces the global fetch for live agent calls. */
    fetchImpl?: FetchLike;
    /** Skip cron scheduling; the retention task is still registered. */
    startScheduler?: boolean;
}

export interface Runtime {
    settings: RuntimeSettings;
    store: JobStateStore;
    registry: AgentRegistry;
    breakers: CircuitBreakerRegistry;
    cache: LiveResultCache;
    orchestrator: Orchestrator;
    sweeper: RetentionSweeper;
    scheduler: TaskScheduler;
    stop(): Promise<void>;
}

/** Wire every engine component from resolved settings. */
export function createRuntime(settings: RuntimeSettings, overrides: RuntimeOverrides = {}): Runtime {
    let database: SqliteDatabase | null = null;
    let store: JobStateStore;
    if (settings.jobStore === 'sqlite') {
        database = openDatabase(settings.databasePath);
        store = new SqliteJobStore(database);
    } else {
        store = new InMemoryJobStore();
    }

    const registry = new AgentRegistry();
    registry.registerMany(createAgentCatalog({
        fallbackDir: settings.fallbackDataDir,
        defaultTimeoutMs: settings.agentTimeoutMs,
        agents: settings.agents,
        fetchImpl: overrides.fetchImpl,
    }));

    const breakers = new CircuitBreakerRegistry(settings.breaker);
    const cache = new LiveResultCache({ maxAgeMs: settings.cacheMaxAgeMs });
    const orchestrator = new Orchestrator({
        store,
        registry,
        breakers,
        cache,
        jobDeadlineMs: settings.jobDeadlineMs,
        maxQueryLength: settings.maxQueryLength,
        defaultAgents: settings.defaultAgents,
    });

    const sweeper = new RetentionSweeper(store, settings.retention);
    const scheduler = new TaskScheduler();
    scheduler.register({
        id: RETENTION_TASK_ID,
        cronExpression: settings.retention.sweepCron,
        description: 'Evict finished jobs past their retention window',
        handler: () => {
            sweeper.sweep();
        },
        autoStart: overrides.startScheduler ?? true,
    });

    void logThought(
        `[Runtime] Engine ready: ${registry.size} agents, ${settings.jobStore} job store, deadline ${settings.jobDeadlineMs}ms.`,
    );

    return {
        settings,
        store,
        registry,
        breakers,
        cache,
        orchestrator,
        sweeper,
        scheduler,
        async stop(): Promise<void> {
            scheduler.stopAll();
            await orchestrator.shutdown();
            database?.close();
        },
    };
}
