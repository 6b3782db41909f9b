import type { AgentDescriptor, AgentName } from './agents.js';
import type { CircuitSnapshot } from './circuit-breaker.js';
import type { ConfigIssue } from '../config/env-validator.js';
import type { AnalysisType, JobStatus } from './orchestration.js';
import type { OrchestrationErrorCode } from '../utils/errors.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    /** Machine-readable failure code, e.g. `NOT_READY`. */
    code?: OrchestrationErrorCode | 'NOT_FOUND_ROUTE' | 'INTERNAL';
    correlationId?: string;
    timestamp: string;
}

// ── Analysis ────────────────────────────────────────────────────────────────

export interface AnalyzeRequestBody {
    query?: unknown;
    agents?: unknown;
    analysisType?: unknown;
    agentOptions?: unknown;
}

export interface AnalyzeAcceptedData {
    jobId: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    breakers: CircuitSnapshot[];
    jobs: Record<JobStatus, number>;
    inFlight: number;
}

// ── Catalog ─────────────────────────────────────────────────────────────────

export interface AgentCatalogData {
    agents: AgentDescriptor[];
    analysisTypes: Record<AnalysisType, readonly AgentName[]>;
}

// ── Configuration ───────────────────────────────────────────────────────────

export interface ConfigData {
    settings: {
        apiHost: string;
        apiPort: number;
        agentTimeoutMs: number;
        jobDeadlineMs: number;
        maxQueryLength: number;
        defaultAgents: AgentName[];
        cacheMaxAgeMs: number;
        breaker: { failureThreshold: number; openDurationMs: number; maxOpenDurationMs: number };
        jobStore: string;
        retention: { maxAgeMs: number; maxJobs: number; sweepCron: string };
        liveAgents: AgentName[];
    };
    validation: {
        ok: boolean;
        presentKeys: string[];
        issues: ConfigIssue[];
        activeFeatures: string[];
        validatedAt: string;
    };
}
