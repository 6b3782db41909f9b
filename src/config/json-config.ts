import * as fs from 'fs/promises';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import type { AgentSourceSettings } from '../agents/catalog.js';
import { AGENT_NAMES, isAgentName, type AgentName } from '../types/agents.js';
import type { CircuitBreakerOptions } from '../types/circuit-breaker.js';
import { clampTimerMs } from '../utils/retry.js';

export type JobStoreKind = 'memory' | 'sqlite';

export interface AgentEndpointConfig {
    apiUrl?: string;
    apiKey?: string;
    timeoutMs?: number;
}

export interface PharmaScopeConfig {
    runtime: {
        apiHost: string;
        apiPort: number;
    };
    orchestration: {
        agentTimeoutMs: number;
        jobDeadlineMs: number;
        maxQueryLength: number;
        defaultAgents: string[];
        cacheMaxAgeHours: number;
    };
    breaker: {
        failureThreshold: number;
        openDurationMs: number;
        maxOpenDurationMs: number;
    };
    storage: {
        jobStore: JobStoreKind;
        databasePath: string;
        fallbackDataDir: string;
    };
    retention: {
        maxAgeMs: number;
        maxJobs: number;
        sweepCron: string;
    };
    features: {
        mlPrediction: boolean;
        generativeAi: boolean;
        nlpAnalysis: boolean;
    };
    agents: Partial<Record<AgentName, AgentEndpointConfig>>;
}

export const DEFAULT_CONFIG: PharmaScopeConfig = {
    runtime: {
        apiHost: '0.0.0.0',
        apiPort: 5000,
    },
    orchestration: {
        agentTimeoutMs: 10_000,
        jobDeadlineMs: 30_000,
        maxQueryLength: 500,
        defaultAgents: [...AGENT_NAMES],
        cacheMaxAgeHours: 24,
    },
    breaker: {
        failureThreshold: 3,
        openDurationMs: 30_000,
        maxOpenDurationMs: 300_000,
    },
    storage: {
        jobStore: 'memory',
        databasePath: 'data/pharmascope.db',
        fallbackDataDir: 'data/fallback',
    },
    retention: {
        maxAgeMs: 3_600_000,
        maxJobs: 100,
        sweepCron: '*/1 * * * *',
    },
    features: {
        mlPrediction: true,
        generativeAi: true,
        nlpAnalysis: true,
    },
    agents: {},
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.PHARMASCOPE_CONFIG_PATH) {
        return path.resolve(process.env.PHARMASCOPE_CONFIG_PATH);
    }
    return path.resolve('pharmascope.json');
}

export async function readConfig(overridePath?: string): Promise<PharmaScopeConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return mergeWithDefaults({});
        throw new Error(`Failed to read config file at ${targetPath}: ${describe(error)}`);
    }
    try {
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        throw new Error(`Failed to parse config file at ${targetPath}: ${describe(error)}`);
    }
}

export async function writeConfig(config: PharmaScopeConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        const serialized = JSON.stringify(config, null, 2);
        await fs.writeFile(tempPath, `${serialized}\n`, { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw new Error(`Failed to save config to ${targetPath}: ${describe(error)}`);
    }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        ? Object.fromEntries(Object.entries(value))
        : undefined;
}

function pickNumber(source: Record<string, unknown> | undefined, key: string, fallback: number): number {
    const value = source?.[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function pickString(source: Record<string, unknown> | undefined, key: string, fallback: string): string {
    const value = source?.[key];
    return typeof value === 'string' ? value : fallback;
}

function pickBoolean(source: Record<string, unknown> | undefined, key: string, fallback: boolean): boolean {
    const value = source?.[key];
    return typeof value === 'boolean' ? value : fallback;
}

export function mergeWithDefaults(loaded: unknown): PharmaScopeConfig {
    const root = asRecord(loaded);
    const defaults = DEFAULT_CONFIG;
    const runtime = asRecord(root?.runtime);
    const orchestration = asRecord(root?.orchestration);
    const breaker = asRecord(root?.breaker);
    const storage = asRecord(root?.storage);
    const retention = asRecord(root?.retention);
    const features = asRecord(root?.features);
    const agents = asRecord(root?.agents);

    const defaultAgents = orchestration?.defaultAgents;
    const jobStore = storage?.jobStore;

    const agentEndpoints: Partial<Record<AgentName, AgentEndpointConfig>> = {};
    for (const [name, value] of Object.entries(agents ?? {})) {
        const entry = asRecord(value);
        if (!entry || !isAgentName(name)) continue;
        agentEndpoints[name] = {
            apiUrl: typeof entry.apiUrl === 'string' ? entry.apiUrl : undefined,
            apiKey: typeof entry.apiKey === 'string' ? entry.apiKey : undefined,
            timeoutMs: typeof entry.timeoutMs === 'number' ? entry.timeoutMs : undefined,
        };
    }

    return {
        runtime: {
            apiHost: pickString(runtime, 'apiHost', defaults.runtime.apiHost),
            apiPort: pickNumber(runtime, 'apiPort', defaults.runtime.apiPort),
        },
        orchestration: {
            agentTimeoutMs: pickNumber(orchestration, 'agentTimeoutMs', defaults.orchestration.agentTimeoutMs),
            jobDeadlineMs: pickNumber(orchestration, 'jobDeadlineMs', defaults.orchestration.jobDeadlineMs),
            maxQueryLength: pickNumber(orchestration, 'maxQueryLength', defaults.orchestration.maxQueryLength),
            defaultAgents: Array.isArray(defaultAgents)
                ? defaultAgents.filter((value): value is string => typeof value === 'string')
                : [...defaults.orchestration.defaultAgents],
            cacheMaxAgeHours: pickNumber(orchestration, 'cacheMaxAgeHours', defaults.orchestration.cacheMaxAgeHours),
        },
        breaker: {
            failureThreshold: pickNumber(breaker, 'failureThreshold', defaults.breaker.failureThreshold),
            openDurationMs: pickNumber(breaker, 'openDurationMs', defaults.breaker.openDurationMs),
            maxOpenDurationMs: pickNumber(breaker, 'maxOpenDurationMs', defaults.breaker.maxOpenDurationMs),
        },
        storage: {
            jobStore: jobStore === 'sqlite' || jobStore === 'memory' ? jobStore : defaults.storage.jobStore,
            databasePath: pickString(storage, 'databasePath', defaults.storage.databasePath),
            fallbackDataDir: pickString(storage, 'fallbackDataDir', defaults.storage.fallbackDataDir),
        },
        retention: {
            maxAgeMs: pickNumber(retention, 'maxAgeMs', defaults.retention.maxAgeMs),
            maxJobs: pickNumber(retention, 'maxJobs', defaults.retention.maxJobs),
            sweepCron: pickString(retention, 'sweepCron', defaults.retention.sweepCron),
        },
        features: {
            mlPrediction: pickBoolean(features, 'mlPrediction', defaults.features.mlPrediction),
            generativeAi: pickBoolean(features, 'generativeAi', defaults.features.generativeAi),
            nlpAnalysis: pickBoolean(features, 'nlpAnalysis', defaults.features.nlpAnalysis),
        },
        agents: agentEndpoints,
    };
}

// ── Flat key adapter ────────────────────────────────────────────────────────

let cachedConfig: PharmaScopeConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): PharmaScopeConfig {
    const configPath = getConfigPath();
    try {
        if (existsSync(configPath)) {
            const content = readFileSync(configPath, 'utf8');
            cachedConfig = mergeWithDefaults(JSON.parse(content));
            return cachedConfig;
        }
    } catch (error) {
        console.error(`[PharmaScope Config] Failed to parse JSON config at ${configPath}:`, error);
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

function agentKey(key: string): { agent: AgentName; field: keyof AgentEndpointConfig } | null {
    const match = /^([A-Z_]+?)_(API_URL|API_KEY|TIMEOUT_MS)$/.exec(key);
    if (!match) return null;
    const agent = match[1].toLowerCase();
    if (!isAgentName(agent)) return null;
    const field = match[2] === 'API_URL' ? 'apiUrl' : match[2] === 'API_KEY' ? 'apiKey' : 'timeoutMs';
    return { agent, field };
}

function jsonValueFor(config: PharmaScopeConfig, key: string): unknown {
    switch (key) {
        case 'API_HOST': return config.runtime.apiHost;
        case 'API_PORT': return config.runtime.apiPort;

        case 'AGENT_TIMEOUT_MS': return config.orchestration.agentTimeoutMs;
        case 'JOB_DEADLINE_MS': return config.orchestration.jobDeadlineMs;
        case 'MAX_QUERY_LENGTH': return config.orchestration.maxQueryLength;
        case 'DEFAULT_AGENTS': return config.orchestration.defaultAgents.join(',');
        case 'CACHE_MAX_AGE_HOURS': return config.orchestration.cacheMaxAgeHours;

        case 'BREAKER_FAILURE_THRESHOLD': return config.breaker.failureThreshold;
        case 'BREAKER_OPEN_DURATION_MS': return config.breaker.openDurationMs;
        case 'BREAKER_MAX_OPEN_DURATION_MS': return config.breaker.maxOpenDurationMs;

        case 'JOB_STORE': return config.storage.jobStore;
        case 'DATABASE_PATH': return config.storage.databasePath;
        case 'FALLBACK_DATA_DIR': return config.storage.fallbackDataDir;

        case 'RETENTION_MAX_AGE_MS': return config.retention.maxAgeMs;
        case 'RETENTION_MAX_JOBS': return config.retention.maxJobs;
        case 'RETENTION_SWEEP_CRON': return config.retention.sweepCron;

        case 'ENABLE_ML_PREDICTION': return config.features.mlPrediction;
        case 'ENABLE_GENERATIVE_AI': return config.features.generativeAi;
        case 'ENABLE_NLP_ANALYSIS': return config.features.nlpAnalysis;
    }

    const target = agentKey(key);
    return target ? config.agents[target.agent]?.[target.field] : undefined;
}

/**
 * Gets a configured value: a non-empty environment variable wins, then the
 * value mapped from `pharmascope.json` (merged with defaults).
 */
export function getConfigValue(key: string): string | undefined {
    const config = cachedConfig ?? reloadConfigSync();

    const envValue = process.env[key];
    if (envValue !== undefined && envValue.trim() !== '') {
        return envValue.trim();
    }

    const jsonValue = jsonValueFor(config, key);
    if (jsonValue !== undefined && jsonValue !== null && String(jsonValue).trim() !== '') {
        return String(jsonValue);
    }
    return undefined;
}

// ── Typed runtime settings ──────────────────────────────────────────────────

export interface RuntimeSettings {
    apiHost: string;
    apiPort: number;
    agentTimeoutMs: number;
    jobDeadlineMs: number;
    maxQueryLength: number;
    defaultAgents: AgentName[];
    cacheMaxAgeMs: number;
    breaker: Required<Omit<CircuitBreakerOptions, 'now'>>;
    jobStore: JobStoreKind;
    databasePath: string;
    fallbackDataDir: string;
    retention: {
        maxAgeMs: number;
        maxJobs: number;
        sweepCron: string;
    };
    agents: Partial<Record<AgentName, AgentSourceSettings>>;
}

const FEATURE_FLAG_BY_AGENT: Partial<Record<AgentName, string>> = {
    ml_prediction: 'ENABLE_ML_PREDICTION',
    generative_ai: 'ENABLE_GENERATIVE_AI',
    nlp_analysis: 'ENABLE_NLP_ANALYSIS',
};

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

/** Positive integer used as a timer delay, capped at the largest delay Node can schedule. */
export function parseTimerMs(raw: string | undefined, fallback: number): number {
    return clampTimerMs(parsePositiveInt(raw, fallback));
}

export function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
    if (raw === undefined) return fallback;
    const normalized = raw.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
    return fallback;
}

export function parseAgentList(raw: string | undefined): AgentName[] {
    if (!raw) return [];
    const names = raw.split(',').map((value) => value.trim().toLowerCase()).filter(isAgentName);
    return [...new Set(names)];
}

/**
 * Resolve every setting the runtime needs into typed values. Values that fail
 * to parse fall back to their defaults; `validateRuntimeConfig` reports them.
 */
export function resolveRuntimeSettings(): RuntimeSettings {
    const defaults = DEFAULT_CONFIG;
    const agentTimeoutMs = parseTimerMs(getConfigValue('AGENT_TIMEOUT_MS'), defaults.orchestration.agentTimeoutMs);
    const openDurationMs = parsePositiveInt(getConfigValue('BREAKER_OPEN_DURATION_MS'), defaults.breaker.openDurationMs);
    const defaultAgents = parseAgentList(getConfigValue('DEFAULT_AGENTS'));
    const jobStore = getConfigValue('JOB_STORE');

    const agents: Partial<Record<AgentName, AgentSourceSettings>> = Object.fromEntries(
        AGENT_NAMES.map((agent): [AgentName, AgentSourceSettings] => {
            const prefix = agent.toUpperCase();
            const flag = FEATURE_FLAG_BY_AGENT[agent];
            return [agent, {
                apiUrl: getConfigValue(`${prefix}_API_URL`),
                apiKey: getConfigValue(`${prefix}_API_KEY`),
                enabled: flag ? parseBoolean(getConfigValue(flag), true) : true,
                timeoutMs: parseTimerMs(getConfigValue(`${prefix}_TIMEOUT_MS`), agentTimeoutMs),
            }];
        }),
    );

    return {
        apiHost: getConfigValue('API_HOST') ?? defaults.runtime.apiHost,
        apiPort: parsePositiveInt(getConfigValue('API_PORT'), defaults.runtime.apiPort),
        agentTimeoutMs,
        jobDeadlineMs: parseTimerMs(getConfigValue('JOB_DEADLINE_MS'), defaults.orchestration.jobDeadlineMs),
        maxQueryLength: parsePositiveInt(getConfigValue('MAX_QUERY_LENGTH'), defaults.orchestration.maxQueryLength),
        defaultAgents: defaultAgents.length > 0 ? defaultAgents : [...AGENT_NAMES],
        cacheMaxAgeMs: parsePositiveInt(getConfigValue('CACHE_MAX_AGE_HOURS'), defaults.orchestration.cacheMaxAgeHours) * 3_600_000,
        breaker: {
            failureThreshold: parsePositiveInt(getConfigValue('BREAKER_FAILURE_THRESHOLD'), defaults.breaker.failureThreshold),
            openDurationMs,
            maxOpenDurationMs: Math.max(
                openDurationMs,
                parsePositiveInt(getConfigValue('BREAKER_MAX_OPEN_DURATION_MS'), defaults.breaker.maxOpenDurationMs),
            ),
        },
        jobStore: jobStore === 'sqlite' ? 'sqlite' : 'memory',
        databasePath: getConfigValue('DATABASE_PATH') ?? defaults.storage.databasePath,
        fallbackDataDir: getConfigValue('FALLBACK_DATA_DIR') ?? defaults.storage.fallbackDataDir,
        retention: {
            maxAgeMs: parsePositiveInt(getConfigValue('RETENTION_MAX_AGE_MS'), defaults.retention.maxAgeMs),
            maxJobs: parsePositiveInt(getConfigValue('RETENTION_MAX_JOBS'), defaults.retention.maxJobs),
            sweepCron: getConfigValue('RETENTION_SWEEP_CRON') ?? defaults.retention.sweepCron,
        },
        agents,
    };
}
