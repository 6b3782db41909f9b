import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { AgentName } from '../types/agents.js';
import { normalizeQuery } from '../services/result-cache.js';
import { AgentError } from '../utils/errors.js';

/** One curated entry in an agent's local dataset. */
export interface FallbackRecord {
    /** Molecule, brand or indication names this entry answers for. */
    match: string[];
    insights: string;
    data: Record<string, unknown>;
}

const datasetCache: Map<string, Promise<FallbackRecord[]>> = new Map();

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFallbackRecord(value: unknown): value is FallbackRecord {
    return (
        isRecord(value) &&
        Array.isArray(value.match) &&
        value.match.every((term) => typeof term === 'string') &&
        typeof value.insights === 'string' &&
        isRecord(value.data)
    );
}

export function fallbackDatasetPath(directory: string, agent: AgentName): string {
    return path.resolve(directory, `${agent}.json`);
}

async function readDataset(filePath: string, agent: AgentName): Promise<FallbackRecord[]> {
    let raw: string;
    try {
        raw = await readFile(filePath, 'utf8');
    } catch (error) {
        throw new AgentError('UPSTREAM_ERROR', `No fallback dataset for '${agent}' at ${filePath}.`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new AgentError('INTERNAL', `Fallback dataset for '${agent}' is not valid JSON.`, { cause: error });
    }

    const records = isRecord(parsed) ? parsed.records : undefined;
    if (!Array.isArray(records) || !records.every(isFallbackRecord)) {
        throw new AgentError('INTERNAL', `Fallback dataset for '${agent}' must be { "records": [{ match, insights, data }] }.`);
    }
    return records;
}

/**
 * Load `<directory>/<agent>.json`. Successful loads are memoized per path;
 * a failed load is retried on the next call.
 */
export function loadFallbackDataset(agent: AgentName, directory: string): Promise<FallbackRecord[]> {
    const filePath = fallbackDatasetPath(directory, agent);
    const cached = datasetCache.get(filePath);
    if (cached) {
        return cached;
    }

    const pending = readDataset(filePath, agent);
    datasetCache.set(filePath, pending);
    pending.catch(() => {
        datasetCache.delete(filePath);
    });
    return pending;
}

/** Case-insensitive match: a term contained in the query, or the query contained in a term. */
export function findFallbackRecord(records: readonly FallbackRecord[], query: string): FallbackRecord | undefined {
    const needle = normalizeQuery(query);
    if (!needle) {
        return undefined;
    }
    return records.find((record) =>
        record.match.some((term) => {
            const candidate = normalizeQuery(term);
            return candidate.length > 0 && (needle.includes(candidate) || candidate.includes(needle));
        }),
    );
}

export function clearFallbackCacheForTests(): void {
    datasetCache.clear();
}
