import type { AgentName, AgentResult } from '../types/agents.js';

interface CacheEntry {
    result: AgentResult;
    storedAt: number;
}

export interface ResultCacheOptions {
    maxAgeMs: number;
    /** Upper bound on stored entries; the oldest entry is evicted first. */
    maxEntries?: number;
    now?: () => number;
}

const DEFAULT_MAX_ENTRIES = 500;

export function normalizeQuery(query: string): string {
    return query.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Last good live result per (agent, normalized query), replayed on the fallback path. */
export class LiveResultCache {
    readonly #entries: Map<string, CacheEntry> = new Map();
    readonly #maxAgeMs: number;
    readonly #maxEntries: number;
    readonly #now: () => number;

    constructor(options: ResultCacheOptions) {
        this.#maxAgeMs = Math.max(0, options.maxAgeMs);
        this.#maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
        this.#now = options.now ?? Date.now;
    }

    get size(): number {
        return this.#entries.size;
    }

    remember(agent: AgentName, query: string, result: AgentResult): void {
        const key = this.#key(agent, query);
        this.#entries.delete(key);
        this.#entries.set(key, { result: structuredClone(result), storedAt: this.#now() });

        while (this.#entries.size > this.#maxEntries) {
            const oldest = this.#entries.keys().next();
            if (oldest.done) {
                break;
            }
            this.#entries.delete(oldest.value);
        }
    }

    /** Returns a copy re-tagged as CACHED, or undefined when missing or stale. */
    recall(agent: AgentName, query: string): AgentResult | undefined {
        const key = this.#key(agent, query);
        const entry = this.#entries.get(key);
        if (!entry) {
            return undefined;
        }
        if (this.#now() - entry.storedAt > this.#maxAgeMs) {
            this.#entries.delete(key);
            return undefined;
        }
        return { ...structuredClone(entry.result), source: 'CACHED', confidence: 'medium' };
    }

    #key(agent: AgentName, query: string): string {
        return `${agent}:${normalizeQuery(query)}`;
    }
}
