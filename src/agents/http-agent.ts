import type {
    AgentCapability,
    AgentInvocationContext,
    AgentInvocationOptions,
    AgentName,
    AgentResult,
} from '../types/agents.js';
import { AgentError, errorMessage, toAgentError } from '../utils/errors.js';
import { clampTimerMs, withRetry } from '../utils/retry.js';
import { findFallbackRecord, loadFallbackDataset } from './fallback-data.js';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface HttpAgentOptions {
    name: AgentName;
    displayName: string;
    /** Sent as the `type` query parameter of the live request. */
    resultType: string;
    timeoutMs: number;
    /** Directory holding `<agent>.json` curated datasets. */
    fallbackDir: string;
    apiUrl?: string;
    apiKey?: string;
    /** Feature switch; a disabled agent only ever answers from its fallback dataset. */
    enabled?: boolean;
    /** Delay before the single retry of a transient live failure. */
    retryDelayMs?: number;
    fetchImpl?: FetchLike;
}

const DEFAULT_RETRY_DELAY_MS = 250;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Mirrors truthiness of a JSON value: empty strings, arrays and objects carry no data. */
function hasContent(value: unknown): boolean {
    if (Array.isArray(value)) {
        return value.length > 0;
    }
    if (isRecord(value)) {
        return Object.keys(value).length > 0;
    }
    return value !== undefined && value !== null && value !== false && value !== '' && value !== 0;
}

/**
 * Agent backed by a remote JSON endpoint, with a curated local dataset as its
 * degraded path.
 *
 * Live request: `GET <apiUrl>?query=<q>&type=<resultType>` with an optional
 * bearer token. Transient failures (5xx, network) are retried once while the
 * deadline allows.
 */
export class HttpAgent implements AgentCapability {
    readonly name: AgentName;
    readonly displayName: string;
    readonly timeoutMs: number;
    readonly liveEnabled: boolean;

    readonly #resultType: string;
    readonly #apiUrl: string | undefined;
    readonly #apiKey: string | undefined;
    readonly #fallbackDir: string;
    readonly #retryDelayMs: number;
    readonly #fetch: FetchLike;

    constructor(options: HttpAgentOptions) {
        this.name = options.name;
        this.displayName = options.displayName;
        this.timeoutMs = Math.max(1, clampTimerMs(options.timeoutMs));
        this.#resultType = options.resultType;
        this.#apiUrl = options.apiUrl?.trim() || undefined;
        this.#apiKey = options.apiKey?.trim() || undefined;
        this.#fallbackDir = options.fallbackDir;
        this.#retryDelayMs = Math.max(0, options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
        this.#fetch = options.fetchImpl ?? fetch;
        this.liveEnabled = (options.enabled ?? true) && this.#apiUrl !== undefined;
    }

    async invoke(
        query: string,
        options: AgentInvocationOptions,
        context: AgentInvocationContext,
    ): Promise<AgentResult> {
        const apiUrl = this.#apiUrl;
        if (!this.liveEnabled || !apiUrl) {
            throw new AgentError('INTERNAL', `Live source for '${this.name}' is not configured.`);
        }
        if (Date.now() >= context.deadline || context.signal.aborted) {
            throw new AgentError('TIMEOUT', `'${this.name}' has no time left before its deadline.`);
        }

        const outcome = await withRetry(() => this.#fetchOnce(apiUrl, query, options, context), {
            maxAttempts: 2,
            baseDelayMs: this.#retryDelayMs,
            label: `agent:${this.name}`,
            signal: context.signal,
            deadline: context.deadline,
            shouldRetry: (error) => error instanceof AgentError && error.retryable,
        });

        if (outcome.ok) {
            return outcome.value;
        }
        if (context.signal.aborted) {
            throw new AgentError('TIMEOUT', `'${this.name}' live call was cancelled.`, { cause: outcome.error });
        }
        throw toAgentError(outcome.error);
    }

    async fallback(query: string, _options: AgentInvocationOptions): Promise<AgentResult> {
        const records = await loadFallbackDataset(this.name, this.#fallbackDir);
        const match = findFallbackRecord(records, query);
        const generatedAt = new Date().toISOString();

        if (!match) {
            return {
                agent: this.name,
                confidence: 'low',
                source: 'FALLBACK',
                generatedAt,
                insights: `No curated ${this.displayName} data for '${query}'.`,
                payload: { data: [] },
            };
        }

        return {
            agent: this.name,
            confidence: 'medium',
            source: 'FALLBACK',
            generatedAt,
            insights: match.insights,
            payload: { data: match.data, matchedOn: match.match },
        };
    }

    async #fetchOnce(
        apiUrl: string,
        query: string,
        options: AgentInvocationOptions,
        context: AgentInvocationContext,
    ): Promise<AgentResult> {
        const url = new URL(apiUrl);
        url.searchParams.set('query', query);
        url.searchParams.set('type', this.#resultType);
        for (const [key, value] of Object.entries(options)) {
            if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
                url.searchParams.set(key, String(value));
            }
        }

        const headers: Record<string, string> = { Accept: 'application/json' };
        if (this.#apiKey) {
            headers.Authorization = `Bearer ${this.#apiKey}`;
        }

        const remainingMs = Math.max(1, context.deadline - Date.now());
        const signal = AbortSignal.any([context.signal, AbortSignal.timeout(remainingMs)]);

        let response: Response;
        try {
            response = await this.#fetch(url, { headers, signal });
        } catch (error) {
            if (signal.aborted) {
                throw new AgentError('TIMEOUT', `'${this.name}' live call exceeded its deadline.`, { cause: error });
            }
            throw new AgentError('UPSTREAM_ERROR', `'${this.name}' request failed: ${errorMessage(error)}`, {
                cause: error,
                retryable: true,
            });
        }

        if (response.status === 400 || response.status === 422) {
            throw new AgentError('INVALID_INPUT', `'${this.name}' rejected the query (HTTP ${response.status}).`);
        }
        if (!response.ok) {
            throw new AgentError('UPSTREAM_ERROR', `'${this.name}' upstream answered HTTP ${response.status}.`, {
                retryable: response.status >= 500,
            });
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            if (signal.aborted) {
                throw new AgentError('TIMEOUT', `'${this.name}' live call exceeded its deadline.`, { cause: error });
            }
            throw new AgentError('UPSTREAM_ERROR', `'${this.name}' upstream returned a non-JSON body.`, { cause: error });
        }

        if (!isRecord(body) || (!hasContent(body.data) && !hasContent(body.insights))) {
            throw new AgentError('UPSTREAM_ERROR', `'${this.name}' upstream returned an empty payload.`);
        }

        return {
            agent: this.name,
            confidence: 'high',
            source: 'LIVE',
            generatedAt: new Date().toISOString(),
            insights:
                typeof body.insights === 'string' && body.insights
                    ? body.insights
                    : `${this.displayName} analysis for '${query}' from API.`,
            payload: {
                data: body.data ?? [],
                charts: isRecord(body.charts) ? body.charts : {},
            },
        };
    }
}
