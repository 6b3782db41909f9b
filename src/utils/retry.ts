import { logThought } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 2 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 250 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 2000 */
    maxDelayMs?: number;
    /** Label used in log messages for traceability. */
    label?: string;
    /** Return false to stop retrying on this error. Every error is retried when omitted. */
    shouldRetry?: (error: unknown) => boolean;
    /** No further attempt starts once this signal is aborted. */
    signal?: AbortSignal;
    /** Epoch millis; a retry whose backoff would end past it is not attempted. */
    deadline?: number;
}

/** Result of a retried operation. */
export type RetryResult<T> =
    | { ok: true; value: T; attempts: number; totalDurationMs: number }
    | { ok: false; error: unknown; attempts: number; totalDurationMs: number };

/** Largest delay Node's timers accept; a larger one fires after about 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export function clampTimerMs(ms: number): number {
    return Math.min(MAX_TIMER_MS, Math.max(0, ms));
}

const DEFAULTS = {
    maxAttempts: 2,
    baseDelayMs: 250,
    backoffFactor: 2,
    maxDelayMs: 2_000,
};

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * - Retries up to `maxAttempts` times while `shouldRetry` allows it.
 * - Delay doubles after each attempt (capped at `maxDelayMs`).
 * - Stops early when `signal` aborts or the next attempt would start past `deadline`.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => fetchMarketData(query, signal),
 *   { maxAttempts: 2, label: 'agent:market', signal, deadline },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULTS.baseDelayMs);
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const label = options.label ?? 'unnamed';

    const start = Date.now();
    let lastError: unknown = new Error(`${label} was not attempted.`);
    let attempts = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (options.signal?.aborted) {
            break;
        }
        attempts = attempt;
        try {
            const value = await fn(attempt);
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                void logThought(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastError = err;
            const message = err instanceof Error ? err.message : String(err);

            if (options.shouldRetry && !options.shouldRetry(err)) {
                break;
            }

            if (attempt < maxAttempts) {
                const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
                if (options.deadline !== undefined && Date.now() + delay >= options.deadline) {
                    void logThought(`[Retry] ${label} attempt ${attempt} failed: ${message}. No time left to retry.`);
                    break;
                }
                void logThought(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${message}. Retrying in ${delay}ms.`,
                );
                await sleep(delay, options.signal);
            } else {
                void logThought(
                    `[Retry] ${label} exhausted all ${maxAttempts} attempts. Last error: ${message}.`,
                );
            }
        }
    }

    return {
        ok: false,
        error: lastError,
        attempts,
        totalDurationMs: Date.now() - start,
    };
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (ms <= 0 || signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
