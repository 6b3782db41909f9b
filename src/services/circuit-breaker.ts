import type { AgentName } from '../types/agents.js';
import type {
    CircuitBreakerOptions,
    CircuitDecision,
    CircuitSnapshot,
    CircuitState,
    CircuitTransition,
} from '../types/circuit-breaker.js';
import { logThought } from '../utils/logger.js';

const DEFAULT_FAILURE_THRESHOLD = 3;
const DEFAULT_OPEN_DURATION_MS = 30_000;
const DEFAULT_MAX_OPEN_DURATION_MS = 300_000;

export type CircuitTransitionListener = (transition: CircuitTransition) => void;

/**
 * Failure tracker for one agent's upstream source.
 *
 * Every method runs synchronously to completion, so each read-modify-write of
 * the counters is a single critical section on the event loop even when many
 * jobs dispatch the same agent concurrently.
 */
export class CircuitBreaker {
    readonly #agent: AgentName;
    readonly #failureThreshold: number;
    readonly #baseOpenDurationMs: number;
    readonly #maxOpenDurationMs: number;
    readonly #now: () => number;
    readonly #onTransition: CircuitTransitionListener | undefined;

    #state: CircuitState = 'CLOSED';
    #consecutiveFailures = 0;
    #openDurationMs: number;
    #openUntil: number | null = null;
    #lastTransitionAt: number;
    #trialInFlight = false;

    constructor(
        agent: AgentName,
        options: Partial<CircuitBreakerOptions> = {},
        onTransition?: CircuitTransitionListener,
    ) {
        this.#agent = agent;
        this.#failureThreshold = Math.max(1, Math.floor(options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD));
        this.#baseOpenDurationMs = Math.max(1, options.openDurationMs ?? DEFAULT_OPEN_DURATION_MS);
        this.#maxOpenDurationMs = Math.max(
            this.#baseOpenDurationMs,
            options.maxOpenDurationMs ?? DEFAULT_MAX_OPEN_DURATION_MS,
        );
        this.#now = options.now ?? Date.now;
        this.#onTransition = onTransition;
        this.#openDurationMs = this.#baseOpenDurationMs;
        this.#lastTransitionAt = this.#now();
    }

    get agent(): AgentName {
        return this.#agent;
    }

    /** Current state as a reader would see it; an elapsed OPEN reads as HALF_OPEN without transitioning. */
    get state(): CircuitState {
        return this.#effectiveState();
    }

    /**
     * Decide whether a live call may be attempted. In HALF_OPEN exactly one
     * caller receives `trial: true`; everyone else is refused until that trial
     * reports back.
     */
    tryAcquire(): CircuitDecision {
        this.#checkCooldown();

        if (this.#state === 'CLOSED') {
            return { allowed: true, trial: false };
        }
        if (this.#state === 'OPEN') {
            return { allowed: false, reason: 'OPEN' };
        }
        if (this.#trialInFlight) {
            return { allowed: false, reason: 'TRIAL_IN_FLIGHT' };
        }

        this.#trialInFlight = true;
        return { allowed: true, trial: true };
    }

    recordSuccess(): void {
        this.#consecutiveFailures = 0;
        if (this.#state === 'HALF_OPEN') {
            this.#trialInFlight = false;
            this.#openDurationMs = this.#baseOpenDurationMs;
            this.#openUntil = null;
            this.#transition('CLOSED', 'Trial call succeeded.');
        }
    }

    recordFailure(reason: string): void {
        this.#consecutiveFailures += 1;

        if (this.#state === 'HALF_OPEN') {
            this.#trialInFlight = false;
            this.#openDurationMs = Math.min(this.#openDurationMs * 2, this.#maxOpenDurationMs);
            this.#open(`Trial call failed: ${reason}`);
            return;
        }

        if (this.#state === 'CLOSED' && this.#consecutiveFailures >= this.#failureThreshold) {
            this.#open(`Failure threshold ${this.#failureThreshold} reached: ${reason}`);
        }
    }

    /** Outcome that says nothing about the upstream source; frees a half-open trial slot. */
    release(): void {
        if (this.#state === 'HALF_OPEN') {
            this.#trialInFlight = false;
        }
    }

    snapshot(): CircuitSnapshot {
        return {
            agent: this.#agent,
            state: this.#effectiveState(),
            consecutiveFailures: this.#consecutiveFailures,
            lastTransitionAt: new Date(this.#lastTransitionAt).toISOString(),
            openUntil: this.#openUntil === null ? null : new Date(this.#openUntil).toISOString(),
            openDurationMs: this.#openDurationMs,
            trialInFlight: this.#trialInFlight,
        };
    }

    #open(reason: string): void {
        this.#openUntil = this.#now() + this.#openDurationMs;
        this.#transition('OPEN', reason);
    }

    #cooldownElapsed(): boolean {
        return this.#state === 'OPEN' && this.#openUntil !== null && this.#now() >= this.#openUntil;
    }

    #effectiveState(): CircuitState {
        return this.#cooldownElapsed() ? 'HALF_OPEN' : this.#state;
    }

    #checkCooldown(): void {
        if (this.#cooldownElapsed()) {
            this.#transition('HALF_OPEN', 'Open duration elapsed.');
        }
    }

    #transition(next: CircuitState, reason: string): void {
        const from = this.#state;
        this.#state = next;
        this.#lastTransitionAt = this.#now();

        const transition: CircuitTransition = {
            agent: this.#agent,
            from,
            to: next,
            reason,
            at: new Date(this.#lastTransitionAt).toISOString(),
        };

        void logThought(
            `[CircuitBreaker] Circuit for '${this.#agent}' transitioned ${from} -> ${next}. ${reason}`,
        );
        this.#onTransition?.(transition);
    }
}

/** Holds exactly one breaker per agent for the whole process. */
export class CircuitBreakerRegistry {
    readonly #breakers: Map<AgentName, CircuitBreaker> = new Map();
    readonly #options: Partial<CircuitBreakerOptions>;
    readonly #listeners: Set<CircuitTransitionListener> = new Set();

    constructor(options: Partial<CircuitBreakerOptions> = {}) {
        this.#options = options;
    }

    get(agent: AgentName): CircuitBreaker {
        let breaker = this.#breakers.get(agent);
        if (!breaker) {
            breaker = new CircuitBreaker(agent, this.#options, (transition) => this.#emit(transition));
            this.#breakers.set(agent, breaker);
        }
        return breaker;
    }

    /**
     * Read-only view for diagnostics. Agents that have never been dispatched
     * report a fresh CLOSED snapshot and are not added to the registry.
     */
    snapshots(agents?: readonly AgentName[]): CircuitSnapshot[] {
        const names = agents ?? [...this.#breakers.keys()];
        return names.map((agent) => {
            const breaker = this.#breakers.get(agent) ?? new CircuitBreaker(agent, this.#options);
            return breaker.snapshot();
        });
    }

    has(agent: AgentName): boolean {
        return this.#breakers.has(agent);
    }

    /** Subscribe to state transitions. Returns an unsubscribe function. */
    onTransition(listener: CircuitTransitionListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    #emit(transition: CircuitTransition): void {
        for (const listener of this.#listeners) {
            try {
                listener(transition);
            } catch (listenerErr) {
                console.error('[CircuitBreakerRegistry] Transition listener threw an error:', listenerErr);
            }
        }
    }
}
