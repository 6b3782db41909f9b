import { describe, expect, it } from 'vitest';
import { CircuitBreaker, CircuitBreakerRegistry } from '../../src/services/circuit-breaker.js';
import type { CircuitTransition } from '../../src/types/circuit-breaker.js';

function clockAt(start: number): { now: () => number; advance: (ms: number) => void } {
    let current = start;
    return {
        now: () => current,
        advance: (ms: number) => {
            current += ms;
        },
    };
}

describe('CircuitBreaker', () => {
    it('stays closed below the failure threshold and resets the count on success', () => {
        const breaker = new CircuitBreaker('market', { failureThreshold: 3 });

        breaker.recordFailure('HTTP 502');
        breaker.recordFailure('HTTP 502');
        breaker.recordSuccess();
        breaker.recordFailure('HTTP 502');
        breaker.recordFailure('HTTP 502');

        expect(breaker.state).toBe('CLOSED');
        expect(breaker.snapshot().consecutiveFailures).toBe(2);
        expect(breaker.tryAcquire()).toEqual({ allowed: true, trial: false });
    });

    it('opens after the threshold and refuses live calls until the open duration elapses', () => {
        const clock = clockAt(1_000_000);
        const breaker = new CircuitBreaker('market', {
            failureThreshold: 3,
            openDurationMs: 1_000,
            maxOpenDurationMs: 3_000,
            now: clock.now,
        });

        breaker.recordFailure('timeout');
        breaker.recordFailure('timeout');
        breaker.recordFailure('timeout');

        expect(breaker.state).toBe('OPEN');
        expect(breaker.tryAcquire()).toEqual({ allowed: false, reason: 'OPEN' });
        expect(breaker.snapshot().openUntil).toBe(new Date(1_001_000).toISOString());

        clock.advance(999);
        expect(breaker.state).toBe('OPEN');

        clock.advance(1);
        expect(breaker.state).toBe('HALF_OPEN');
    });

    it('grants exactly one half-open trial and closes when it succeeds', () => {
        const clock = clockAt(0);
        const breaker = new CircuitBreaker('patent', { failureThreshold: 1, openDurationMs: 1_000, now: clock.now });

        breaker.recordFailure('HTTP 503');
        clock.advance(1_000);

        expect(breaker.tryAcquire()).toEqual({ allowed: true, trial: true });
        expect(breaker.tryAcquire()).toEqual({ allowed: false, reason: 'TRIAL_IN_FLIGHT' });

        breaker.recordSuccess();

        const snapshot = breaker.snapshot();
        expect(snapshot.state).toBe('CLOSED');
        expect(snapshot.consecutiveFailures).toBe(0);
        expect(snapshot.openDurationMs).toBe(1_000);
        expect(snapshot.trialInFlight).toBe(false);
    });

    it('reopens with a doubled open duration capped at the maximum when a trial fails', () => {
        const clock = clockAt(0);
        const breaker = new CircuitBreaker('clinical', {
            failureThreshold: 1,
            openDurationMs: 1_000,
            maxOpenDurationMs: 3_000,
            now: clock.now,
        });

        breaker.recordFailure('first');
        clock.advance(1_000);
        expect(breaker.tryAcquire()).toEqual({ allowed: true, trial: true });
        breaker.recordFailure('trial one');

        expect(breaker.state).toBe('OPEN');
        expect(breaker.snapshot().openDurationMs).toBe(2_000);
        expect(breaker.snapshot().openUntil).toBe(new Date(3_000).toISOString());

        clock.advance(2_000);
        expect(breaker.tryAcquire()).toEqual({ allowed: true, trial: true });
        breaker.recordFailure('trial two');

        expect(breaker.snapshot().openDurationMs).toBe(3_000);
    });

    it('frees the trial slot on release without changing state', () => {
        const clock = clockAt(0);
        const breaker = new CircuitBreaker('web', { failureThreshold: 1, openDurationMs: 500, now: clock.now });

        breaker.recordFailure('down');
        clock.advance(500);
        expect(breaker.tryAcquire()).toEqual({ allowed: true, trial: true });

        breaker.release();

        expect(breaker.state).toBe('HALF_OPEN');
        expect(breaker.tryAcquire()).toEqual({ allowed: true, trial: true });
    });

    it('reports an elapsed open circuit as HALF_OPEN without transitioning on read', () => {
        const clock = clockAt(0);
        const transitions: CircuitTransition[] = [];
        const breaker = new CircuitBreaker(
            'regulatory',
            { failureThreshold: 1, openDurationMs: 1_000, now: clock.now },
            (transition) => transitions.push(transition),
        );

        breaker.recordFailure('HTTP 500');
        clock.advance(1_500);

        expect(breaker.snapshot()).toMatchObject({
            state: 'HALF_OPEN',
            lastTransitionAt: new Date(0).toISOString(),
            openUntil: new Date(1_000).toISOString(),
        });
        expect(breaker.state).toBe('HALF_OPEN');
        expect(transitions.map((transition) => transition.to)).toEqual(['OPEN']);

        expect(breaker.tryAcquire()).toEqual({ allowed: true, trial: true });
        expect(transitions.map((transition) => transition.to)).toEqual(['OPEN', 'HALF_OPEN']);
        expect(breaker.snapshot().lastTransitionAt).toBe(new Date(1_500).toISOString());
    });
});

describe('CircuitBreakerRegistry', () => {
    it('hands out one breaker per agent and reports transitions to listeners', () => {
        const registry = new CircuitBreakerRegistry({ failureThreshold: 1 });
        const transitions: CircuitTransition[] = [];
        const unsubscribe = registry.onTransition((transition) => transitions.push(transition));

        expect(registry.get('exim')).toBe(registry.get('exim'));

        registry.get('exim').recordFailure('HTTP 500');
        unsubscribe();
        registry.get('patent').recordFailure('HTTP 500');

        expect(transitions).toHaveLength(1);
        expect(transitions[0]).toMatchObject({ agent: 'exim', from: 'CLOSED', to: 'OPEN' });
    });

    it('snapshots the requested agents in order', () => {
        const registry = new CircuitBreakerRegistry();

        const snapshots = registry.snapshots(['literature', 'market']);

        expect(snapshots.map((snapshot) => [snapshot.agent, snapshot.state])).toEqual([
            ['literature', 'CLOSED'],
            ['market', 'CLOSED'],
        ]);
    });

    it('does not register breakers for agents it only reads', () => {
        const registry = new CircuitBreakerRegistry();
        registry.get('market').recordFailure('HTTP 502');

        const snapshots = registry.snapshots(['market', 'exim']);

        expect(snapshots.map((snapshot) => [snapshot.agent, snapshot.consecutiveFailures])).toEqual([
            ['market', 1],
            ['exim', 0],
        ]);
        expect(registry.has('market')).toBe(true);
        expect(registry.has('exim')).toBe(false);
        expect(registry.snapshots().map((snapshot) => snapshot.agent)).toEqual(['market']);
    });
});
