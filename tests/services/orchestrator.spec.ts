import { describe, expect, it } from 'vitest';
import { AGENT_NAMES } from '../../src/types/agents.js';
import { AgentError, OrchestrationError } from '../../src/utils/errors.js';
import { CircuitBreakerRegistry } from '../../src/services/circuit-breaker.js';
import { openDatabase } from '../../src/services/db.js';
import { SqliteJobStore } from '../../src/services/sqlite-job-store.js';
import { ScriptedAgent, buildEngine, hangUntilAborted, liveResult } from '../harness/scripted-agents.js';

function allAgents(): ScriptedAgent[] {
    return AGENT_NAMES.map((name) => new ScriptedAgent(name));
}

function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('expected the call to throw');
}

describe('Orchestrator', () => {
    it('completes a job with every agent live', async () => {
        const { orchestrator } = buildEngine(allAgents());

        const jobId = orchestrator.submit('imatinib');
        const job = await orchestrator.waitForSettlement(jobId);
        const report = orchestrator.result(jobId);

        expect(job.status).toBe('COMPLETED');
        expect(report.compositeStatus).toBe('COMPLETE');
        expect(report.coverageRatio).toBe(1);
        expect(Object.keys(report.agents)).toEqual([...AGENT_NAMES]);
        expect(Object.values(report.agents).every((entry) => entry?.outcome === 'result' && entry.source === 'LIVE'))
            .toBe(true);
        expect(orchestrator.status(jobId)).toMatchObject({ status: 'COMPLETED', progressFraction: 1 });
    });

    it('is RUNNING with dispatched agents as soon as submit returns', () => {
        const agents = [new ScriptedAgent('market', { live: (_query, context) => hangUntilAborted(context) })];
        const { orchestrator } = buildEngine(agents);

        const jobId = orchestrator.submit('imatinib', { agents: ['market'] });
        const status = orchestrator.status(jobId);

        expect(status).toEqual({
            jobId,
            status: 'RUNNING',
            perAgent: [{ name: 'market', subStatus: 'RUNNING', source: null }],
            progressFraction: 0,
        });
        const error = catchError(() => orchestrator.result(jobId));
        expect(error).toBeInstanceOf(OrchestrationError);
        expect(error).toMatchObject({ code: 'NOT_READY' });

        return orchestrator.shutdown();
    });

    it('answers an open circuit from the fallback without calling the live source', async () => {
        const market = new ScriptedAgent('market');
        const { orchestrator, breakers } = buildEngine([market, new ScriptedAgent('clinical')]);
        breakers.get('market').recordFailure('HTTP 503');

        const jobId = orchestrator.submit('imatinib', { agents: ['market', 'clinical'] });
        await orchestrator.waitForSettlement(jobId);
        const report = orchestrator.result(jobId);

        expect(market.liveCalls).toBe(0);
        expect(market.fallbackCalls).toBe(1);
        expect(report.agents.market).toMatchObject({ outcome: 'result', subStatus: 'FALLBACK_USED', source: 'FALLBACK' });
        expect(report.agents.clinical).toMatchObject({ outcome: 'result', subStatus: 'SUCCEEDED', source: 'LIVE' });
        expect(report.compositeStatus).toBe('COMPLETE');
    });

    it('short-circuits to the fallback once consecutive failures across jobs reach the threshold', async () => {
        const market = new ScriptedAgent('market', {
            live: async () => {
                throw new AgentError('UPSTREAM_ERROR', 'HTTP 502');
            },
        });
        const breakers = new CircuitBreakerRegistry({ failureThreshold: 3, openDurationMs: 60_000 });
        const { orchestrator } = buildEngine([market], { breakers });

        for (const query of ['imatinib', 'metformin']) {
            await orchestrator.waitForSettlement(orchestrator.submit(query, { agents: ['market'] }));
        }
        expect(breakers.get('market').snapshot()).toMatchObject({ state: 'CLOSED', consecutiveFailures: 2 });

        await orchestrator.waitForSettlement(orchestrator.submit('aspirin', { agents: ['market'] }));
        expect(breakers.get('market').state).toBe('OPEN');
        expect(market.liveCalls).toBe(3);

        const fourth = await orchestrator.waitForSettlement(orchestrator.submit('ibuprofen', { agents: ['market'] }));

        expect(market.liveCalls).toBe(3);
        expect(market.fallbackCalls).toBe(4);
        expect(fourth.status).toBe('COMPLETED');
        expect(fourth.tasks[0]).toMatchObject({ subStatus: 'FALLBACK_USED', source: 'FALLBACK' });
    });

    it('lets only one of two concurrent jobs run the half-open trial', async () => {
        let now = 0;
        const breakers = new CircuitBreakerRegistry({ failureThreshold: 1, openDurationMs: 1_000, now: () => now });
        const market = new ScriptedAgent('market', { timeoutMs: 10_000, live: (_query, context) => hangUntilAborted(context) });
        const { orchestrator } = buildEngine([market], { breakers, jobDeadlineMs: 10_000 });
        breakers.get('market').recordFailure('HTTP 503');
        now = 1_000;

        const trial = orchestrator.submit('imatinib', { agents: ['market'] });
        const refused = orchestrator.submit('metformin', { agents: ['market'] });

        expect(market.liveCalls).toBe(1);
        const refusedJob = await orchestrator.waitForSettlement(refused);
        expect(refusedJob.tasks[0]).toMatchObject({ subStatus: 'FALLBACK_USED', source: 'FALLBACK' });
        expect(orchestrator.status(trial).perAgent).toEqual([{ name: 'market', subStatus: 'RUNNING', source: null }]);
        expect(breakers.get('market').snapshot()).toMatchObject({ state: 'HALF_OPEN', trialInFlight: true });

        await orchestrator.shutdown();
        await new Promise((resolve) => setTimeout(resolve, 0));
        expect(market.liveCalls).toBe(1);
        expect(breakers.get('market').snapshot()).toMatchObject({ state: 'HALF_OPEN', trialInFlight: false });
    });

    it('caps a job deadline beyond the timer range instead of expiring at once', async () => {
        const market = new ScriptedAgent('market', {
            live: async (query) => {
                await new Promise((resolve) => setTimeout(resolve, 20));
                return liveResult('market', `market live insight for ${query}`);
            },
        });
        const { orchestrator, store } = buildEngine([market], { jobDeadlineMs: 3_000_000_000 });
        const submittedAt = Date.now();

        const jobId = orchestrator.submit('imatinib', { agents: ['market'] });
        const job = await orchestrator.waitForSettlement(jobId);

        expect(job.status).toBe('COMPLETED');
        expect(job.tasks[0]).toMatchObject({ subStatus: 'SUCCEEDED', source: 'LIVE' });
        const deadlineAt = Date.parse(store.get(jobId)?.deadlineAt ?? '');
        expect(deadlineAt - submittedAt).toBeGreaterThanOrEqual(2_147_483_647);
        expect(deadlineAt - submittedAt).toBeLessThan(3_000_000_000);
    });

    it('rejects unknown agents before creating a job', () => {
        const { orchestrator, store } = buildEngine(allAgents());

        const error = catchError(() => orchestrator.submit('imatinib', { agents: ['market', 'astrology'] }));

        expect(error).toBeInstanceOf(OrchestrationError);
        expect(error).toMatchObject({ code: 'INVALID_QUERY', message: "Unknown agent 'astrology'." });
        expect(store.countByStatus()).toEqual({ PENDING: 0, RUNNING: 0, COMPLETED: 0, PARTIAL: 0, FAILED: 0 });
    });

    it.each([
        ['an empty query', ''],
        ['a blank query', '   '],
        ['a non-string query', 42],
        ['an over-long query', 'a'.repeat(501)],
    ])('rejects %s', (_label, query) => {
        const { orchestrator } = buildEngine(allAgents());

        expect(catchError(() => orchestrator.submit(query))).toMatchObject({ code: 'INVALID_QUERY' });
    });

    it('rejects an unknown analysis type and an empty agent list', () => {
        const { orchestrator } = buildEngine(allAgents());

        expect(catchError(() => orchestrator.submit('imatinib', { analysisType: 'astrology_focus' })))
            .toMatchObject({ code: 'INVALID_QUERY', message: "Unknown analysis type 'astrology_focus'." });
        expect(catchError(() => orchestrator.submit('imatinib', { agents: [] })))
            .toMatchObject({ code: 'INVALID_QUERY' });
    });

    it('settles PARTIAL when one agent hangs past the job deadline', async () => {
        const agents = AGENT_NAMES.map((name) => name === 'patent'
            ? new ScriptedAgent(name, { timeoutMs: 10_000, live: (_query, context) => hangUntilAborted(context) })
            : new ScriptedAgent(name));
        const { orchestrator, breakers } = buildEngine(agents, { jobDeadlineMs: 50 });

        const jobId = orchestrator.submit('imatinib');
        const job = await orchestrator.waitForSettlement(jobId);
        const report = orchestrator.result(jobId);

        expect(job.status).toBe('PARTIAL');
        expect(report.coverageRatio).toBeCloseTo(0.9);
        expect(report.agents.patent).toEqual({
            outcome: 'failure',
            subStatus: 'TIMED_OUT',
            source: null,
            error: { code: 'AGENT_TIMEOUT', message: 'Job deadline elapsed before the agent settled.' },
        });
        expect(report.summary).toContain('- **patent**: TIMED_OUT (AGENT_TIMEOUT) Job deadline elapsed before the agent settled.');

        // The cancelled call reports back to its breaker after the job has settled.
        await new Promise((resolve) => setTimeout(resolve, 0));
        expect(breakers.get('patent').snapshot().consecutiveFailures).toBe(1);
    });

    it('fails the job when no agent produces usable data', async () => {
        const { orchestrator } = buildEngine([
            new ScriptedAgent('exim', {
                fallback: null,
                live: async () => {
                    throw new Error('socket hang up');
                },
            }),
        ]);

        const jobId = orchestrator.submit('imatinib', { agents: ['exim'] });
        const job = await orchestrator.waitForSettlement(jobId);

        expect(job.status).toBe('FAILED');
        expect(orchestrator.result(jobId)).toMatchObject({ compositeStatus: 'FAILED', coverageRatio: 0, failed: 1 });
        expect(job.errors).toMatchObject([{ agent: 'exim', code: 'AGENT_INTERNAL_ERROR', message: 'socket hang up' }]);
    });

    it('returns the same report on every result call', async () => {
        const { orchestrator } = buildEngine(allAgents());

        const jobId = orchestrator.submit('metformin', { agents: ['clinical', 'literature'] });
        await orchestrator.waitForSettlement(jobId);

        expect(orchestrator.result(jobId)).toEqual(orchestrator.result(jobId));
    });

    it('replays a recent live result as CACHED when the circuit later opens', async () => {
        const market = new ScriptedAgent('market');
        const { orchestrator, breakers } = buildEngine([market]);

        const first = orchestrator.submit('Imatinib', { agents: ['market'] });
        await orchestrator.waitForSettlement(first);
        breakers.get('market').recordFailure('HTTP 503');

        const second = orchestrator.submit('  imatinib ', { agents: ['market'] });
        await orchestrator.waitForSettlement(second);

        expect(market.liveCalls).toBe(1);
        expect(market.fallbackCalls).toBe(0);
        expect(orchestrator.result(second).agents.market).toMatchObject({
            outcome: 'result',
            subStatus: 'FALLBACK_USED',
            source: 'FALLBACK',
            result: { source: 'CACHED', confidence: 'medium', insights: 'market live insight for Imatinib' },
        });
    });

    it('expands an analysis type into its preset agents', () => {
        const { orchestrator, store } = buildEngine(allAgents());

        const jobId = orchestrator.submit('imatinib', { analysisType: 'patent_focus' });

        expect(orchestrator.status(jobId).perAgent.map((entry) => entry.name))
            .toEqual(['patent', 'clinical', 'internal', 'literature', 'nlp_analysis']);
        expect(store.get(jobId)?.analysisType).toBe('patent_focus');
        return orchestrator.shutdown();
    });

    it('uses the configured default agents and de-duplicates explicit lists', async () => {
        const { orchestrator } = buildEngine(allAgents(), { defaultAgents: ['web', 'market'] });

        const defaulted = orchestrator.submit('imatinib');
        const explicit = orchestrator.submit('imatinib', { agents: ['exim', 'exim', 'patent'] });

        expect(orchestrator.status(defaulted).perAgent.map((entry) => entry.name)).toEqual(['web', 'market']);
        expect(orchestrator.status(explicit).perAgent.map((entry) => entry.name)).toEqual(['exim', 'patent']);
        await orchestrator.shutdown();
    });

    it('forwards agent options unchanged', async () => {
        const literature = new ScriptedAgent('literature');
        const { orchestrator } = buildEngine([literature]);

        const jobId = orchestrator.submit('imatinib', { agents: ['literature'], agentOptions: { maxResults: 5 } });
        await orchestrator.waitForSettlement(jobId);

        expect(literature.lastOptions).toEqual({ maxResults: 5 });
    });

    it('throws NOT_FOUND for unknown job ids', () => {
        const { orchestrator } = buildEngine(allAgents());

        expect(catchError(() => orchestrator.status('no-such-job'))).toMatchObject({ code: 'NOT_FOUND' });
        expect(catchError(() => orchestrator.result('no-such-job'))).toMatchObject({ code: 'NOT_FOUND' });
    });

    it('settles in-flight jobs on shutdown and reports diagnostics', async () => {
        const { orchestrator } = buildEngine([
            new ScriptedAgent('nlp_analysis', { timeoutMs: 10_000, live: (_query, context) => hangUntilAborted(context) }),
        ], { jobDeadlineMs: 10_000 });

        const jobId = orchestrator.submit('imatinib', { agents: ['nlp_analysis'] });
        expect(orchestrator.diagnostics().inFlight).toBe(1);

        await orchestrator.shutdown();

        const job = await orchestrator.waitForSettlement(jobId);
        expect(job.status).toBe('FAILED');
        expect(job.tasks[0]).toMatchObject({
            subStatus: 'TIMED_OUT',
            error: { code: 'AGENT_TIMEOUT', message: 'Dispatch was cancelled.' },
        });

        const diagnostics = orchestrator.diagnostics();
        expect(diagnostics.inFlight).toBe(0);
        expect(diagnostics.jobs.FAILED).toBe(1);
        expect(diagnostics.breakers).toEqual([expect.objectContaining({ agent: 'nlp_analysis', state: 'CLOSED' })]);
    });

    it('reads diagnostics without creating or advancing breakers', () => {
        let now = 0;
        const breakers = new CircuitBreakerRegistry({ failureThreshold: 1, openDurationMs: 1_000, now: () => now });
        const { orchestrator } = buildEngine([new ScriptedAgent('market'), new ScriptedAgent('exim')], { breakers });
        const transitions: string[] = [];
        breakers.onTransition((transition) => transitions.push(`${transition.agent}:${transition.to}`));
        breakers.get('exim').recordFailure('HTTP 500');
        now = 5_000;

        const diagnostics = orchestrator.diagnostics();

        expect(diagnostics.breakers.map((breaker) => [breaker.agent, breaker.state])).toEqual([
            ['market', 'CLOSED'],
            ['exim', 'HALF_OPEN'],
        ]);
        expect(breakers.has('market')).toBe(false);
        expect(transitions).toEqual(['exim:OPEN']);
    });

    it('runs the same lifecycle on the SQLite job store', async () => {
        const db = openDatabase(':memory:');
        const { orchestrator } = buildEngine(
            [new ScriptedAgent('market'), new ScriptedAgent('exim', { liveEnabled: false })],
            { store: new SqliteJobStore(db) },
        );

        const jobId = orchestrator.submit('metformin', { agents: ['market', 'exim'] });
        const job = await orchestrator.waitForSettlement(jobId);

        expect(job.status).toBe('COMPLETED');
        expect(job.tasks.map((task) => [task.agent, task.subStatus, task.source])).toEqual([
            ['market', 'SUCCEEDED', 'LIVE'],
            ['exim', 'FALLBACK_USED', 'FALLBACK'],
        ]);
        expect(orchestrator.result(jobId).agents.exim).toMatchObject({ result: { insights: 'exim curated insight' } });
        db.close();
    });
});
