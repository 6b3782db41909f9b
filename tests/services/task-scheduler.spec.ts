import { afterEach, describe, expect, it, vi } from 'vitest';
import { TaskScheduler } from '../../src/services/task-scheduler.js';
import { RetentionSweeper } from '../../src/services/retention-sweeper.js';
import { ScriptedAgent, buildEngine, hangUntilAborted } from '../harness/scripted-agents.js';

describe('TaskScheduler', () => {
  let scheduler: TaskScheduler;

  afterEach(() => {
    scheduler.stopAll();
  });

  it('runs a pass on demand and records its timing', async () => {
    const ticks = [1_000, 1_250];
    scheduler = new TaskScheduler(() => ticks.shift() ?? 0);
    const handler = vi.fn(async () => undefined);
    scheduler.register({ id: 'job-retention', cronExpression: '*/1 * * * *', description: 'Evict', handler, autoStart: false });

    const run = await scheduler.runNow('job-retention');

    expect(run).toEqual({ ran: true, durationMs: 250, error: null });
    expect(handler).toHaveBeenCalledTimes(1);
    expect(scheduler.listTasks()).toEqual([{
      id: 'job-retention',
      cronExpression: '*/1 * * * *',
      description: 'Evict',
      status: 'stopped',
      runs: 1,
      skippedRuns: 0,
      lastRunAt: '1970-01-01T00:00:01.000Z',
      lastDurationMs: 250,
      lastError: null,
    }]);
  });

  it('records a failing pass and clears the error once a later pass succeeds', async () => {
    scheduler = new TaskScheduler();
    const handler = vi.fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error('disk full'))
      .mockResolvedValueOnce(undefined);
    scheduler.register({ id: 'broken', cronExpression: '*/5 * * * *', description: 'Flaky', handler, autoStart: false });

    await expect(scheduler.runNow('broken')).resolves.toMatchObject({ ran: true, error: 'disk full' });
    expect(scheduler.listTasks()[0]).toMatchObject({ runs: 1, lastError: 'disk full' });

    await expect(scheduler.runNow('broken')).resolves.toMatchObject({ ran: true, error: null });
    expect(scheduler.listTasks()[0]).toMatchObject({ runs: 2, lastError: null });
  });

  it('skips a pass while the previous one is still running', async () => {
    scheduler = new TaskScheduler();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    scheduler.register({ id: 'slow', cronExpression: '0 * * * *', description: 'Slow', handler: () => gate, autoStart: false });

    const first = scheduler.runNow('slow');
    const second = await scheduler.runNow('slow');

    expect(second).toEqual({ ran: false });
    expect(scheduler.listTasks()[0]).toMatchObject({ status: 'running', runs: 0, skippedRuns: 1 });
    release();
    await expect(first).resolves.toMatchObject({ ran: true, error: null });
    expect(scheduler.listTasks()[0]).toMatchObject({ status: 'stopped', runs: 1, skippedRuns: 1 });
  });

  it('rejects duplicate ids, invalid cron expressions and unknown tasks', async () => {
    scheduler = new TaskScheduler();
    scheduler.register({ id: 'a', cronExpression: '0 * * * *', description: 'A', handler: () => undefined, autoStart: false });

    expect(() => scheduler.register({ id: 'a', cronExpression: '0 * * * *', description: 'A', handler: () => undefined }))
      .toThrow("[TaskScheduler] Task 'a' is already registered.");
    expect(() => scheduler.register({ id: 'b', cronExpression: 'every minute', description: 'B', handler: () => undefined }))
      .toThrow("[TaskScheduler] Invalid cron expression for task 'b': every minute");
    await expect(scheduler.runNow('missing')).rejects.toThrow("[TaskScheduler] Task 'missing' is not registered.");
  });

  it('schedules auto-started tasks and stops them all', () => {
    scheduler = new TaskScheduler();
    scheduler.register({ id: 'sweep', cronExpression: '*/1 * * * *', description: 'Sweep', handler: () => undefined });

    expect(scheduler.listTasks().map((task) => [task.id, task.status])).toEqual([['sweep', 'idle']]);
    scheduler.stopAll();
    expect(scheduler.listTasks().map((task) => [task.id, task.status])).toEqual([['sweep', 'stopped']]);
  });
});

describe('RetentionSweeper', () => {
  it('evicts aged finished jobs and never a running one', async () => {
    const engine = buildEngine([
      new ScriptedAgent('market'),
      new ScriptedAgent('web', { timeoutMs: 10_000, live: (_query, context) => hangUntilAborted(context) }),
    ], { jobDeadlineMs: 10_000 });
    const finished = engine.orchestrator.submit('imatinib', { agents: ['market'] });
    await engine.orchestrator.waitForSettlement(finished);
    const running = engine.orchestrator.submit('imatinib', { agents: ['web'] });
    const now = Date.now() + 60_000;

    const result = new RetentionSweeper(engine.store, { maxAgeMs: 1_000, maxJobs: 100 }, () => now).sweep();

    expect(result).toEqual({ evicted: [finished], sweptAt: new Date(now).toISOString() });
    expect(engine.store.get(finished)).toBeUndefined();
    expect(engine.store.get(running)?.status).toBe('RUNNING');
    await engine.orchestrator.shutdown();
  });

  it('trims finished jobs beyond the count limit oldest first', async () => {
    const engine = buildEngine([new ScriptedAgent('market')]);
    const ids: string[] = [];
    for (let index = 0; index < 3; index += 1) {
      const jobId = engine.orchestrator.submit(`query ${index}`, { agents: ['market'] });
      await engine.orchestrator.waitForSettlement(jobId);
      ids.push(jobId);
    }

    const result = new RetentionSweeper(engine.store, { maxAgeMs: 3_600_000, maxJobs: 1 }).sweep();

    expect(result.evicted).toEqual([ids[0], ids[1]]);
    expect(engine.store.get(ids[2])?.status).toBe('COMPLETED');
  });
});
