import type {
  AgentCapability,
  AgentErrorKind,
  AgentInvocationOptions,
  AgentName,
  AgentResult,
} from '../types/agents.js';
import type { AgentTaskErrorCode, AgentTaskUpdate, TaskUpdateOutcome } from '../types/orchestration.js';
import { AgentError, errorMessage, toAgentError } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import { clampTimerMs } from '../utils/retry.js';
import type { AgentRegistry } from './agent-registry.js';
import type { CircuitBreakerRegistry } from './circuit-breaker.js';
import type { JobStateStore } from './job-store.js';
import type { LiveResultCache } from './result-cache.js';

const ERROR_CODE_BY_KIND: Record<AgentErrorKind, AgentTaskErrorCode> = {
  TIMEOUT: 'AGENT_TIMEOUT',
  UPSTREAM_ERROR: 'AGENT_UPSTREAM_ERROR',
  INVALID_INPUT: 'AGENT_INVALID_INPUT',
  INTERNAL: 'AGENT_INTERNAL_ERROR',
};

export type DispatchAbortReason = 'deadline' | 'shutdown';

export interface DispatchRequest {
  jobId: string;
  query: string;
  agents: readonly AgentName[];
  options: AgentInvocationOptions;
  /** Epoch millis at which outstanding tasks are cancelled and force-marked TIMED_OUT. */
  deadlineAt: number;
  /** Aborting this settles the job immediately, exactly like the deadline. */
  signal?: AbortSignal;
}

export interface DispatchOutcome {
  settledBy: 'all_terminal' | DispatchAbortReason;
  /** Agents force-marked TIMED_OUT at settlement. */
  timedOut: AgentName[];
}

export interface AgentDispatcherDeps {
  registry: AgentRegistry;
  breakers: CircuitBreakerRegistry;
  store: JobStateStore;
  cache?: LiveResultCache;
}

interface TaskRun {
  jobId: string;
  query: string;
  options: AgentInvocationOptions;
  deadlineAt: number;
  jobSignal: AbortSignal;
}

/**
 * Fans one job out to its agents. Every invocation starts before any is
 * awaited; each settle is written to the store as soon as it happens.
 */
export class AgentDispatcher {
  readonly #registry: AgentRegistry;
  readonly #breakers: CircuitBreakerRegistry;
  readonly #store: JobStateStore;
  readonly #cache: LiveResultCache | undefined;

  constructor(deps: AgentDispatcherDeps) {
    this.#registry = deps.registry;
    this.#breakers = deps.breakers;
    this.#store = deps.store;
    this.#cache = deps.cache;
  }

  async dispatch(request: DispatchRequest): Promise<DispatchOutcome> {
    const jobController = new AbortController();
    const settled = new Set<AgentName>();
    const run: TaskRun = {
      jobId: request.jobId,
      query: request.query,
      options: request.options,
      deadlineAt: request.deadlineAt,
      jobSignal: jobController.signal,
    };

    const tasks = request.agents.map((agent) =>
      this.#runTask(agent, run).finally(() => {
        settled.add(agent);
      }),
    );

    let timeoutHandle: NodeJS.Timeout | null = null;
    let markCancelled: () => void = () => undefined;
    const cutoff = new Promise<DispatchAbortReason>((resolve) => {
      timeoutHandle = setTimeout(() => resolve('deadline'), clampTimerMs(request.deadlineAt - Date.now()));
      markCancelled = () => resolve('shutdown');
    });
    if (request.signal?.aborted) {
      markCancelled();
    } else {
      request.signal?.addEventListener('abort', markCancelled, { once: true });
    }

    try {
      const winner = await Promise.race([
        Promise.allSettled(tasks).then(() => 'all_terminal' as const),
        cutoff,
      ]);

      if (winner === 'all_terminal') {
        return { settledBy: winner, timedOut: [] };
      }

      const outstanding = request.agents.filter((agent) => !settled.has(agent));
      for (const agent of outstanding) {
        this.#write(request.jobId, agent, {
          subStatus: 'TIMED_OUT',
          error: {
            code: 'AGENT_TIMEOUT',
            message: winner === 'deadline' ? 'Job deadline elapsed before the agent settled.' : 'Dispatch was cancelled.',
          },
        });
      }
      jobController.abort(winner);

      if (outstanding.length > 0) {
        void logThought(
          `[Dispatcher] Job ${request.jobId} settled by ${winner}; timed out: ${outstanding.join(', ')}.`,
        );
      }
      return { settledBy: winner, timedOut: outstanding };
    } finally {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      request.signal?.removeEventListener('abort', markCancelled);
    }
  }

  async #runTask(agent: AgentName, run: TaskRun): Promise<void> {
    try {
      await this.#settleTask(agent, run);
    } catch (error) {
      // Only a store failure can land here; the job deadline still settles the task.
      void logThought(`[Dispatcher] Task '${agent}' of job ${run.jobId} could not be recorded: ${errorMessage(error)}`);
    }
  }

  async #settleTask(agent: AgentName, run: TaskRun): Promise<void> {
    const capability = this.#registry.get(agent);
    if (!capability) {
      this.#write(run.jobId, agent, {
        subStatus: 'FAILED',
        error: { code: 'AGENT_INTERNAL_ERROR', message: `Agent '${agent}' is not registered.` },
      });
      return;
    }

    this.#write(run.jobId, agent, { subStatus: 'RUNNING' });

    if (!capability.liveEnabled) {
      await this.#settleWithFallback(capability, run, null);
      return;
    }

    const breaker = this.#breakers.get(agent);
    const decision = breaker.tryAcquire();
    if (!decision.allowed) {
      await this.#settleWithFallback(capability, run, null);
      return;
    }

    let result: AgentResult;
    try {
      result = await this.#invokeWithTimeout(capability, run);
    } catch (error) {
      const agentError = toAgentError(error);
      const cancelledBy: unknown = run.jobSignal.aborted ? run.jobSignal.reason : undefined;

      if (cancelledBy === 'shutdown') {
        breaker.release();
        return;
      }

      switch (agentError.kind) {
        case 'TIMEOUT':
        case 'UPSTREAM_ERROR':
          breaker.recordFailure(agentError.message);
          if (cancelledBy) {
            return;
          }
          await this.#settleWithFallback(capability, run, agentError);
          return;
        case 'INVALID_INPUT':
          breaker.recordSuccess();
          break;
        case 'INTERNAL':
          breaker.release();
          break;
      }

      this.#write(run.jobId, agent, {
        subStatus: 'FAILED',
        source: 'LIVE',
        error: { code: ERROR_CODE_BY_KIND[agentError.kind], message: agentError.message },
      });
      return;
    }

    breaker.recordSuccess();
    const live: AgentResult = { ...result, agent, source: 'LIVE' };
    this.#cache?.remember(agent, run.query, live);
    this.#write(run.jobId, agent, { subStatus: 'SUCCEEDED', source: 'LIVE', result: live });
  }

  /** Cache first, then the agent's own fallback path. */
  async #settleWithFallback(
    capability: AgentCapability,
    run: TaskRun,
    liveError: AgentError | null,
  ): Promise<void> {
    const agent = capability.name;
    let result = this.#cache?.recall(agent, run.query);
    let fallbackError: AgentError | null = null;

    if (!result && capability.fallback) {
      try {
        const fallback = await capability.fallback(run.query, run.options);
        result = { ...fallback, agent, source: 'FALLBACK' };
      } catch (error) {
        fallbackError = toAgentError(error);
      }
    }

    if (result) {
      this.#write(run.jobId, agent, { subStatus: 'FALLBACK_USED', source: 'FALLBACK', result });
      return;
    }

    const cause = liveError ?? fallbackError;
    const message = [liveError?.message, fallbackError?.message ?? (capability.fallback ? null : 'No fallback path available.')]
      .filter((part): part is string => !!part)
      .join(' ');
    this.#write(run.jobId, agent, {
      subStatus: 'FAILED',
      source: 'FALLBACK',
      error: {
        code: cause ? ERROR_CODE_BY_KIND[cause.kind] : 'AGENT_UPSTREAM_ERROR',
        message: message || `No data available for '${agent}'.`,
      },
    });
  }

  async #invokeWithTimeout(capability: AgentCapability, run: TaskRun): Promise<AgentResult> {
    const timeoutMs = Math.max(1, clampTimerMs(capability.timeoutMs));
    const taskController = new AbortController();
    const forwardAbort = (): void => taskController.abort(run.jobSignal.reason);
    run.jobSignal.addEventListener('abort', forwardAbort, { once: true });

    let timeoutHandle: NodeJS.Timeout | null = null;
    const guard = new Promise<never>((_, reject) => {
      timeoutHandle = setTimeout(() => {
        taskController.abort('timeout');
        reject(new AgentError('TIMEOUT', `Agent '${capability.name}' timed out after ${timeoutMs}ms.`));
      }, timeoutMs);
      taskController.signal.addEventListener(
        'abort',
        () => reject(new AgentError('TIMEOUT', `Agent '${capability.name}' was cancelled.`)),
        { once: true },
      );
    });

    try {
      return await Promise.race([
        capability.invoke(run.query, run.options, {
          deadline: Math.min(Date.now() + timeoutMs, run.deadlineAt),
          signal: taskController.signal,
        }),
        guard,
      ]);
    } finally {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      run.jobSignal.removeEventListener('abort', forwardAbort);
    }
  }

  #write(jobId: string, agent: AgentName, update: AgentTaskUpdate): TaskUpdateOutcome {
    const outcome = this.#store.recordTaskUpdate(jobId, agent, update);
    if (!outcome.accepted && outcome.reason !== 'LATE_UPDATE') {
      void logThought(`[Dispatcher] Update '${update.subStatus}' for '${agent}' in job ${jobId} rejected: ${outcome.reason}.`);
    }
    return outcome;
  }
}
