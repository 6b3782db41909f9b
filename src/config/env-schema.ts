/**
 * Centralized registry of every configuration key the engine reads.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name (also mapped from pharmascope.json).
 *   - `type`        Whether the value is a sensitive secret or a plain env var.
 *   - `class`       'optional' | 'conditional'.
 *   - `scope`       Subsystem that owns the key.
 *   - `condition`   Feature gate that makes a conditional key applicable.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the key is missing or invalid.
 */

import { AGENT_NAMES, type AgentName } from '../types/agents.js';

export type ConfigKeyClass = 'optional' | 'conditional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope =
  | 'runtime'
  | 'orchestration'
  | 'breaker'
  | 'storage'
  | 'retention'
  | 'agents';

/**
 * Feature gate identifiers used by `condition`.
 * `agent-live:<name>` is active when that agent has a live endpoint configured.
 */
export type ConfigCondition = `agent-live:${AgentName}`;

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  scope: ConfigKeyScope;
  /** Applies only when class === 'conditional'. Identifies the feature gate. */
  condition?: ConfigCondition;
  description: string;
  remediation: string;
}

const CORE_KEYS: readonly ConfigKeySpec[] = [
  // ── Runtime ─────────────────────────────────────────────────────────────────
  {
    key: 'API_HOST',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Interface the HTTP API binds to (default: 0.0.0.0).',
    remediation: 'Set API_HOST=127.0.0.1 to keep the API local.',
  },
  {
    key: 'API_PORT',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Preferred listening port; the next 9 ports are tried when it is taken (default: 5000).',
    remediation: 'Set API_PORT to an integer in 1-65535, e.g. API_PORT=8080.',
  },

  // ── Orchestration ───────────────────────────────────────────────────────────
  {
    key: 'AGENT_TIMEOUT_MS',
    type: 'env',
    class: 'optional',
    scope: 'orchestration',
    description: 'Hard timeout for one live agent call (default: 10000).',
    remediation: 'Set AGENT_TIMEOUT_MS to a positive integer number of milliseconds.',
  },
  {
    key: 'JOB_DEADLINE_MS',
    type: 'env',
    class: 'optional',
    scope: 'orchestration',
    description: 'Overall job deadline; outstanding agents are marked TIMED_OUT when it elapses (default: 30000).',
    remediation: 'Set JOB_DEADLINE_MS to a positive integer number of milliseconds.',
  },
  {
    key: 'MAX_QUERY_LENGTH',
    type: 'env',
    class: 'optional',
    scope: 'orchestration',
    description: 'Longest accepted query, in characters (default: 500).',
    remediation: 'Set MAX_QUERY_LENGTH to a positive integer.',
  },
  {
    key: 'DEFAULT_AGENTS',
    type: 'env',
    class: 'optional',
    scope: 'orchestration',
    description: 'Comma-separated agents used when a submission names neither agents nor an analysis type (default: all).',
    remediation: `Use names from: ${AGENT_NAMES.join(', ')}.`,
  },
  {
    key: 'CACHE_MAX_AGE_HOURS',
    type: 'env',
    class: 'optional',
    scope: 'orchestration',
    description: 'How long a live result may be replayed on the fallback path (default: 24).',
    remediation: 'Set CACHE_MAX_AGE_HOURS to a positive integer.',
  },

  // ── Circuit breaker ─────────────────────────────────────────────────────────
  {
    key: 'BREAKER_FAILURE_THRESHOLD',
    type: 'env',
    class: 'optional',
    scope: 'breaker',
    description: 'Consecutive live failures that open an agent circuit (default: 3).',
    remediation: 'Set BREAKER_FAILURE_THRESHOLD to a positive integer.',
  },
  {
    key: 'BREAKER_OPEN_DURATION_MS',
    type: 'env',
    class: 'optional',
    scope: 'breaker',
    description: 'Initial time an open circuit waits before a half-open trial (default: 30000).',
    remediation: 'Set BREAKER_OPEN_DURATION_MS to a positive integer number of milliseconds.',
  },
  {
    key: 'BREAKER_MAX_OPEN_DURATION_MS',
    type: 'env',
    class: 'optional',
    scope: 'breaker',
    description: 'Cap for the doubled open duration after failed trials (default: 300000).',
    remediation: 'Set BREAKER_MAX_OPEN_DURATION_MS to at least BREAKER_OPEN_DURATION_MS.',
  },

  // ── Storage ─────────────────────────────────────────────────────────────────
  {
    key: 'JOB_STORE',
    type: 'env',
    class: 'optional',
    scope: 'storage',
    description: "Job store backend: 'memory' or 'sqlite' (default: memory).",
    remediation: "Set JOB_STORE to 'memory' or 'sqlite'.",
  },
  {
    key: 'DATABASE_PATH',
    type: 'env',
    class: 'optional',
    scope: 'storage',
    description: 'SQLite file used when JOB_STORE=sqlite (default: data/pharmascope.db).',
    remediation: 'Point DATABASE_PATH at a writable location.',
  },
  {
    key: 'FALLBACK_DATA_DIR',
    type: 'env',
    class: 'optional',
    scope: 'storage',
    description: 'Directory of curated <agent>.json fallback datasets (default: data/fallback).',
    remediation: 'Point FALLBACK_DATA_DIR at the directory holding the fallback datasets.',
  },

  // ── Retention ───────────────────────────────────────────────────────────────
  {
    key: 'RETENTION_MAX_AGE_MS',
    type: 'env',
    class: 'optional',
    scope: 'retention',
    description: 'Finished jobs older than this are evicted (default: 3600000).',
    remediation: 'Set RETENTION_MAX_AGE_MS to a positive integer number of milliseconds.',
  },
  {
    key: 'RETENTION_MAX_JOBS',
    type: 'env',
    class: 'optional',
    scope: 'retention',
    description: 'Maximum jobs kept; the oldest finished jobs beyond it are evicted (default: 100).',
    remediation: 'Set RETENTION_MAX_JOBS to a positive integer.',
  },
  {
    key: 'RETENTION_SWEEP_CRON',
    type: 'env',
    class: 'optional',
    scope: 'retention',
    description: "Cron expression for the retention sweep (default: '*/1 * * * *').",
    remediation: "Use a five-field cron expression, e.g. RETENTION_SWEEP_CRON='*/5 * * * *'.",
  },

  // ── Agent feature switches ──────────────────────────────────────────────────
  {
    key: 'ENABLE_ML_PREDICTION',
    type: 'env',
    class: 'optional',
    scope: 'agents',
    description: 'Allow live calls for the ML property prediction agent (default: true).',
    remediation: 'Set ENABLE_ML_PREDICTION to true or false.',
  },
  {
    key: 'ENABLE_GENERATIVE_AI',
    type: 'env',
    class: 'optional',
    scope: 'agents',
    description: 'Allow live calls for the generative candidate design agent (default: true).',
    remediation: 'Set ENABLE_GENERATIVE_AI to true or false.',
  },
  {
    key: 'ENABLE_NLP_ANALYSIS',
    type: 'env',
    class: 'optional',
    scope: 'agents',
    description: 'Allow live calls for the NLP synthesis agent (default: true).',
    remediation: 'Set ENABLE_NLP_ANALYSIS to true or false.',
  },
];

function agentKeys(agent: AgentName): ConfigKeySpec[] {
  const prefix = agent.toUpperCase();
  return [
    {
      key: `${prefix}_API_URL`,
      type: 'env',
      class: 'optional',
      scope: 'agents',
      description: `Live endpoint for the '${agent}' agent. Without it the agent answers from its fallback dataset.`,
      remediation: `Set ${prefix}_API_URL to an http(s) URL.`,
    },
    {
      key: `${prefix}_API_KEY`,
      type: 'secret',
      class: 'conditional',
      condition: `agent-live:${agent}`,
      scope: 'agents',
      description: `Bearer token sent to the '${agent}' live endpoint.`,
      remediation: `Set ${prefix}_API_KEY if the endpoint requires authentication.`,
    },
    {
      key: `${prefix}_TIMEOUT_MS`,
      type: 'env',
      class: 'optional',
      scope: 'agents',
      description: `Per-agent override of AGENT_TIMEOUT_MS for '${agent}'.`,
      remediation: `Set ${prefix}_TIMEOUT_MS to a positive integer number of milliseconds.`,
    },
  ];
}

/**
 * Complete inventory of configuration keys.
 * Consumed by `validateRuntimeConfig` for startup, CLI and health diagnostics.
 */
export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  ...CORE_KEYS,
  ...AGENT_NAMES.flatMap(agentKeys),
];

/** Quick lookup map by key name for O(1) resolution. */
export const CONFIG_SCHEMA_MAP: ReadonlyMap<string, ConfigKeySpec> = new Map(
  CONFIG_SCHEMA.map((spec) => [spec.key, spec]),
);
