/**
 * Runtime configuration validator.
 *
 * Produces structured, redaction-safe diagnostics for:
 *   - Live agents whose credentials are absent.
 *   - Format/type violations on plain values.
 *   - A machine-readable summary suitable for API responses and the CLI.
 *
 * No secret values are ever included in the output.
 */

import cron from 'node-cron';
import { isAgentName } from '../types/agents.js';
import { MAX_TIMER_MS } from '../utils/retry.js';
import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigKeySpec } from './env-schema.js';
import { getConfigValue } from './json-config.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_conditional' | 'format_error';

export interface ConfigIssue {
  /** Affected config key. */
  key: string;
  /** Semantic category for automation. */
  class: ConfigIssueClass;
  /** Human-readable description of the problem. */
  message: string;
  /** Actionable remediation hint (no secret values). */
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when no value is malformed. */
  ok: boolean;
  /** Keys with a non-empty value. */
  presentKeys: string[];
  /** Structured issues, guaranteed not to contain secret values. */
  issues: ConfigIssue[];
  /** Active feature gates, e.g. `agent-live:market`. */
  activeFeatures: string[];
  /** ISO-8601 timestamp of validation run. */
  validatedAt: string;
}

// ── Internal helpers ─────────────────────────────────────────────────────────

const POSITIVE_INT_KEYS = new Set([
  'AGENT_TIMEOUT_MS',
  'JOB_DEADLINE_MS',
  'MAX_QUERY_LENGTH',
  'CACHE_MAX_AGE_HOURS',
  'BREAKER_FAILURE_THRESHOLD',
  'BREAKER_OPEN_DURATION_MS',
  'BREAKER_MAX_OPEN_DURATION_MS',
  'RETENTION_MAX_AGE_MS',
  'RETENTION_MAX_JOBS',
]);

const BOOLEAN_VALUES = new Set(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']);

function isPositiveInteger(raw: string): boolean {
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0;
}

/**
 * Validate format constraints for a key. Returns an issue string if invalid,
 * null if ok. Secret values are never echoed.
 */
function formatError(spec: ConfigKeySpec, raw: string): string | null {
  if (spec.type !== 'env') {
    return null;
  }

  const value = raw.trim();
  const isTimerKey = spec.key === 'JOB_DEADLINE_MS' || spec.key.endsWith('_TIMEOUT_MS');
  if (POSITIVE_INT_KEYS.has(spec.key) || isTimerKey) {
    if (!isPositiveInteger(value)) {
      return `${spec.key} must be a positive integer, got '${value}'.`;
    }
    if (isTimerKey && Number(value) > MAX_TIMER_MS) {
      return `${spec.key} must be at most ${MAX_TIMER_MS}, got '${value}'.`;
    }
    return null;
  }
  if (spec.key.startsWith('ENABLE_')) {
    return BOOLEAN_VALUES.has(value.toLowerCase()) ? null : `${spec.key} must be a boolean, got '${value}'.`;
  }
  if (spec.key.endsWith('_API_URL')) {
    try {
      const url = new URL(value);
      return url.protocol === 'http:' || url.protocol === 'https:'
        ? null
        : `${spec.key} must use http or https, got '${url.protocol}'.`;
    } catch {
      return `${spec.key} must be an absolute URL.`;
    }
  }

  switch (spec.key) {
    case 'API_PORT': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
        return `API_PORT must be an integer in range 1-65535, got '${value}'.`;
      }
      break;
    }
    case 'JOB_STORE':
      if (value !== 'memory' && value !== 'sqlite') {
        return `JOB_STORE must be 'memory' or 'sqlite', got '${value}'.`;
      }
      break;
    case 'DEFAULT_AGENTS': {
      const names = value.split(',').map((name) => name.trim().toLowerCase()).filter(Boolean);
      const unknown = names.filter((name) => !isAgentName(name));
      if (names.length === 0) {
        return 'DEFAULT_AGENTS must name at least one agent.';
      }
      if (unknown.length > 0) {
        return `DEFAULT_AGENTS names unknown agent(s): ${unknown.join(', ')}.`;
      }
      break;
    }
    case 'RETENTION_SWEEP_CRON':
      if (!cron.validate(value)) {
        return `RETENTION_SWEEP_CRON is not a valid cron expression: '${value}'.`;
      }
      break;
    default:
      break;
  }

  return null;
}

function crossFieldIssues(): ConfigIssue[] {
  const open = Number(getConfigValue('BREAKER_OPEN_DURATION_MS'));
  const max = Number(getConfigValue('BREAKER_MAX_OPEN_DURATION_MS'));
  if (Number.isInteger(open) && Number.isInteger(max) && open > 0 && max > 0 && max < open) {
    return [{
      key: 'BREAKER_MAX_OPEN_DURATION_MS',
      class: 'format_error',
      message: `BREAKER_MAX_OPEN_DURATION_MS (${max}) is below BREAKER_OPEN_DURATION_MS (${open}).`,
      remediation: 'Raise BREAKER_MAX_OPEN_DURATION_MS or lower BREAKER_OPEN_DURATION_MS.',
    }];
  }
  return [];
}

/** A live gate is active when the agent's endpoint is configured. */
function detectActiveFeatures(): Set<string> {
  const active = new Set<string>();
  for (const spec of CONFIG_SCHEMA) {
    if (!spec.condition) {
      continue;
    }
    const agent = spec.condition.slice('agent-live:'.length);
    if (getConfigValue(`${agent.toUpperCase()}_API_URL`) !== undefined) {
      active.add(spec.condition);
    }
  }
  return active;
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Validate the runtime configuration (pharmascope.json plus environment).
 *
 * @param now - Injectable clock. Defaults to `new Date()`.
 */
export function validateRuntimeConfig(
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const presentKeys: string[] = [];
  const activeFeatures = detectActiveFeatures();

  for (const spec of CONFIG_SCHEMA) {
    const raw = getConfigValue(spec.key);

    if (raw === undefined) {
      if (spec.class === 'conditional' && spec.condition && activeFeatures.has(spec.condition)) {
        issues.push({
          key: spec.key,
          class: 'missing_conditional',
          message: `'${spec.key}' is not set; live requests will be sent without an Authorization header.`,
          remediation: spec.remediation,
        });
      }
      continue;
    }

    presentKeys.push(spec.key);
    const formatErr = formatError(spec, raw);
    if (formatErr) {
      issues.push({
        key: spec.key,
        class: 'format_error',
        message: formatErr,
        remediation: spec.remediation,
      });
    }
  }

  issues.push(...crossFieldIssues());

  return {
    ok: !issues.some((issue) => issue.class === 'format_error'),
    presentKeys: presentKeys.sort(),
    issues,
    activeFeatures: [...activeFeatures].sort(),
    validatedAt: now().toISOString(),
  };
}

/**
 * Run validation and throw when any value is malformed.
 *
 * Safe to call during startup. Never exposes secret values in the thrown error.
 */
export function assertRuntimeConfig(
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const result = validateRuntimeConfig(now);
  const formatIssues = result.issues.filter((issue) => issue.class === 'format_error');

  if (formatIssues.length > 0) {
    const reasons = formatIssues.map((issue) => issue.message).join(' | ');
    throw new Error(`Runtime config validation failed: ${reasons}`);
  }

  return result;
}
