import { afterEach, describe, expect, it, vi } from 'vitest';
import { validateRuntimeConfig, assertRuntimeConfig } from '../../src/config/env-validator.js';
import { CONFIG_SCHEMA } from '../../src/config/env-schema.js';
import { AGENT_NAMES } from '../../src/types/agents.js';

const fixedNow = () => new Date('2026-01-01T00:00:00.000Z');

function issueFor(key: string) {
  return validateRuntimeConfig(fixedNow).issues.find((issue) => issue.key === key);
}

describe('CONFIG_SCHEMA', () => {
  it('contains unique key entries', () => {
    const keys = CONFIG_SCHEMA.map((s) => s.key);
    expect(keys.length).toBe(new Set(keys).size);
  });

  it('all conditional entries have a condition defined', () => {
    expect(CONFIG_SCHEMA.filter((s) => s.class === 'conditional' && !s.condition)).toHaveLength(0);
  });

  it('declares endpoint, key and timeout entries for every agent', () => {
    for (const agent of AGENT_NAMES) {
      const prefix = agent.toUpperCase();
      const keys = CONFIG_SCHEMA.filter((s) => s.key.startsWith(`${prefix}_`)).map((s) => s.key);
      expect(keys).toEqual([`${prefix}_API_URL`, `${prefix}_API_KEY`, `${prefix}_TIMEOUT_MS`]);
    }
  });
});

describe('validateRuntimeConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('passes with defaults and stamps the validation time', () => {
    const result = validateRuntimeConfig(fixedNow);

    expect(result.ok).toBe(true);
    expect(result.validatedAt).toBe('2026-01-01T00:00:00.000Z');
  });

  it('reports malformed plain values as format errors', () => {
    vi.stubEnv('API_PORT', '70000');
    vi.stubEnv('ENABLE_ML_PREDICTION', 'maybe');
    vi.stubEnv('PATENT_TIMEOUT_MS', '-5');

    expect(validateRuntimeConfig(fixedNow).ok).toBe(false);
    expect(issueFor('API_PORT')?.message).toBe("API_PORT must be an integer in range 1-65535, got '70000'.");
    expect(issueFor('ENABLE_ML_PREDICTION')?.message).toBe("ENABLE_ML_PREDICTION must be a boolean, got 'maybe'.");
    expect(issueFor('PATENT_TIMEOUT_MS')).toMatchObject({
      class: 'format_error',
      message: "PATENT_TIMEOUT_MS must be a positive integer, got '-5'.",
      remediation: 'Set PATENT_TIMEOUT_MS to a positive integer number of milliseconds.',
    });
  });

  it('rejects durations longer than a timer can hold', () => {
    vi.stubEnv('JOB_DEADLINE_MS', '3000000000');
    vi.stubEnv('AGENT_TIMEOUT_MS', '2147483648');
    vi.stubEnv('MARKET_TIMEOUT_MS', '2147483647');

    expect(validateRuntimeConfig(fixedNow).ok).toBe(false);
    expect(issueFor('JOB_DEADLINE_MS')).toMatchObject({
      class: 'format_error',
      message: "JOB_DEADLINE_MS must be at most 2147483647, got '3000000000'.",
    });
    expect(issueFor('AGENT_TIMEOUT_MS')?.message).toBe("AGENT_TIMEOUT_MS must be at most 2147483647, got '2147483648'.");
    expect(issueFor('MARKET_TIMEOUT_MS')).toBeUndefined();
  });

  it('checks agent endpoints, default agents and the sweep schedule', () => {
    vi.stubEnv('WEB_API_URL', 'ftp://web.example.test');
    vi.stubEnv('EXIM_API_URL', 'not a url');
    vi.stubEnv('DEFAULT_AGENTS', 'market,astrology');
    vi.stubEnv('RETENTION_SWEEP_CRON', 'every minute');

    expect(issueFor('WEB_API_URL')?.message).toBe("WEB_API_URL must use http or https, got 'ftp:'.");
    expect(issueFor('EXIM_API_URL')?.message).toBe('EXIM_API_URL must be an absolute URL.');
    expect(issueFor('DEFAULT_AGENTS')?.message).toBe('DEFAULT_AGENTS names unknown agent(s): astrology.');
    expect(issueFor('RETENTION_SWEEP_CRON')?.message)
      .toBe("RETENTION_SWEEP_CRON is not a valid cron expression: 'every minute'.");
  });

  it('warns about a live agent without credentials without failing validation', () => {
    vi.stubEnv('CLINICAL_API_URL', 'https://clinical.example.test');

    const result = validateRuntimeConfig(fixedNow);

    expect(result.ok).toBe(true);
    expect(result.activeFeatures).toContain('agent-live:clinical');
    expect(result.presentKeys).toContain('CLINICAL_API_URL');
    expect(result.issues.find((issue) => issue.key === 'CLINICAL_API_KEY')).toMatchObject({
      class: 'missing_conditional',
      message: "'CLINICAL_API_KEY' is not set; live requests will be sent without an Authorization header.",
    });
  });

  it('never echoes secret values', () => {
    vi.stubEnv('CLINICAL_API_URL', 'https://clinical.example.test');
    vi.stubEnv('CLINICAL_API_KEY', 'test-secret-value');

    const result = validateRuntimeConfig(fixedNow);

    expect(result.presentKeys).toContain('CLINICAL_API_KEY');
    expect(result.issues.find((issue) => issue.key === 'CLINICAL_API_KEY')).toBeUndefined();
    expect(JSON.stringify(result)).not.toContain('test-secret-value');
  });

  it('flags a max open duration below the base open duration', () => {
    vi.stubEnv('BREAKER_OPEN_DURATION_MS', '60000');
    vi.stubEnv('BREAKER_MAX_OPEN_DURATION_MS', '30000');

    expect(issueFor('BREAKER_MAX_OPEN_DURATION_MS')?.message)
      .toBe('BREAKER_MAX_OPEN_DURATION_MS (30000) is below BREAKER_OPEN_DURATION_MS (60000).');
  });
});

describe('assertRuntimeConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('throws with every format error joined', () => {
    vi.stubEnv('JOB_STORE', 'redis');

    expect(() => assertRuntimeConfig(fixedNow))
      .toThrow("Runtime config validation failed: JOB_STORE must be 'memory' or 'sqlite', got 'redis'.");
  });

  it('returns the result when only warnings remain', () => {
    vi.stubEnv('MARKET_API_URL', 'https://market.example.test');

    expect(assertRuntimeConfig(fixedNow).issues.map((issue) => issue.class)).toEqual(['missing_conditional']);
  });
});
