import type { AgentName } from './agents.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

/** Outcome of asking a breaker whether a live call may proceed. */
export type CircuitDecision =
  | { allowed: true; trial: boolean }
  | { allowed: false; reason: 'OPEN' | 'TRIAL_IN_FLIGHT' };

export interface CircuitBreakerOptions {
  failureThreshold: number;
  openDurationMs: number;
  maxOpenDurationMs: number;
  /** Injected clock for tests. */
  now?: () => number;
}

/** Read-only view of one agent's breaker. */
export interface CircuitSnapshot {
  agent: AgentName;
  state: CircuitState;
  consecutiveFailures: number;
  lastTransitionAt: string;
  openUntil: string | null;
  openDurationMs: number;
  trialInFlight: boolean;
}

export interface CircuitTransition {
  agent: AgentName;
  from: CircuitState;
  to: CircuitState;
  reason: string;
  at: string;
}
