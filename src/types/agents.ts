/** Fixed catalog of agents known at startup. */
export const AGENT_NAMES = [
  'market',
  'exim',
  'patent',
  'clinical',
  'internal',
  'web',
  'literature',
  'ml_prediction',
  'generative_ai',
  'nlp_analysis',
] as const;

export type AgentName = (typeof AGENT_NAMES)[number];

export function isAgentName(value: string): value is AgentName {
  return (AGENT_NAMES as readonly string[]).includes(value);
}

export type AgentErrorKind = 'TIMEOUT' | 'UPSTREAM_ERROR' | 'INVALID_INPUT' | 'INTERNAL';

/** Where a result came from. CACHED is a recent live result replayed on the fallback path. */
export type ResultSource = 'LIVE' | 'FALLBACK' | 'CACHED';

export type ResultConfidence = 'high' | 'medium' | 'low';

/** Envelope every agent wraps its payload in. */
export interface AgentResult {
  agent: AgentName;
  confidence: ResultConfidence;
  source: ResultSource;
  /** ISO-8601 */
  generatedAt: string;
  /** Short human-readable finding, copied verbatim into the report summary. */
  insights?: string;
  payload: Record<string, unknown>;
}

/** Per-invocation knobs forwarded unchanged from the submission. */
export type AgentInvocationOptions = Record<string, unknown>;

export interface AgentInvocationContext {
  /** Epoch millis the agent must not block past. */
  deadline: number;
  signal: AbortSignal;
}

/** Uniform contract every agent implements. */
export interface AgentCapability {
  readonly name: AgentName;
  readonly displayName: string;
  /** Per-agent timeout for the live call. */
  readonly timeoutMs: number;
  /** False when the live source is unconfigured or disabled; dispatch then goes straight to fallback. */
  readonly liveEnabled: boolean;
  invoke(
    query: string,
    options: AgentInvocationOptions,
    context: AgentInvocationContext,
  ): Promise<AgentResult>;
  /** Degraded data path used when the live source is unavailable or circuit-broken. */
  fallback?(query: string, options: AgentInvocationOptions): Promise<AgentResult>;
}

export interface AgentDescriptor {
  name: AgentName;
  displayName: string;
  liveEnabled: boolean;
  hasFallback: boolean;
  timeoutMs: number;
}
