import type { AgentErrorKind } from '../types/agents.js';

export type OrchestrationErrorCode = 'INVALID_QUERY' | 'NOT_FOUND' | 'NOT_READY';

/** Caller-facing failure of an orchestrator operation. */
export class OrchestrationError extends Error {
    readonly code: OrchestrationErrorCode;

    constructor(code: OrchestrationErrorCode, message: string) {
        super(message);
        this.name = 'OrchestrationError';
        this.code = code;
    }
}

/** Failure raised by an agent's live or fallback path. */
export class AgentError extends Error {
    readonly kind: AgentErrorKind;
    /** Transient upstream failure (5xx, connection reset) worth one more attempt. */
    readonly retryable: boolean;

    constructor(kind: AgentErrorKind, message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
        super(message, { cause: options.cause });
        this.name = 'AgentError';
        this.kind = kind;
        this.retryable = options.retryable ?? false;
    }
}

/** Coerce anything an agent threw into an AgentError; unknown throwables become INTERNAL. */
export function toAgentError(error: unknown): AgentError {
    if (error instanceof AgentError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new AgentError('INTERNAL', message, { cause: error });
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
