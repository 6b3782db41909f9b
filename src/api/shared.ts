import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { OrchestrationError } from '../utils/errors.js';

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

// ── Response Helpers ────────────────────────────────────────────────────────

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(
    res: Response,
    message: string,
    status = 400,
    code?: ApiEnvelope['code'],
): void {
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        code,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Error Mapping ───────────────────────────────────────────────────────────

const STATUS_BY_CODE = {
    INVALID_QUERY: 400,
    NOT_FOUND: 404,
    NOT_READY: 409,
} as const;

/** Map a caught error to a status code, envelope code and message. */
export function mapError(err: unknown): { status: number; code: NonNullable<ApiEnvelope['code']>; message: string } {
    if (err instanceof OrchestrationError) {
        return { status: STATUS_BY_CODE[err.code], code: err.code, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof Error) {
        return { status: 500, code: 'INTERNAL', message: scrubSensitiveText(err.message) };
    }
    return { status: 500, code: 'INTERNAL', message: scrubSensitiveText(String(err)) };
}

/** Send whatever an operation threw through the envelope; unexpected errors are logged. */
export function sendMappedError(res: Response, err: unknown): void {
    const mapped = mapError(err);
    if (mapped.status >= 500) {
        void logThought(`[API] [${correlationIdOf(res) ?? '-'}] Unhandled error: ${mapped.message}`);
    }
    sendError(res, mapped.message, mapped.status, mapped.code);
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    res.setHeader('X-Correlation-Id', correlationId);
    void logThought(`[API] [${correlationId}] ${req.method} ${req.path}`);
    next();
}

/** Turn body-parser failures (malformed JSON) into a 400 envelope. */
export function jsonErrorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
    if (err instanceof SyntaxError) {
        sendError(res, 'Request body is not valid JSON.', 400, 'INVALID_QUERY');
        return;
    }
    if (err instanceof Error) {
        sendMappedError(res, err);
        return;
    }
    next(err);
}
