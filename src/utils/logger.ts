import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const REDACTED = '[REDACTED]';
const MIN_SECRET_LENGTH = 6;

/** Env keys whose values must never reach a log line or an API error body. */
const SENSITIVE_ENV_PATTERN = /(_API_KEY|_SECRET|_TOKEN|_PASSWORD)$/;

const KEY_VALUE_PATTERN = /\b([A-Za-z0-9_]*(?:api[_-]?key|secret|token|password))\s*[=:]\s*("[^"]*"|'[^']*'|[^\s,;]+)/gi;
const BEARER_PATTERN = /\bBearer\s+[A-Za-z0-9._~+/-]+=*/g;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function collectSensitiveValues(): string[] {
    const values: string[] = [];
    for (const [key, value] of Object.entries(process.env)) {
        if (!SENSITIVE_ENV_PATTERN.test(key) || typeof value !== 'string') {
            continue;
        }
        const trimmed = value.trim();
        if (trimmed.length >= MIN_SECRET_LENGTH) {
            values.push(trimmed);
        }
    }
    // Longest first so a secret that contains another is replaced whole.
    return values.sort((left, right) => right.length - left.length);
}

/**
 * Redact credentials from free text: raw values of sensitive env vars,
 * `key=value` pairs with credential-like keys, and bearer tokens.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;

    for (const secret of collectSensitiveValues()) {
        scrubbed = scrubbed.replace(new RegExp(escapeRegExp(secret), 'g'), REDACTED);
    }

    scrubbed = scrubbed.replace(KEY_VALUE_PATTERN, (_match, key: string) => `${key}=${REDACTED}`);
    scrubbed = scrubbed.replace(BEARER_PATTERN, `Bearer ${REDACTED}`);
    return scrubbed;
}

export function getLogDirectory(): string {
    return path.resolve(process.env.PHARMASCOPE_LOG_DIR ?? 'logs');
}

/** Daily markdown log file: `<logDir>/YYYY-MM-DD.md`. */
export function getLogFilePath(date = new Date()): string {
    return path.join(getLogDirectory(), `${date.toISOString().slice(0, 10)}.md`);
}

/**
 * Append a thought to today's log file as a `## thought @ <timestamp>` entry.
 *
 * Never rejects: a failed write is reported on stderr so that callers can
 * fire-and-forget with `void logThought(...)`.
 */
export async function logThought(message: string): Promise<void> {
    const now = new Date();
    const scrubbed = scrubSensitiveText(message);
    const entry = `\n## thought @ ${now.toISOString()}\n${scrubbed}\n`;

    if (process.env.PHARMASCOPE_LOG_CONSOLE === 'true') {
        console.log(scrubbed);
    }

    try {
        await mkdir(getLogDirectory(), { recursive: true });
        await appendFile(getLogFilePath(now), entry, 'utf8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[Logger] Failed to write log entry: ${reason}`);
    }
}
