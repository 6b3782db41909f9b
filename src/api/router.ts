import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleAnalyze, handleResults, handleStatus } from './handlers/analysis.js';
import { handleHealth, handleLiveness } from './handlers/health.js';
import { handleAgents } from './handlers/agents.js';
import { handleConfig } from './handlers/config.js';
import { jsonErrorHandler, requestLogger, sendError } from './shared.js';
import type { Orchestrator } from '../services/orchestrator.js';
import type { AgentRegistry } from '../services/agent-registry.js';
import type { RuntimeSettings } from '../config/json-config.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps {
    orchestrator: Orchestrator;
    registry: AgentRegistry;
    settings: RuntimeSettings;
}

export interface StartedApiServer {
    server: Server;
    port: number;
}

/** Ports tried after the preferred one when it is already taken. */
const PORT_PROBE_SPAN = 9;

/**
 * Build the polling HTTP API.
 *
 * Endpoints:
 *   POST /analyze          Submit a query; 202 with the job id
 *   GET  /status/:jobId    Job status, per-agent sub-status and progress
 *   GET  /results/:jobId   Final report (409 while the job runs)
 *   GET  /health           Breaker state per agent and job counts
 *   GET  /health/live      Liveness probe
 *   GET  /agents           Agent catalog and analysis presets
 *   GET  /config           Non-sensitive settings and a validation report
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(requestLogger);
    app.use(express.json({ limit: '64kb' }));

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.post('/analyze', handleAnalyze(deps));
    app.get('/status/:jobId', handleStatus(deps));
    app.get('/results/:jobId', handleResults(deps));
    app.get('/health', handleHealth(deps));
    app.get('/health/live', handleLiveness());
    app.get('/agents', handleAgents(deps));
    app.get('/config', handleConfig(deps));

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404, 'NOT_FOUND_ROUTE');
    });

    app.use(jsonErrorHandler);

    return app;
}

function listenOnce(server: Server, port: number, host: string): Promise<boolean> {
    return new Promise((resolve, reject) => {
        const onError = (error: NodeJS.ErrnoException): void => {
            server.off('listening', onListening);
            if (error.code === 'EADDRINUSE') {
                resolve(false);
                return;
            }
            reject(error);
        };
        const onListening = (): void => {
            server.off('error', onError);
            resolve(true);
        };
        server.once('error', onError);
        server.once('listening', onListening);
        server.listen(port, host);
    });
}

/**
 * Start the HTTP API on the preferred port, moving up to the next free port
 * within the probe span when it is in use.
 */
export async function startApiServer(deps: ApiServerDeps): Promise<StartedApiServer> {
    const app = createApiApp(deps);
    const server = createServer(app);
    const { apiHost, apiPort } = deps.settings;

    for (let port = apiPort; port <= Math.min(65535, apiPort + PORT_PROBE_SPAN); port += 1) {
        if (await listenOnce(server, port, apiHost)) {
            if (port !== apiPort) {
                void logThought(`[API] Port ${apiPort} is in use; fell back to ${port}.`);
            }
            console.log(`[PharmaScope API] Listening on http://${apiHost}:${port}`);
            void logThought(`[API] HTTP server started on ${apiHost}:${port}.`);
            return { server, port };
        }
    }

    throw new Error(
        `No free port in ${apiPort}-${Math.min(65535, apiPort + PORT_PROBE_SPAN)}. Set API_PORT to a free port.`,
    );
}
