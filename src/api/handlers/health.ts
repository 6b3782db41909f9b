import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { Orchestrator } from '../../services/orchestrator.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    orchestrator: Pick<Orchestrator, 'diagnostics'>;
}

/** GET /health: Breaker state per agent and job counts. Read-only. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const diagnostics = deps.orchestrator.diagnostics();

        const data: HealthData = {
            status: diagnostics.breakers.some((breaker) => breaker.state !== 'CLOSED') ? 'degraded' : 'ok',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
            breakers: diagnostics.breakers,
            jobs: diagnostics.jobs,
            inFlight: diagnostics.inFlight,
        };

        sendOk(res, data);
    };
}

/** GET /health/live: Process liveness probe. */
export function handleLiveness() {
    return (_req: Request, res: Response): void => {
        sendOk(res, { alive: true });
    };
}
