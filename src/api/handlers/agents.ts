import type { Request, Response } from 'express';
import type { AgentCatalogData } from '../../types/api.js';
import type { AgentRegistry } from '../../services/agent-registry.js';
import { ANALYSIS_PRESETS } from '../../agents/catalog.js';
import { sendOk } from '../shared.js';

export interface AgentsDeps {
    registry: Pick<AgentRegistry, 'describe'>;
}

/** GET /agents: Registered agents and the analysis-type presets. */
export function handleAgents(deps: AgentsDeps) {
    return (_req: Request, res: Response): void => {
        const data: AgentCatalogData = {
            agents: deps.registry.describe(),
            analysisTypes: { ...ANALYSIS_PRESETS },
        };
        sendOk(res, data);
    };
}
