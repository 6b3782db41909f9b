import type { Request, Response } from 'express';
import type { ConfigData } from '../../types/api.js';
import type { RuntimeSettings } from '../../config/json-config.js';
import { validateRuntimeConfig } from '../../config/env-validator.js';
import { AGENT_NAMES } from '../../types/agents.js';
import { sendOk } from '../shared.js';

export interface ConfigDeps {
    settings: RuntimeSettings;
}

/**
 * GET /config: Effective non-sensitive settings plus a validation report.
 * Endpoint URLs and keys are never echoed; only which agents are live.
 */
export function handleConfig(deps: ConfigDeps) {
    return (_req: Request, res: Response): void => {
        const { settings } = deps;
        const validation = validateRuntimeConfig();

        const data: ConfigData = {
            settings: {
                apiHost: settings.apiHost,
                apiPort: settings.apiPort,
                agentTimeoutMs: settings.agentTimeoutMs,
                jobDeadlineMs: settings.jobDeadlineMs,
                maxQueryLength: settings.maxQueryLength,
                defaultAgents: settings.defaultAgents,
                cacheMaxAgeMs: settings.cacheMaxAgeMs,
                breaker: { ...settings.breaker },
                jobStore: settings.jobStore,
                retention: { ...settings.retention },
                liveAgents: AGENT_NAMES.filter((agent) => {
                    const source = settings.agents[agent];
                    return source !== undefined && source.enabled && source.apiUrl !== undefined;
                }),
            },
            validation,
        };

        // 200 even when validation has issues; `validation.ok` carries the verdict.
        sendOk(res, data);
    };
}
