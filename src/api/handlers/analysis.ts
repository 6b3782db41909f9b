import type { Request, Response } from 'express';
import type { AnalyzeAcceptedData, AnalyzeRequestBody } from '../../types/api.js';
import type { Orchestrator } from '../../services/orchestrator.js';
import { OrchestrationError } from '../../utils/errors.js';
import { sendMappedError, sendOk } from '../shared.js';

export interface AnalysisDeps {
    orchestrator: Pick<Orchestrator, 'submit' | 'status' | 'result'>;
}

function readBody(req: Request): AnalyzeRequestBody {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        return {};
    }
    return {
        query: 'query' in body ? body.query : undefined,
        agents: 'agents' in body ? body.agents : undefined,
        analysisType: 'analysisType' in body ? body.analysisType : undefined,
        agentOptions: 'agentOptions' in body ? body.agentOptions : undefined,
    };
}

function optionalString(value: unknown, field: string): string | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw new OrchestrationError('INVALID_QUERY', `${field} must be a string.`);
    }
    return value;
}

function optionalStringList(value: unknown): string[] | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        throw new OrchestrationError('INVALID_QUERY', 'agents must be a list of agent names.');
    }
    return value;
}

function optionalRecord(value: unknown): Record<string, unknown> | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'object' || Array.isArray(value)) {
        throw new OrchestrationError('INVALID_QUERY', 'agentOptions must be an object.');
    }
    return { ...value };
}

/** POST /analyze: Accepts a query and answers 202 with the new job id. */
export function handleAnalyze(deps: AnalysisDeps) {
    return (req: Request, res: Response): void => {
        try {
            const body = readBody(req);
            const jobId = deps.orchestrator.submit(body.query, {
                agents: optionalStringList(body.agents),
                analysisType: optionalString(body.analysisType, 'analysisType'),
                agentOptions: optionalRecord(body.agentOptions),
            });
            const data: AnalyzeAcceptedData = { jobId };
            res.setHeader('Location', `/status/${jobId}`);
            sendOk(res, data, 202);
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** GET /status/:jobId: Job status with per-agent sub-status and progress. */
export function handleStatus(deps: AnalysisDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendOk(res, deps.orchestrator.status(String(req.params.jobId)));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** GET /results/:jobId: Final report; 409 while the job is still running. */
export function handleResults(deps: AnalysisDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendOk(res, deps.orchestrator.result(String(req.params.jobId)));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}
