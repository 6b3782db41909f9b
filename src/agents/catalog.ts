import type { AgentCapability, AgentName } from '../types/agents.js';
import type { AnalysisType } from '../types/orchestration.js';
import { HttpAgent, type FetchLike } from './http-agent.js';

interface AgentDefinition {
    name: AgentName;
    displayName: string;
    resultType: string;
}

export const AGENT_DEFINITIONS: readonly AgentDefinition[] = [
    { name: 'market', displayName: 'Market Intelligence', resultType: 'market_intelligence' },
    { name: 'exim', displayName: 'EXIM Trade', resultType: 'trade_data' },
    { name: 'patent', displayName: 'Patent Landscape', resultType: 'patent_landscape' },
    { name: 'clinical', displayName: 'Clinical Trials', resultType: 'clinical_trials' },
    { name: 'internal', displayName: 'Internal Knowledge', resultType: 'internal_knowledge' },
    { name: 'web', displayName: 'Web Intelligence', resultType: 'web_intelligence' },
    { name: 'literature', displayName: 'Scientific Literature', resultType: 'literature_search' },
    { name: 'ml_prediction', displayName: 'ML Property Prediction', resultType: 'property_prediction' },
    { name: 'generative_ai', displayName: 'Generative Candidate Design', resultType: 'candidate_generation' },
    { name: 'nlp_analysis', displayName: 'NLP Synthesis', resultType: 'nlp_analysis' },
];

export const ANALYSIS_TYPES = ['comprehensive', 'patent_focus', 'clinical_focus', 'market_focus'] as const;

export const ANALYSIS_PRESETS: Readonly<Record<AnalysisType, readonly AgentName[]>> = {
    comprehensive: AGENT_DEFINITIONS.map((definition) => definition.name),
    patent_focus: ['patent', 'clinical', 'internal', 'literature', 'nlp_analysis'],
    clinical_focus: ['clinical', 'market', 'internal', 'literature', 'ml_prediction', 'nlp_analysis'],
    market_focus: ['market', 'exim', 'web', 'literature', 'ml_prediction'],
};

export function isAnalysisType(value: string): value is AnalysisType {
    return (ANALYSIS_TYPES as readonly string[]).includes(value);
}

export interface AgentSourceSettings {
    apiUrl?: string;
    apiKey?: string;
    enabled: boolean;
    timeoutMs: number;
}

export interface AgentCatalogSettings {
    fallbackDir: string;
    /** Timeout for agents without their own entry. */
    defaultTimeoutMs: number;
    agents: Partial<Record<AgentName, AgentSourceSettings>>;
    fetchImpl?: FetchLike;
}

/** Build the fixed agent set. Called once during bootstrap. */
export function createAgentCatalog(settings: AgentCatalogSettings): AgentCapability[] {
    return AGENT_DEFINITIONS.map((definition) => {
        const source = settings.agents[definition.name] ?? { enabled: true, timeoutMs: settings.defaultTimeoutMs };
        return new HttpAgent({
            ...definition,
            timeoutMs: source.timeoutMs,
            fallbackDir: settings.fallbackDir,
            apiUrl: source.apiUrl,
            apiKey: source.apiKey,
            enabled: source.enabled,
            fetchImpl: settings.fetchImpl,
        });
    });
}
