import type { AgentCapability, AgentDescriptor, AgentName } from '../types/agents.js';
import { logThought } from '../utils/logger.js';

/**
 * Catalog of the agents available to the orchestrator.
 *
 * The set is fixed once the process has started: agents are registered
 * during bootstrap and only looked up afterwards.
 *
 * Usage:
 * ```ts
 * const registry = new AgentRegistry();
 * registry.registerMany(createAgentCatalog(settings));
 * const market = registry.get('market');
 * ```
 */
export class AgentRegistry {
    readonly #agents: Map<AgentName, AgentCapability> = new Map();

    /** Register a single agent. Throws if an agent with the same name exists. */
    register(agent: AgentCapability): void {
        if (this.#agents.has(agent.name)) {
            throw new Error(`[AgentRegistry] Agent '${agent.name}' is already registered.`);
        }
        this.#agents.set(agent.name, agent);
        void logThought(
            `[AgentRegistry] Registered agent '${agent.name}' (live: ${agent.liveEnabled ? 'enabled' : 'disabled'}, fallback: ${agent.fallback ? 'yes' : 'no'}).`,
        );
    }

    registerMany(agents: AgentCapability[]): void {
        for (const agent of agents) {
            this.register(agent);
        }
    }

    get(name: AgentName): AgentCapability | undefined {
        return this.#agents.get(name);
    }

    has(name: string): boolean {
        for (const registered of this.#agents.keys()) {
            if (registered === name) {
                return true;
            }
        }
        return false;
    }

    /** Registered agent names in registration order. */
    names(): AgentName[] {
        return [...this.#agents.keys()];
    }

    get size(): number {
        return this.#agents.size;
    }

    describe(): AgentDescriptor[] {
        return [...this.#agents.values()].map((agent) => ({
            name: agent.name,
            displayName: agent.displayName,
            liveEnabled: agent.liveEnabled,
            hasFallback: typeof agent.fallback === 'function',
            timeoutMs: agent.timeoutMs,
        }));
    }
}
