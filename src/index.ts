import 'dotenv/config';
import {
    handleHelpCli,
    handleInitConfigCli,
    handleUnknownCommand,
    handleValidateConfigCli,
} from './core/cli.js';
import { createRuntime, type Runtime } from './core/runtime.js';
import { startApiServer } from './api/router.js';
import { assertRuntimeConfig } from './config/env-validator.js';
import { resolveRuntimeSettings } from './config/json-config.js';
import { logThought } from './utils/logger.js';
import type { Server } from 'node:http';

const argv = process.argv.slice(2);

// ── One-shot CLI commands (bypass service startup) ───────────────────────────

async function runCliCommand(): Promise<boolean> {
    if (handleHelpCli(argv)) return true;
    if (handleValidateConfigCli(argv)) return true;
    if (await handleInitConfigCli(argv)) return true;
    return handleUnknownCommand(argv);
}

// ── Service startup ──────────────────────────────────────────────────────────

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
}

function installSignalHandlers(runtime: Runtime, server: Server): void {
    let stopping = false;

    const stop = (signal: NodeJS.Signals): void => {
        if (stopping) return;
        stopping = true;
        console.log(`\n[PharmaScope] ${signal} received; draining in-flight jobs.`);

        Promise.all([closeServer(server), runtime.stop()])
            .then(async () => {
                await logThought(`PharmaScope process received ${signal}; services stopped.`);
                process.exit(0);
            })
            .catch(async (error: unknown) => {
                const message = error instanceof Error ? error.message : String(error);
                await logThought(`[PharmaScope] Shutdown after ${signal} failed: ${message}`);
                process.exit(1);
            });
    };

    process.on('SIGINT', () => stop('SIGINT'));
    process.on('SIGTERM', () => stop('SIGTERM'));
}

async function main(): Promise<void> {
    if (await runCliCommand()) {
        return;
    }

    const validation = assertRuntimeConfig();
    for (const issue of validation.issues) {
        console.warn(`[PharmaScope] ${issue.key}: ${issue.message}`);
    }

    const settings = resolveRuntimeSettings();
    const runtime = createRuntime(settings);
    const { server } = await startApiServer({
        orchestrator: runtime.orchestrator,
        registry: runtime.registry,
        settings,
    });

    installSignalHandlers(runtime, server);
    console.log('PharmaScope orchestration engine initialized.');
}

main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[PharmaScope] Startup failed: ${message}`);
    process.exit(1);
});
