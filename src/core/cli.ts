import { existsSync } from 'node:fs';
import { DEFAULT_CONFIG, getConfigPath, writeConfig } from '../config/json-config.js';
import { validateRuntimeConfig, type ConfigValidationResult } from '../config/env-validator.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: pharmascope [command] [options]

Commands:
  (none)              Start the orchestration engine and HTTP API
  validate-config     Check pharmascope.json and environment overrides
  init-config         Write a pharmascope.json populated with defaults

Options:
  --help, -h          Show this help message
  --json              Output in machine-readable JSON format (validate-config only)
  --force             Overwrite an existing file (init-config only)

Examples:
  pharmascope
  pharmascope validate-config --json
  PHARMASCOPE_CONFIG_PATH=./conf/pharmascope.json pharmascope init-config
`.trim();

const KNOWN_COMMANDS = new Set(['validate-config', 'init-config']);

export function formatValidationReport(result: ConfigValidationResult, asJson: boolean): string {
  if (asJson) {
    return JSON.stringify(result, null, 2);
  }

  const lines = [`Config validation: ${result.ok ? 'OK' : 'FAILED'} (${result.validatedAt})`];
  lines.push(`Keys set: ${result.presentKeys.length > 0 ? result.presentKeys.join(', ') : 'none'}`);
  if (result.activeFeatures.length > 0) {
    lines.push(`Live agents: ${result.activeFeatures.map((gate) => gate.replace('agent-live:', '')).join(', ')}`);
  }
  for (const issue of result.issues) {
    lines.push(`  [${issue.class}] ${issue.key}: ${issue.message}`);
    lines.push(`      -> ${issue.remediation}`);
  }
  return lines.join('\n');
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Handle the `validate-config` command.
 * Exit code is 0 when the configuration is usable, 1 otherwise.
 */
export function handleValidateConfigCli(argv: string[]): boolean {
  if (argv[0] !== 'validate-config') return false;

  try {
    const result = validateRuntimeConfig();
    console.log(formatValidationReport(result, argv.includes('--json')));
    process.exitCode = result.ok ? 0 : 1;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[PharmaScope] Config validation failed: ${message}`);
    process.exitCode = 1;
  }

  return true;
}

/**
 * Handle the `init-config` command. Refuses to overwrite an existing file
 * unless `--force` is given.
 */
export async function handleInitConfigCli(argv: string[]): Promise<boolean> {
  if (argv[0] !== 'init-config') return false;

  const target = getConfigPath();
  if (existsSync(target) && !argv.includes('--force')) {
    console.error(`[PharmaScope] ${target} already exists. Re-run with --force to overwrite it.`);
    process.exitCode = 1;
    return true;
  }

  try {
    await writeConfig(DEFAULT_CONFIG, target);
    console.log(`Wrote default configuration to ${target}`);
    process.exitCode = 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[PharmaScope] ${message}`);
    process.exitCode = 1;
  }
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  if (argv.length === 0) return false;

  const command = argv[0];
  if (KNOWN_COMMANDS.has(command) || command.startsWith('-')) {
    return false;
  }

  console.error(`[PharmaScope] Unknown command: '${command}'`);
  console.error(`Run 'pharmascope --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}
