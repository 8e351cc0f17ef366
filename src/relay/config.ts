/**
 * Orchestration configuration: defaults, then RELAY_* environment variables,
 * then explicit overrides (CLI flags), validated with zod.
 */

import path from "node:path";
import { z } from "zod";
import { RelayError } from "./errors.js";
import { resolveRelayPaths } from "./paths.js";
import type { OrchestrationConfig } from "./orchestrator/types.js";
import { DEFAULT_MAX_RETRIES } from "./orchestrator/retryController.js";

export const DEFAULT_ORCHESTRATION_CONFIG: Omit<OrchestrationConfig, "catalogPath"> = {
  maxRetries: DEFAULT_MAX_RETRIES,
  stepTimeoutMs: 600_000,
  installTimeoutMs: 300_000,
  killGraceMs: 2_000
};

/** Raw, unvalidated config values (env strings, CLI option strings). */
export type ConfigInput = { [K in keyof OrchestrationConfig]?: unknown };

const CONFIG_KEYS = [
  "maxRetries",
  "stepTimeoutMs",
  "installTimeoutMs",
  "killGraceMs",
  "catalogPath",
  "runLogDir"
] as const satisfies readonly (keyof OrchestrationConfig)[];

const ENV_KEYS: Record<(typeof CONFIG_KEYS)[number], string> = {
  maxRetries: "RELAY_MAX_RETRIES",
  stepTimeoutMs: "RELAY_STEP_TIMEOUT_MS",
  installTimeoutMs: "RELAY_INSTALL_TIMEOUT_MS",
  killGraceMs: "RELAY_KILL_GRACE_MS",
  catalogPath: "RELAY_CATALOG",
  runLogDir: "RELAY_RUN_LOG_DIR"
};

const ConfigSchema = z.object({
  maxRetries: z.coerce.number().int().min(1),
  stepTimeoutMs: z.coerce.number().int().min(0),
  installTimeoutMs: z.coerce.number().int().min(0),
  killGraceMs: z.coerce.number().int().min(0),
  catalogPath: z.string().trim().min(1),
  runLogDir: z.string().trim().min(1).optional()
});

function definedEntries(input: ConfigInput): ConfigInput {
  const out: ConfigInput = {};
  for (const key of CONFIG_KEYS) {
    const value = input[key];
    if (value !== undefined && value !== "") out[key] = value;
  }
  return out;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigInput {
  const input: ConfigInput = {};
  for (const key of CONFIG_KEYS) {
    input[key] = env[ENV_KEYS[key]];
  }
  return definedEntries(input);
}

function parseConfig(input: ConfigInput): z.infer<typeof ConfigSchema> {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    const summary = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new RelayError("CONFIG_INVALID", `Invalid configuration: ${summary}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

/**
 * Check a complete config, such as defaults merged with a library caller's
 * overrides. Paths are taken as given.
 * @throws RelayError with CONFIG_INVALID listing the zod issues.
 */
export function validateConfig(input: ConfigInput): OrchestrationConfig {
  const { runLogDir, ...rest } = parseConfig(input);
  return runLogDir === undefined ? rest : { ...rest, runLogDir };
}

/**
 * Build a validated config from defaults, the environment and overrides.
 * Relative paths are resolved against `workDir`.
 * @throws RelayError with CONFIG_INVALID listing the zod issues.
 */
export function resolveConfig(
  overrides: ConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
  workDir: string = process.cwd()
): OrchestrationConfig {
  const { runLogDir, catalogPath, ...rest } = parseConfig({
    ...DEFAULT_ORCHESTRATION_CONFIG,
    catalogPath: resolveRelayPaths(workDir).catalogPath,
    ...configFromEnv(env),
    ...definedEntries(overrides)
  });

  const config: OrchestrationConfig = { ...rest, catalogPath: path.resolve(workDir, catalogPath) };
  if (runLogDir !== undefined) {
    config.runLogDir = path.resolve(workDir, runLogDir);
  }
  return config;
}
