/**
 * Presentation helpers shared by the CLI: exit codes, event lines and
 * option parsing.
 */

import chalk from "chalk";
import { z } from "zod";
import { RelayError, type StepError } from "./errors.js";
import type { CommandSpec } from "./catalog/types.js";
import { resolveRelayPaths } from "./paths.js";
import type { OrchestrationEvent, OrchestrationResult, StepContext } from "./orchestrator/types.js";

/**
 * Exit codes for the CLI.
 */
export const EXIT_CODES = {
  OK: 0,           // Pipeline completed
  NO_MATCH: 10,    // No pipeline matched the request
  FAILED: 20,      // Retries exhausted
  ERROR: 30,       // Bad configuration or catalog
  CANCELLED: 40    // SIGINT/SIGTERM
} as const;

export function resultToExitCode(result: OrchestrationResult): number {
  switch (result.kind) {
    case "ok":
      return EXIT_CODES.OK;
    case "no_match":
      return EXIT_CODES.NO_MATCH;
    case "failed":
      return EXIT_CODES.FAILED;
    case "cancelled":
      return EXIT_CODES.CANCELLED;
  }
}

const ContextOptionSchema = z.record(z.unknown());

/**
 * Parse the `--context` option: a JSON object.
 * @throws RelayError with BAD_REQUEST for anything else.
 */
export function parseContextOption(raw: string | undefined): StepContext {
  if (raw === undefined || raw.trim() === "") return {};
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new RelayError("BAD_REQUEST", "--context must be valid JSON");
  }
  const parsed = ContextOptionSchema.safeParse(value);
  if (!parsed.success || Array.isArray(value)) {
    throw new RelayError("BAD_REQUEST", "--context must be a JSON object");
  }
  return parsed.data;
}

/**
 * Parse `--installer "<program> [args...]"`, split on whitespace.
 */
export function parseCommandOption(raw: string | undefined): CommandSpec | undefined {
  if (raw === undefined) return undefined;
  const [program, ...args] = raw.trim().split(/\s+/).filter((part) => part.length > 0);
  if (program === undefined) {
    throw new RelayError("BAD_REQUEST", "--installer must name a program");
  }
  return { program, args };
}

/**
 * `--run-log` alone writes under the default run-log directory of the work
 * directory; `--run-log <dir>` names the directory.
 */
export function parseRunLogOption(raw: string | boolean | undefined, workDir: string): string | undefined {
  if (raw === undefined || raw === false) return undefined;
  return raw === true ? resolveRelayPaths(workDir).runLogDir : raw;
}

function describeError(error: StepError): string {
  return `[${error.code}] ${error.message}`;
}

/**
 * One stderr line per event, or null for events not worth showing.
 */
export function formatEvent(event: OrchestrationEvent): string | null {
  switch (event.type) {
    case "run_started":
      return chalk.blue(`Starting orchestration: "${event.query}"`);
    case "transition":
      return chalk.dim(`  ${event.from} -> ${event.to} (${event.trigger})`);
    case "dependency_check":
      return event.ok
        ? null
        : chalk.yellow(`  ! prerequisites missing for ${event.capability}: ${event.failed.join(", ")}`);
    case "step_started":
      return chalk.cyan(`  > ${event.capability} (step ${event.cursor + 1}, attempt ${event.attempt})`);
    case "step_completed":
      return event.status === "success"
        ? chalk.green(`  ✓ ${event.capability} in ${event.durationMs}ms`)
        : chalk.red(`  ✗ ${event.capability}: ${event.error ? describeError(event.error) : "failed"}`);
    case "context_hint":
      return chalk.magenta(`  i ${event.capability} will receive ${event.key}=${event.value}`);
    case "trail_disabled":
      return chalk.yellow(`  ! ${event.error.message}`);
    case "run_completed":
      return null;
  }
}

/**
 * Human-readable result summary for stderr.
 */
export function formatResult(result: OrchestrationResult): string[] {
  const { instance } = result;
  const steps = `${instance.cursor}/${instance.selectedSteps.length}`;
  switch (result.kind) {
    case "ok":
      return [
        chalk.green(`✓ Pipeline ${instance.pipeline ?? ""} completed`),
        chalk.dim(`  Steps: ${steps}, invocations: ${result.invocations}`)
      ];
    case "no_match":
      return [chalk.yellow(`⚠ ${result.error.message}`)];
    case "failed": {
      const lines = [chalk.red(`✗ ${describeError(result.error)}`), chalk.dim(`  Steps: ${steps} completed`)];
      if (result.error.cause) lines.push(chalk.dim(`  Last error: ${describeError(result.error.cause)}`));
      return lines;
    }
    case "cancelled":
      return [chalk.yellow(`⚠ ${result.error.message}`), chalk.dim(`  Steps: ${steps} completed`)];
  }
}
