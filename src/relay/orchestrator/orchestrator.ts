/**
 * Orchestrator - drives the pipeline state machine for one request.
 *
 * Each loop iteration performs the side effect belonging to the current
 * state (selection, dependency gate, capability process) and feeds the
 * result into the pure transition function as an event:
 *
 *   analyze_query → select_pipeline → check_dependencies → invoke_skill
 *     → handle_output → (check_dependencies | iterate_on_error | complete)
 */

import crypto from "node:crypto";
import type { CapabilityCatalog } from "../catalog/types.js";
import { DEFAULT_ORCHESTRATION_CONFIG, validateConfig } from "../config.js";
import { stepError, toRelayError, type StepError } from "../errors.js";
import { createInstaller } from "../installer/index.js";
import type { Installer } from "../installer/types.js";
import { appendError, appendProgress, createPaperTrail, type PaperTrail } from "../audit/paperTrail.js";
import { DependencyGate } from "./dependencyGate.js";
import { decide } from "./retryController.js";
import { compileSelectionRules, selectPipeline, type Selection, type SelectionRule } from "./selector.js";
import { currentStep, initialSnapshot, isTerminal, transition } from "./stateMachine.js";
import { StepInvoker, type CapabilityRunner } from "./stepInvoker.js";
import type {
  MachineEvent,
  MachineSnapshot,
  OrchestrationConfig,
  OrchestrationEvent,
  OrchestrationEventOptions,
  OrchestrationInput,
  OrchestrationResult,
  PipelineRequest,
  RetryPolicy,
  TransitionRecord
} from "./types.js";

function isoNow(): string {
  return new Date().toISOString();
}

/**
 * Event emitter helper - fire-and-forget with microtask isolation, so an
 * observer can neither throw into nor re-enter the run.
 */
function emitEvent(options: OrchestrationEventOptions | undefined, event: OrchestrationEvent): void {
  if (!options?.onEvent) return;
  if (event.type === "transition" && options.emitTransitions === false) return;

  const handler = options.onEvent;
  queueMicrotask(() => {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        result.catch(() => {
          // Observer failures never affect the run
        });
      }
    } catch {
      // Fire-and-forget: observer failures never affect the run
    }
  });
}

function formatDetails(error: StepError): string {
  const lines = [error.message];
  if (error.details !== undefined) {
    lines.push("", "```json", JSON.stringify(error.details, null, 2), "```");
  }
  return lines.join("\n");
}

export type OrchestratorDependencies = {
  /** Prerequisite installer; defaults to the catalog's installer or PATH probing */
  installer?: Installer;
  /** Capability runner; defaults to a StepInvoker rooted at the catalog directory */
  runner?: CapabilityRunner;
};

type Ending = "completed" | "no_match" | "cancelled" | "exhausted" | "internal";

/**
 * Per-run mutable bookkeeping. The machine state itself only changes
 * through `transition`.
 */
type RunState = {
  runId: string;
  request: PipelineRequest;
  config: OrchestrationConfig;
  policy: RetryPolicy;
  events: OrchestrationEventOptions | undefined;
  signal: AbortSignal | undefined;
  trail: PaperTrail | undefined;
  snapshot: MachineSnapshot;
  history: TransitionRecord[];
  invocations: number;
  ending: Ending | undefined;
};

export class Orchestrator {
  private readonly catalog: CapabilityCatalog;
  private readonly rules: SelectionRule[];
  private readonly gate: DependencyGate;
  private readonly runner: CapabilityRunner;

  constructor(catalog: CapabilityCatalog, deps: OrchestratorDependencies = {}) {
    this.catalog = catalog;
    this.rules = compileSelectionRules(catalog);
    this.gate = new DependencyGate(deps.installer ?? createInstaller(catalog.installer, catalog.baseDir));
    this.runner = deps.runner ?? new StepInvoker({ cwd: catalog.baseDir });
  }

  getDefaultConfig(): OrchestrationConfig {
    return { ...DEFAULT_ORCHESTRATION_CONFIG, catalogPath: this.catalog.sourcePath };
  }

  /**
   * Pipeline selection alone, without running anything.
   */
  select(query: string): Selection {
    return selectPipeline(Object.freeze({ query }), this.rules);
  }

  async run(input: OrchestrationInput): Promise<OrchestrationResult> {
    const startTime = Date.now();
    const config = validateConfig({ ...this.getDefaultConfig(), ...input.config });
    const runId = crypto.randomUUID();
    const request: PipelineRequest = Object.freeze({ query: input.query });

    const run: RunState = {
      runId,
      request,
      config,
      policy: { maxRetries: config.maxRetries },
      events: input.events,
      signal: input.abortSignal,
      trail: undefined,
      snapshot: initialSnapshot(input.context),
      history: [],
      invocations: 0,
      ending: undefined
    };

    emitEvent(run.events, { type: "run_started", timestamp: isoNow(), runId, query: input.query });
    if (config.runLogDir) {
      const { runLogDir } = config;
      try {
        run.trail = createPaperTrail(runLogDir, runId, input.query);
      } catch (err) {
        this.disableTrail(run, err);
      }
    }

    while (!isTerminal(run.snapshot.state)) {
      if (run.signal?.aborted) {
        this.abort(run, "cancelled", this.cancellation(run));
        break;
      }

      let event: MachineEvent;
      try {
        event = await this.enterState(run);
      } catch (err) {
        this.abort(run, "internal", toRelayError(err).toStepError(this.stepName(run)));
        break;
      }

      if (run.signal?.aborted) {
        this.abort(run, "cancelled", this.cancellation(run));
        break;
      }

      if (event.trigger === "select" && event.steps.length === 0) {
        this.abort(
          run,
          "no_match",
          stepError("SELECTION_MISS", null, `No pipeline matches the request: "${input.query}"`)
        );
        break;
      }

      if (!this.apply(run, event)) {
        this.abort(
          run,
          "internal",
          stepError("INTERNAL", this.stepName(run), `No transition for "${event.trigger}" in state ${run.snapshot.state}`)
        );
      }
    }

    return this.finishRun(run, startTime);
  }

  /**
   * Perform the current state's work and return the event it produces.
   */
  private async enterState(run: RunState): Promise<MachineEvent> {
    const { instance } = run.snapshot;

    switch (run.snapshot.state) {
      case "analyze_query":
        return { trigger: "analyze" };

      case "select_pipeline": {
        const selection = selectPipeline(run.request, this.rules);
        return { trigger: "select", pipeline: selection.pipeline, steps: selection.steps };
      }

      case "check_dependencies": {
        const step = this.stepName(run) ?? "";
        const capability = this.catalog.capabilities.get(step);
        if (!capability) {
          return {
            trigger: "deps_fail",
            error: stepError("STEP_FAILURE", step, `Capability is not declared in the catalog: "${step}"`)
          };
        }
        const installOptions = {
          timeoutMs: run.config.installTimeoutMs,
          killGraceMs: run.config.killGraceMs,
          ...(run.signal !== undefined && { signal: run.signal })
        };
        const gate = await this.gate.check(capability, installOptions);
        emitEvent(run.events, {
          type: "dependency_check",
          timestamp: isoNow(),
          runId: run.runId,
          capability: step,
          ok: gate.ok,
          failed: gate.ok ? [] : gate.failed.map((f) => f.prerequisite)
        });
        return gate.ok ? { trigger: "deps_ok" } : { trigger: "deps_fail", error: gate.error };
      }

      case "invoke_skill": {
        const step = this.stepName(run) ?? "";
        const capability = this.catalog.capabilities.get(step);
        if (!capability) {
          return {
            trigger: "invoke",
            outcome: {
              ok: false,
              error: stepError("STEP_FAILURE", step, `Capability is not declared in the catalog: "${step}"`),
              durationMs: 0
            }
          };
        }

        const attempt = instance.retryCount + 1;
        this.emitHints(run, step, capability.hintSuffixes);
        emitEvent(run.events, {
          type: "step_started",
          timestamp: isoNow(),
          runId: run.runId,
          capability: step,
          cursor: instance.cursor,
          attempt
        });

        run.invocations++;
        const outcome = await this.runner.invoke(capability, instance.context, {
          timeoutMs: run.config.stepTimeoutMs,
          killGraceMs: run.config.killGraceMs,
          ...(run.signal !== undefined && { signal: run.signal })
        });

        emitEvent(run.events, {
          type: "step_completed",
          timestamp: isoNow(),
          runId: run.runId,
          capability: step,
          cursor: instance.cursor,
          attempt,
          status: outcome.ok ? "success" : "failure",
          durationMs: outcome.durationMs,
          ...(!outcome.ok && { error: outcome.error })
        });
        return { trigger: "invoke", outcome };
      }

      case "handle_output":
        return instance.lastOutcome === "success" ? { trigger: "success" } : { trigger: "error" };

      case "iterate_on_error": {
        if (instance.lastError) this.trailError(run, instance.lastError);
        return decide(instance, run.policy) === "retry" ? { trigger: "retry" } : { trigger: "fail" };
      }

      case "complete":
        throw new Error("complete is terminal");
    }
  }

  /**
   * Apply an event through the transition table. Returns false when no edge fires.
   */
  private apply(run: RunState, event: MachineEvent): boolean {
    const from = run.snapshot.state;
    const next = transition(run.snapshot, event, run.policy);
    if (!next) return false;

    const record: TransitionRecord = { from, to: next.state, trigger: event.trigger, at: isoNow() };
    run.history.push(record);
    run.snapshot = next;

    if (event.trigger === "fail") {
      run.ending = "exhausted";
    } else if (next.state === "complete" && run.ending === undefined) {
      run.ending = "completed";
    }

    this.writeTrail(run, (trail) => appendProgress(trail.progressPath, `${record.from} -> ${record.to} (${record.trigger})`));
    emitEvent(run.events, {
      type: "transition",
      timestamp: record.at,
      runId: run.runId,
      from: record.from,
      to: record.to,
      trigger: record.trigger
    });
    return true;
  }

  /**
   * Move straight to complete through the abort edge.
   */
  private abort(run: RunState, ending: Ending, error: StepError): void {
    run.ending = ending;
    this.trailError(run, error);
    this.apply(run, { trigger: "abort", error });
  }

  /**
   * Paper trail writes never fail a run: the first I/O error turns the trail
   * off for the rest of the run and is reported as a trail_disabled event.
   */
  private writeTrail(run: RunState, write: (trail: PaperTrail) => void): void {
    if (!run.trail) return;
    try {
      write(run.trail);
    } catch (err) {
      this.disableTrail(run, err);
    }
  }

  private trailError(run: RunState, error: StepError): void {
    this.writeTrail(run, (trail) =>
      appendError(trail.errorsPath, `${error.code} ${error.capability ?? ""}`.trim(), formatDetails(error))
    );
  }

  private disableTrail(run: RunState, err: unknown): void {
    run.trail = undefined;
    const cause = toRelayError(err);
    emitEvent(run.events, {
      type: "trail_disabled",
      timestamp: isoNow(),
      runId: run.runId,
      error: stepError("IO_ERROR", this.stepName(run), `Paper trail disabled: ${cause.message}`, cause.details)
    });
  }

  private cancellation(run: RunState): StepError {
    const reason: unknown = run.signal?.reason;
    const detail = reason instanceof Error ? reason.message : typeof reason === "string" ? reason : undefined;
    return stepError(
      "CANCELLED",
      this.stepName(run),
      detail ? `Run cancelled: ${detail}` : "Run cancelled",
      { state: run.snapshot.state }
    );
  }

  private stepName(run: RunState): string | null {
    return currentStep(run.snapshot.instance) ?? null;
  }

  private emitHints(run: RunState, capability: string, suffixes: readonly string[]): void {
    if (suffixes.length === 0) return;
    for (const [key, value] of Object.entries(run.snapshot.instance.context)) {
      if (typeof value !== "string") continue;
      const lower = value.toLowerCase();
      if (suffixes.some((suffix) => lower.endsWith(suffix))) {
        emitEvent(run.events, {
          type: "context_hint",
          timestamp: isoNow(),
          runId: run.runId,
          capability,
          key,
          value
        });
      }
    }
  }

  /**
   * Build the result envelope and emit run_completed exactly once.
   */
  private finishRun(run: RunState, startTime: number): OrchestrationResult {
    const { instance } = run.snapshot;
    const summary = {
      runId: run.runId,
      state: "complete" as const,
      request: run.request,
      instance,
      invocations: run.invocations,
      history: run.history,
      durationMs: Date.now() - startTime
    };
    const lastError =
      instance.lastError ?? stepError("INTERNAL", this.stepName(run), "Run ended without recording an error");

    let result: OrchestrationResult;
    switch (run.ending) {
      case "completed":
        result = { ...summary, kind: "ok" };
        break;
      case "no_match":
        result = { ...summary, kind: "no_match", error: lastError };
        break;
      case "cancelled":
        result = { ...summary, kind: "cancelled", error: lastError };
        break;
      case "exhausted": {
        const error = stepError(
          "EXHAUSTED_RETRIES",
          lastError.capability,
          `Pipeline aborted after ${instance.retryCount} failed attempt(s) of "${lastError.capability ?? "?"}"`,
          { maxRetries: run.policy.maxRetries }
        );
        error.cause = lastError;
        result = { ...summary, kind: "failed", error };
        break;
      }
      default:
        result = { ...summary, kind: "failed", error: lastError };
        break;
    }

    this.writeTrail(run, (trail) => appendProgress(trail.progressPath, `finished: ${result.kind}`));
    emitEvent(run.events, {
      type: "run_completed",
      timestamp: isoNow(),
      runId: run.runId,
      resultKind: result.kind,
      invocations: run.invocations,
      durationMs: summary.durationMs
    });
    return result;
  }
}
