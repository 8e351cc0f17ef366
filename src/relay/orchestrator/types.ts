/**
 * Orchestrator types: machine states, events, run state and result envelopes.
 */

import type { StepError } from "../errors.js";

export const ORCHESTRATION_STATES = [
  "analyze_query",
  "select_pipeline",
  "check_dependencies",
  "invoke_skill",
  "handle_output",
  "iterate_on_error",
  "complete"
] as const;

export type OrchestrationState = (typeof ORCHESTRATION_STATES)[number];

export const INITIAL_STATE: OrchestrationState = "analyze_query";
export const TERMINAL_STATE: OrchestrationState = "complete";

export type Trigger =
  | "analyze"
  | "select"
  | "deps_ok"
  | "deps_fail"
  | "invoke"
  | "success"
  | "error"
  | "retry"
  | "fail"
  | "abort";

/**
 * Shared key/value working state handed from step to step.
 */
export type StepContext = Record<string, unknown>;

export type PipelineRequest = Readonly<{
  query: string;
}>;

/**
 * Run state owned by a single orchestration. Replaced, never mutated,
 * by the transition function.
 */
export type PipelineInstance = Readonly<{
  /** Selected pipeline id, null until (or unless) selection succeeds */
  pipeline: string | null;
  /** Ordered capability ids; fixed once selected */
  selectedSteps: readonly string[];
  /** Index of the step being executed, 0..selectedSteps.length */
  cursor: number;
  context: Readonly<StepContext>;
  /** Failed attempts of the current step */
  retryCount: number;
  lastError: StepError | null;
  /** Outcome of the most recent invocation; read by the handle_output guards */
  lastOutcome: "success" | "failure" | null;
}>;

/**
 * What a capability invocation produced.
 */
export type InvocationOutcome =
  | { ok: true; output: StepContext; durationMs: number }
  | { ok: false; error: StepError; durationMs: number };

export type MachineEvent =
  | { trigger: "analyze" }
  | { trigger: "select"; pipeline: string | null; steps: readonly string[] }
  | { trigger: "deps_ok" }
  | { trigger: "deps_fail"; error: StepError }
  | { trigger: "invoke"; outcome: InvocationOutcome }
  | { trigger: "success" }
  | { trigger: "error" }
  | { trigger: "retry" }
  | { trigger: "fail" }
  | { trigger: "abort"; error: StepError };

export type MachineSnapshot = Readonly<{
  state: OrchestrationState;
  instance: PipelineInstance;
}>;

export type RetryPolicy = {
  /** Attempts allowed per step before the pipeline aborts */
  maxRetries: number;
};

export type EdgePredicate = (instance: PipelineInstance, event: MachineEvent, policy: RetryPolicy) => boolean;

export type EdgeEffect = (instance: PipelineInstance, event: MachineEvent, policy: RetryPolicy) => PipelineInstance;

/**
 * One row of the static transition table.
 */
export type TransitionEdge = {
  from: OrchestrationState;
  to: OrchestrationState;
  trigger: Trigger;
  /** Must hold for the edge to fire */
  guard?: EdgePredicate;
  /** Must NOT hold for the edge to fire */
  unless?: EdgePredicate;
  effect?: EdgeEffect;
};

export type TransitionRecord = {
  from: OrchestrationState;
  to: OrchestrationState;
  trigger: Trigger;
  at: string;
};

/**
 * Configuration for an orchestration run.
 */
export type OrchestrationConfig = {
  /** Attempts per step before the pipeline aborts */
  maxRetries: number;
  /** Deadline for one capability process in ms; 0 disables it */
  stepTimeoutMs: number;
  /** Deadline for one installer invocation in ms; 0 disables it */
  installTimeoutMs: number;
  /** Time between SIGTERM and SIGKILL when a child is stopped */
  killGraceMs: number;
  /** Catalog document location */
  catalogPath: string;
  /** Paper trail root; no paper trail when unset */
  runLogDir?: string;
};

/**
 * Input to start an orchestration.
 */
export type OrchestrationInput = {
  /** Free-text request */
  query: string;
  /** Initial context handed to the first step */
  context?: StepContext;
  /** Execution config overrides */
  config?: Partial<OrchestrationConfig>;
  /** Event handling options */
  events?: OrchestrationEventOptions;
  /** Cancels the run; the running child process is terminated */
  abortSignal?: AbortSignal;
};

type RunSummary = {
  runId: string;
  state: "complete";
  request: PipelineRequest;
  instance: PipelineInstance;
  /** Number of capability processes started */
  invocations: number;
  history: TransitionRecord[];
  durationMs: number;
};

/**
 * Final orchestration result envelope.
 */
export type OrchestrationResult =
  | (RunSummary & { kind: "ok" })
  | (RunSummary & { kind: "no_match"; error: StepError })
  | (RunSummary & { kind: "failed"; error: StepError })
  | (RunSummary & { kind: "cancelled"; error: StepError });

// ============================================================================
// Orchestration Events
// ============================================================================

type EventBase = {
  timestamp: string;
  runId: string;
};

export type RunStartedEvent = EventBase & {
  type: "run_started";
  query: string;
};

export type TransitionEvent = EventBase & {
  type: "transition";
  from: OrchestrationState;
  to: OrchestrationState;
  trigger: Trigger;
};

export type DependencyCheckEvent = EventBase & {
  type: "dependency_check";
  capability: string;
  ok: boolean;
  failed: string[];
};

export type StepStartedEvent = EventBase & {
  type: "step_started";
  capability: string;
  cursor: number;
  attempt: number;
};

export type StepCompletedEvent = EventBase & {
  type: "step_completed";
  capability: string;
  cursor: number;
  attempt: number;
  status: "success" | "failure";
  durationMs: number;
  error?: StepError;
};

export type ContextHintEvent = EventBase & {
  type: "context_hint";
  capability: string;
  key: string;
  value: string;
};

/**
 * The paper trail could not be written; the run continues without it.
 */
export type TrailDisabledEvent = EventBase & {
  type: "trail_disabled";
  error: StepError;
};

export type RunCompletedEvent = EventBase & {
  type: "run_completed";
  resultKind: OrchestrationResult["kind"];
  invocations: number;
  durationMs: number;
};

export type OrchestrationEvent =
  | RunStartedEvent
  | TransitionEvent
  | DependencyCheckEvent
  | StepStartedEvent
  | StepCompletedEvent
  | ContextHintEvent
  | TrailDisabledEvent
  | RunCompletedEvent;

export type OrchestrationEventOptions = {
  /** Observer for orchestration events; errors it throws are ignored */
  onEvent?: (event: OrchestrationEvent) => void | Promise<void>;
  /** Set to false to suppress transition events (default: true) */
  emitTransitions?: boolean;
};
