/**
 * Orchestration state machine.
 *
 * The whole control core is the static TRANSITIONS table plus a pure
 * `transition(snapshot, event, policy)` function. The driver performs the
 * side effects (installer, child processes) and feeds their results back in
 * as event payloads.
 */

import { mergeContext } from "./contextMerger.js";
import { canRetry, countFailedAttempt, recordFailure } from "./retryController.js";
import {
  INITIAL_STATE,
  TERMINAL_STATE,
  type EdgePredicate,
  type MachineEvent,
  type MachineSnapshot,
  type OrchestrationState,
  type PipelineInstance,
  type RetryPolicy,
  type StepContext,
  type TransitionEdge
} from "./types.js";

export function createInstance(context: StepContext = {}): PipelineInstance {
  return {
    pipeline: null,
    selectedSteps: [],
    cursor: 0,
    context: { ...context },
    retryCount: 0,
    lastError: null,
    lastOutcome: null
  };
}

export function initialSnapshot(context?: StepContext): MachineSnapshot {
  return { state: INITIAL_STATE, instance: createInstance(context) };
}

export function currentStep(instance: PipelineInstance): string | undefined {
  return instance.selectedSteps[instance.cursor];
}

const selectionNonEmpty: EdgePredicate = (_instance, event) =>
  event.trigger === "select" && event.steps.length > 0;

const hasNextStep: EdgePredicate = (instance) => instance.cursor < instance.selectedSteps.length;

const stepSucceeded: EdgePredicate = (instance) => instance.lastOutcome === "success";

const stepFailed: EdgePredicate = (instance) => instance.lastOutcome === "failure";

const retryAllowed: EdgePredicate = (instance, _event, policy) => canRetry(instance, policy);

const NON_TERMINAL_STATES: readonly OrchestrationState[] = [
  "analyze_query",
  "select_pipeline",
  "check_dependencies",
  "invoke_skill",
  "handle_output",
  "iterate_on_error"
];

const TRANSITION_TABLE: TransitionEdge[] = [
  { from: "analyze_query", to: "select_pipeline", trigger: "analyze" },
  {
    from: "select_pipeline",
    to: "check_dependencies",
    trigger: "select",
    guard: selectionNonEmpty,
    effect: (instance, event) =>
      event.trigger === "select"
        ? { ...instance, pipeline: event.pipeline, selectedSteps: [...event.steps], cursor: 0 }
        : instance
  },
  { from: "check_dependencies", to: "invoke_skill", trigger: "deps_ok" },
  {
    from: "check_dependencies",
    to: "iterate_on_error",
    trigger: "deps_fail",
    effect: (instance, event) =>
      event.trigger === "deps_fail" ? countFailedAttempt(recordFailure(instance, event.error)) : instance
  },
  {
    from: "invoke_skill",
    to: "handle_output",
    trigger: "invoke",
    effect: (instance, event) => {
      if (event.trigger !== "invoke") return instance;
      const { outcome } = event;
      if (!outcome.ok) return recordFailure(instance, outcome.error);
      return {
        ...instance,
        context: mergeContext(instance.context, outcome.output),
        cursor: instance.cursor + 1,
        retryCount: 0,
        lastError: null,
        lastOutcome: "success"
      };
    }
  },
  {
    from: "handle_output",
    to: "check_dependencies",
    trigger: "success",
    guard: (instance, event, policy) => stepSucceeded(instance, event, policy) && hasNextStep(instance, event, policy)
  },
  {
    from: "handle_output",
    to: "complete",
    trigger: "success",
    guard: stepSucceeded,
    unless: hasNextStep
  },
  {
    from: "handle_output",
    to: "iterate_on_error",
    trigger: "error",
    guard: stepFailed,
    effect: (instance) => countFailedAttempt(instance)
  },
  { from: "iterate_on_error", to: "check_dependencies", trigger: "retry", guard: retryAllowed },
  { from: "iterate_on_error", to: "complete", trigger: "fail", unless: retryAllowed },
  ...NON_TERMINAL_STATES.map(
    (from): TransitionEdge => ({
      from,
      to: TERMINAL_STATE,
      trigger: "abort",
      effect: (instance, event) => (event.trigger === "abort" ? { ...instance, lastError: event.error } : instance)
    })
  )
];

export const TRANSITIONS: readonly TransitionEdge[] = Object.freeze(TRANSITION_TABLE);

/**
 * Find the edge that fires for `event` in the snapshot's state.
 * Edges are tried in table order; the first whose guards pass wins.
 */
export function findEdge(
  snapshot: MachineSnapshot,
  event: MachineEvent,
  policy: RetryPolicy
): TransitionEdge | undefined {
  return TRANSITIONS.find(
    (edge) =>
      edge.from === snapshot.state &&
      edge.trigger === event.trigger &&
      (edge.guard === undefined || edge.guard(snapshot.instance, event, policy)) &&
      (edge.unless === undefined || !edge.unless(snapshot.instance, event, policy))
  );
}

/**
 * Apply one event. Returns undefined when no edge fires, leaving the caller
 * to decide what an invalid trigger means.
 */
export function transition(
  snapshot: MachineSnapshot,
  event: MachineEvent,
  policy: RetryPolicy
): MachineSnapshot | undefined {
  const edge = findEdge(snapshot, event, policy);
  if (!edge) return undefined;
  const instance = edge.effect ? edge.effect(snapshot.instance, event, policy) : snapshot.instance;
  return { state: edge.to, instance };
}

export function isTerminal(state: OrchestrationState): boolean {
  return state === TERMINAL_STATE;
}

/**
 * Triggers with at least one edge out of `state`, in table order.
 */
export function availableTriggers(state: OrchestrationState): MachineEvent["trigger"][] {
  const triggers: MachineEvent["trigger"][] = [];
  for (const edge of TRANSITIONS) {
    if (edge.from === state && !triggers.includes(edge.trigger)) triggers.push(edge.trigger);
  }
  return triggers;
}
