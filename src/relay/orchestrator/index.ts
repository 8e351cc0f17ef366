export type {
  OrchestrationState,
  Trigger,
  StepContext,
  PipelineRequest,
  PipelineInstance,
  InvocationOutcome,
  MachineEvent,
  MachineSnapshot,
  RetryPolicy,
  EdgePredicate,
  EdgeEffect,
  TransitionEdge,
  TransitionRecord,
  OrchestrationConfig,
  OrchestrationInput,
  OrchestrationResult,
  RunStartedEvent,
  TransitionEvent,
  DependencyCheckEvent,
  StepStartedEvent,
  StepCompletedEvent,
  ContextHintEvent,
  TrailDisabledEvent,
  RunCompletedEvent,
  OrchestrationEvent,
  OrchestrationEventOptions
} from "./types.js";
export { ORCHESTRATION_STATES, INITIAL_STATE, TERMINAL_STATE } from "./types.js";
export { Orchestrator, type OrchestratorDependencies } from "./orchestrator.js";
export { TRANSITIONS, transition, findEdge, createInstance, initialSnapshot, isTerminal, availableTriggers } from "./stateMachine.js";
export { compileSelectionRules, selectPipeline, type Selection, type SelectionRule } from "./selector.js";
export { DependencyGate, type GateResult, type PrerequisiteFailure } from "./dependencyGate.js";
export { StepInvoker, type CapabilityRunner, type InvokeOptions } from "./stepInvoker.js";
export { HandoffFile, encodeHandoff, decodeHandoff, HANDOFF_FORMAT, HANDOFF_VERSION } from "./handoff.js";
export { mergeContext } from "./contextMerger.js";
export { DEFAULT_MAX_RETRIES, decide, canRetry, recordFailure, countFailedAttempt } from "./retryController.js";
