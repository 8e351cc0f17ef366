import type { StepError } from "../errors.js";
import type { PipelineInstance, RetryPolicy } from "./types.js";

export const DEFAULT_MAX_RETRIES = 3;

export type RetryDecision = "retry" | "abort";

/**
 * Keep the detail of a failure without counting it.
 */
export function recordFailure(instance: PipelineInstance, error: StepError): PipelineInstance {
  return { ...instance, lastError: error, lastOutcome: "failure" };
}

/**
 * Count one failed attempt of the current step.
 */
export function countFailedAttempt(instance: PipelineInstance): PipelineInstance {
  return { ...instance, retryCount: instance.retryCount + 1 };
}

export function canRetry(instance: PipelineInstance, policy: RetryPolicy): boolean {
  return instance.retryCount < policy.maxRetries;
}

/**
 * Retries are immediate and capped by count only.
 */
export function decide(instance: PipelineInstance, policy: RetryPolicy): RetryDecision {
  return canRetry(instance, policy) ? "retry" : "abort";
}
