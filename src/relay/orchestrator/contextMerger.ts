import type { StepContext } from "./types.js";

/**
 * Fold a step's output into the shared context.
 *
 * Shallow, by top-level key: output keys overwrite, keys the step did not
 * return are left as they were. Nested values are replaced, never merged.
 */
export function mergeContext(context: Readonly<StepContext>, output: Readonly<StepContext>): StepContext {
  return { ...context, ...output };
}
