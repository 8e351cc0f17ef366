import { describe, expect, it } from "vitest";
import { compileSelectionRules, selectPipeline } from "../src/relay/orchestrator/selector.js";
import { mergeContext } from "../src/relay/orchestrator/contextMerger.js";
import { canRetry, countFailedAttempt, decide, recordFailure } from "../src/relay/orchestrator/retryController.js";
import { createInstance } from "../src/relay/orchestrator/stateMachine.js";
import { stepError } from "../src/relay/errors.js";
import { fixtureCatalog } from "./helpers.js";

describe("selectPipeline", () => {
  const rules = compileSelectionRules(fixtureCatalog());

  it("compiles one rule per pipeline in catalog order", () => {
    expect(rules.map((r) => r.pipeline)).toEqual(["pdf_processing", "dev_workflow", "diagram_creation"]);
    expect(rules[0]?.terms).toEqual(["pdf", "document"]);
  });

  it("matches terms case-insensitively", () => {
    expect(selectPipeline({ query: "Draw a DIAGRAM of the flow" }, rules)).toEqual({
      pipeline: "diagram_creation",
      steps: ["render", "verify"],
      matchedTerm: "diagram"
    });
  });

  it("matches substrings", () => {
    expect(selectPipeline({ query: "split the documents" }, rules).pipeline).toBe("pdf_processing");
  });

  it("lets the earlier pipeline win", () => {
    expect(selectPipeline({ query: "diagram for the dev team" }, rules).pipeline).toBe("dev_workflow");
  });

  it("returns no pipeline and no steps on a miss", () => {
    expect(selectPipeline({ query: "make coffee" }, rules)).toEqual({ pipeline: null, steps: [] });
  });

  it("ignores empty terms", () => {
    const emptyRules = [{ pipeline: "p", terms: [""], steps: ["a"] }];
    expect(selectPipeline({ query: "anything" }, emptyRules).pipeline).toBeNull();
  });
});

describe("mergeContext", () => {
  it("overwrites keys the step returned and keeps the rest", () => {
    expect(mergeContext({ a: 1, b: { x: 1 } }, { b: { y: 2 }, c: 3 })).toEqual({ a: 1, b: { y: 2 }, c: 3 });
  });

  it("gives the same context when an output is merged twice", () => {
    const context = { a: 1, nested: { keep: true } };
    const output = { b: 2, nested: { replaced: [1, 2] } };
    const once = mergeContext(context, output);
    expect(mergeContext(once, output)).toEqual(once);
    expect(once).toEqual({ a: 1, b: 2, nested: { replaced: [1, 2] } });
  });

  it("does not mutate its inputs", () => {
    const context = { a: 1 };
    const output = { a: 2 };
    const merged = mergeContext(context, output);
    expect(context).toEqual({ a: 1 });
    expect(merged).not.toBe(context);
  });
});

describe("retry controller", () => {
  const error = stepError("STEP_FAILURE", "a", "boom");

  it("records a failure without counting it", () => {
    const next = recordFailure(createInstance(), error);
    expect(next.retryCount).toBe(0);
    expect(next.lastError).toEqual(error);
    expect(next.lastOutcome).toBe("failure");
  });

  it("counts attempts one at a time", () => {
    expect(countFailedAttempt(countFailedAttempt(createInstance())).retryCount).toBe(2);
  });

  it("retries while below the budget", () => {
    const instance = { ...createInstance(), retryCount: 2 };
    expect(canRetry(instance, { maxRetries: 3 })).toBe(true);
    expect(decide(instance, { maxRetries: 3 })).toBe("retry");
    expect(decide(instance, { maxRetries: 2 })).toBe("abort");
  });
});
