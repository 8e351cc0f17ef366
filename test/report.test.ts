import { describe, expect, it } from "vitest";
import { stepError } from "../src/relay/errors.js";
import {
  EXIT_CODES,
  formatEvent,
  formatResult,
  parseCommandOption,
  parseContextOption,
  parseRunLogOption,
  resultToExitCode
} from "../src/relay/report.js";
import { createInstance } from "../src/relay/orchestrator/stateMachine.js";
import type { OrchestrationResult } from "../src/relay/orchestrator/types.js";

// Matches ANSI color codes so assertions hold with or without a TTY
const ANSI = /\u001b\[[0-9;]*m/g;

function plain(text: string | null): string | null {
  return text === null ? null : text.replace(ANSI, "");
}

const summary = {
  runId: "run-1",
  state: "complete" as const,
  request: { query: "diagram" },
  instance: { ...createInstance(), pipeline: "diagram_creation", selectedSteps: ["render", "verify"], cursor: 1 },
  invocations: 3,
  history: [],
  durationMs: 10
};

const failure = stepError("STEP_FAILURE", "verify", 'Capability "verify" exited with code 1');

describe("resultToExitCode", () => {
  it("maps every result kind", () => {
    const results: OrchestrationResult[] = [
      { ...summary, kind: "ok" },
      { ...summary, kind: "no_match", error: stepError("SELECTION_MISS", null, "miss") },
      { ...summary, kind: "failed", error: failure },
      { ...summary, kind: "cancelled", error: stepError("CANCELLED", "verify", "Run cancelled") }
    ];
    expect(results.map(resultToExitCode)).toEqual([
      EXIT_CODES.OK,
      EXIT_CODES.NO_MATCH,
      EXIT_CODES.FAILED,
      EXIT_CODES.CANCELLED
    ]);
    expect(EXIT_CODES).toEqual({ OK: 0, NO_MATCH: 10, FAILED: 20, ERROR: 30, CANCELLED: 40 });
  });
});

describe("parseContextOption", () => {
  it("defaults to an empty context", () => {
    expect(parseContextOption(undefined)).toEqual({});
    expect(parseContextOption("  ")).toEqual({});
  });

  it("parses a JSON object", () => {
    expect(parseContextOption('{"file_path":"a.pdf","pages":2}')).toEqual({ file_path: "a.pdf", pages: 2 });
  });

  it("rejects invalid JSON", () => {
    expect(() => parseContextOption("{nope")).toThrowError("--context must be valid JSON");
  });

  it("rejects arrays and scalars", () => {
    expect(() => parseContextOption("[1,2]")).toThrowError("--context must be a JSON object");
    expect(() => parseContextOption("42")).toThrowError("--context must be a JSON object");
  });
});

describe("parseCommandOption", () => {
  it("splits on whitespace", () => {
    expect(parseCommandOption("  node   install.mjs --quiet ")).toEqual({
      program: "node",
      args: ["install.mjs", "--quiet"]
    });
  });

  it("passes through an absent option", () => {
    expect(parseCommandOption(undefined)).toBeUndefined();
  });

  it("rejects an empty command", () => {
    expect(() => parseCommandOption("   ")).toThrowError("--installer must name a program");
  });
});

describe("parseRunLogOption", () => {
  it("writes no trail when the option is absent", () => {
    expect(parseRunLogOption(undefined, "/work")).toBeUndefined();
  });

  it("uses the default run-log directory for a bare flag", () => {
    expect(parseRunLogOption(true, "/work")).toBe("/work/.relay/runs");
  });

  it("keeps a named directory", () => {
    expect(parseRunLogOption("logs", "/work")).toBe("logs");
  });
});

describe("formatEvent", () => {
  const base = { timestamp: "2026-01-01T00:00:00.000Z", runId: "run-1" };

  it("formats transitions", () => {
    expect(
      plain(formatEvent({ ...base, type: "transition", from: "invoke_skill", to: "handle_output", trigger: "invoke" }))
    ).toBe("  invoke_skill -> handle_output (invoke)");
  });

  it("formats step attempts", () => {
    expect(plain(formatEvent({ ...base, type: "step_started", capability: "render", cursor: 0, attempt: 2 }))).toBe(
      "  > render (step 1, attempt 2)"
    );
  });

  it("formats failed steps with their error", () => {
    expect(
      plain(
        formatEvent({
          ...base,
          type: "step_completed",
          capability: "verify",
          cursor: 1,
          attempt: 1,
          status: "failure",
          durationMs: 5,
          error: failure
        })
      )
    ).toBe('  ✗ verify: [STEP_FAILURE] Capability "verify" exited with code 1');
  });

  it("hides passing dependency checks and run completion", () => {
    expect(formatEvent({ ...base, type: "dependency_check", capability: "render", ok: true, failed: [] })).toBeNull();
    expect(
      formatEvent({ ...base, type: "run_completed", resultKind: "ok", invocations: 2, durationMs: 5 })
    ).toBeNull();
  });

  it("warns when the paper trail is turned off", () => {
    const error = stepError("IO_ERROR", null, "Paper trail disabled: EACCES");
    expect(plain(formatEvent({ ...base, type: "trail_disabled", error }))).toBe("  ! Paper trail disabled: EACCES");
  });

  it("lists missing prerequisites", () => {
    expect(
      plain(formatEvent({ ...base, type: "dependency_check", capability: "render", ok: false, failed: ["java", "dot"] }))
    ).toBe("  ! prerequisites missing for render: java, dot");
  });
});

describe("formatResult", () => {
  it("summarizes a completed pipeline", () => {
    expect(formatResult({ ...summary, kind: "ok" }).map(plain)).toEqual([
      "✓ Pipeline diagram_creation completed",
      "  Steps: 1/2, invocations: 3"
    ]);
  });

  it("includes the last error of an exhausted pipeline", () => {
    const error = stepError("EXHAUSTED_RETRIES", "verify", 'Pipeline aborted after 3 failed attempt(s) of "verify"');
    error.cause = failure;
    expect(formatResult({ ...summary, kind: "failed", error }).map(plain)).toEqual([
      '✗ [EXHAUSTED_RETRIES] Pipeline aborted after 3 failed attempt(s) of "verify"',
      "  Steps: 1/2 completed",
      '  Last error: [STEP_FAILURE] Capability "verify" exited with code 1'
    ]);
  });

  it("shows the selection miss message", () => {
    const error = stepError("SELECTION_MISS", null, 'No pipeline matches the request: "tea"');
    expect(formatResult({ ...summary, kind: "no_match", error }).map(plain)).toEqual([
      '⚠ No pipeline matches the request: "tea"'
    ]);
  });
});
