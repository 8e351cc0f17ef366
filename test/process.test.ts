import { describe, expect, it } from "vitest";
import fs from "node:fs";
import { MAX_CAPTURE_CHARS, describeFailure, runProcess, type ProcessResult } from "../src/relay/utils/process.js";
import { makeTempDir, writeScript } from "./helpers.js";

describe("runProcess", () => {
  it("captures output and the exit code", async () => {
    const cmd = writeScript(makeTempDir(), "hello.mjs", `process.stdout.write("hello");`);
    const result = await runProcess(cmd, []);
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("hello");
    expect(result.timedOut).toBe(false);
    expect(result.aborted).toBe(false);
  });

  it("appends extra arguments after the command's own", async () => {
    const cmd = writeScript(makeTempDir(), "args.mjs", `process.stdout.write(JSON.stringify(process.argv.slice(2)));`);
    const result = await runProcess(cmd, ["--input", "ctx.json"]);
    expect(JSON.parse(result.stdout)).toEqual(["--input", "ctx.json"]);
  });

  it("runs in the given directory with the given environment", async () => {
    const dir = makeTempDir();
    const cmd = writeScript(
      dir,
      "env.mjs",
      `process.stdout.write(JSON.stringify({ cwd: process.cwd(), value: process.env.RELAY_TEST_VALUE }));`
    );
    const result = await runProcess(cmd, [], { cwd: dir, env: { ...process.env, RELAY_TEST_VALUE: "abc" } });
    expect(JSON.parse(result.stdout)).toEqual({ cwd: fs.realpathSync(dir), value: "abc" });
  });

  it("reports a non-zero exit with stderr", async () => {
    const cmd = writeScript(makeTempDir(), "fail.mjs", `process.stderr.write("bad"); process.exit(3);`);
    const result = await runProcess(cmd, []);
    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe("bad");
    expect(describeFailure(result)).toBe("exited with code 3");
  });

  it("reports a program that cannot start", async () => {
    const result = await runProcess({ program: "/nonexistent/relay-missing-program", args: [] }, []);
    expect(result.exitCode).toBeNull();
    expect(result.spawnError).toBeDefined();
    expect(describeFailure(result).startsWith("failed to start: ")).toBe(true);
  });

  it("terminates a child that passes its deadline", async () => {
    const cmd = writeScript(makeTempDir(), "sleep.mjs", `setTimeout(() => {}, 30000);`);
    const result = await runProcess(cmd, [], { timeoutMs: 200, killGraceMs: 200 });
    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
    expect(result.exitSignal).toBe("SIGTERM");
    expect(describeFailure(result)).toBe("deadline exceeded");
  });

  it("stops the commands a shell started when the deadline passes", async () => {
    const result = await runProcess({ program: "sh", args: ["-c", "sleep 6; echo done"] }, [], {
      timeoutMs: 300,
      killGraceMs: 200
    });
    expect(result.timedOut).toBe(true);
    expect(result.stdout).toBe("");
    expect(result.durationMs).toBeLessThan(3000);
  });

  it("stops background commands a shell left running when cancelled", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 300);
    const result = await runProcess({ program: "sh", args: ["-c", "sleep 6 & sleep 6; echo done"] }, [], {
      signal: controller.signal,
      killGraceMs: 200
    });
    expect(result.aborted).toBe(true);
    expect(result.durationMs).toBeLessThan(3000);
  });

  it("escalates to SIGKILL when SIGTERM is ignored", async () => {
    const cmd = writeScript(
      makeTempDir(),
      "stubborn.mjs",
      `process.on("SIGTERM", () => {}); setInterval(() => {}, 1000);`
    );
    const result = await runProcess(cmd, [], { timeoutMs: 1500, killGraceMs: 200 });
    expect(result.timedOut).toBe(true);
    expect(result.exitSignal).toBe("SIGKILL");
  });

  it("stops the child when the signal aborts", async () => {
    const cmd = writeScript(makeTempDir(), "sleep.mjs", `setTimeout(() => {}, 30000);`);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 200);
    const result = await runProcess(cmd, [], { signal: controller.signal, killGraceMs: 200 });
    expect(result.aborted).toBe(true);
    expect(result.timedOut).toBe(false);
    expect(describeFailure(result)).toBe("cancelled");
  });

  it("does not start when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await runProcess({ program: process.execPath, args: ["-e", ""] }, [], { signal: controller.signal });
    expect(result.aborted).toBe(true);
    expect(result.exitCode).toBeNull();
    expect(result.durationMs).toBe(0);
  });

  it("caps captured output", async () => {
    const cmd = writeScript(makeTempDir(), "loud.mjs", `process.stdout.write("x".repeat(${MAX_CAPTURE_CHARS + 5000}));`);
    const result = await runProcess(cmd, []);
    expect(result.exitCode).toBe(0);
    expect(result.stdout.length).toBe(MAX_CAPTURE_CHARS);
  });
});

describe("describeFailure", () => {
  const base: ProcessResult = {
    exitCode: null,
    exitSignal: null,
    stdout: "",
    stderr: "",
    timedOut: false,
    aborted: false,
    durationMs: 1
  };

  it("prefers cancellation over the deadline", () => {
    expect(describeFailure({ ...base, aborted: true, timedOut: true })).toBe("cancelled");
  });

  it("names the terminating signal", () => {
    expect(describeFailure({ ...base, exitSignal: "SIGSEGV" })).toBe("terminated by SIGSEGV");
  });

  it("falls back to an unknown exit code", () => {
    expect(describeFailure(base)).toBe("exited with code unknown");
  });
});
