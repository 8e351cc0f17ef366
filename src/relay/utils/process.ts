import { spawn } from "node:child_process";
import type { CommandSpec } from "../catalog/types.js";

/** Captured output beyond this many characters per stream is dropped. */
export const MAX_CAPTURE_CHARS = 64 * 1024;

const PROCESS_GROUPS = process.platform !== "win32";

export type RunProcessOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Deadline in ms; 0 or unset = wait indefinitely */
  timeoutMs?: number;
  /** Time between SIGTERM and SIGKILL when the child is stopped */
  killGraceMs?: number;
  signal?: AbortSignal;
};

export type ProcessResult = {
  /** Exit code, or null when the child was ended by a signal or never started */
  exitCode: number | null;
  exitSignal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  /** Set when the program could not be started at all */
  spawnError?: string;
  durationMs: number;
};

function appendCapped(current: string, chunk: Buffer | string): string {
  if (current.length >= MAX_CAPTURE_CHARS) return current;
  const next = current + chunk.toString();
  return next.length > MAX_CAPTURE_CHARS ? next.slice(0, MAX_CAPTURE_CHARS) : next;
}

/**
 * Run a program to completion and capture its output.
 *
 * Never rejects: spawn failures, deadline expiry and cancellation are all
 * reported on the result. The child runs in its own process group; a stop
 * sends SIGTERM to the group and SIGKILL once the grace period has passed.
 */
export function runProcess(command: CommandSpec, extraArgs: string[], options: RunProcessOptions = {}): Promise<ProcessResult> {
  const started = Date.now();

  return new Promise((resolvePromise) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let aborted = false;
    let settled = false;
    let killTimer: ReturnType<typeof setTimeout> | undefined;

    if (options.signal?.aborted) {
      resolvePromise({
        exitCode: null,
        exitSignal: null,
        stdout,
        stderr,
        timedOut,
        aborted: true,
        durationMs: 0
      });
      return;
    }

    // Own process group, so a stop reaches everything the program started
    const child = spawn(command.program, [...command.args, ...extraArgs], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
      detached: PROCESS_GROUPS
    });

    const signalTree = (signal: NodeJS.Signals): void => {
      if (child.pid === undefined) return;
      try {
        if (PROCESS_GROUPS) {
          process.kill(-child.pid, signal);
        } else {
          child.kill(signal);
        }
      } catch {
        // Group already gone
      }
    };

    const stop = (): void => {
      if (settled || killTimer) return;
      signalTree("SIGTERM");
      killTimer = setTimeout(() => {
        signalTree("SIGKILL");
        // Pipes inherited by a process outside the group would hold "close" back
        child.stdout.destroy();
        child.stderr.destroy();
      }, options.killGraceMs ?? 2_000);
    };

    const deadline =
      options.timeoutMs && options.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            stop();
          }, options.timeoutMs)
        : undefined;

    const onAbort = (): void => {
      aborted = true;
      stop();
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const finish = (result: Omit<ProcessResult, "stdout" | "stderr" | "timedOut" | "aborted" | "durationMs">): void => {
      if (settled) return;
      settled = true;
      if (deadline) clearTimeout(deadline);
      if (killTimer) clearTimeout(killTimer);
      options.signal?.removeEventListener("abort", onAbort);
      resolvePromise({
        ...result,
        stdout,
        stderr,
        timedOut,
        aborted,
        durationMs: Date.now() - started
      });
    };

    child.stdout.on("data", (chunk: Buffer | string) => {
      stdout = appendCapped(stdout, chunk);
    });
    child.stderr.on("data", (chunk: Buffer | string) => {
      stderr = appendCapped(stderr, chunk);
    });

    // "close" follows "error" when the program could not be started
    let spawnError: string | undefined;
    child.on("error", (error) => {
      spawnError ??= error.message;
    });

    child.on("close", (code, signal) => {
      if (spawnError !== undefined && child.pid === undefined) {
        finish({ exitCode: null, exitSignal: null, spawnError });
      } else {
        finish({ exitCode: code, exitSignal: signal });
      }
    });
  });
}

/**
 * Short human-readable reason for a non-successful ProcessResult.
 */
export function describeFailure(result: ProcessResult): string {
  if (result.spawnError !== undefined) return `failed to start: ${result.spawnError}`;
  if (result.aborted) return "cancelled";
  if (result.timedOut) return "deadline exceeded";
  if (result.exitSignal !== null) return `terminated by ${result.exitSignal}`;
  return `exited with code ${result.exitCode ?? "unknown"}`;
}
