import type { CapabilityDefinition } from "../catalog/types.js";
import { stepError, toRelayError, type StepError } from "../errors.js";
import { describeFailure, runProcess, type ProcessResult, type RunProcessOptions } from "../utils/process.js";
import { HandoffFile } from "./handoff.js";
import type { InvocationOutcome, StepContext } from "./types.js";

export type InvokeOptions = {
  /** Deadline for the capability process; 0 disables it */
  timeoutMs: number;
  killGraceMs: number;
  signal?: AbortSignal;
};

/**
 * Runs one capability against the current context.
 * Implementations report failures in the outcome and never reject.
 */
export interface CapabilityRunner {
  invoke(capability: CapabilityDefinition, context: Readonly<StepContext>, options: InvokeOptions): Promise<InvocationOutcome>;
}

export type StepInvokerOptions = {
  /** Working directory of capability processes (the catalog directory) */
  cwd: string;
  /** Base environment; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Where handoff directories are created; defaults to the OS temp dir */
  handoffParentDir?: string;
};

function processFailure(capability: string, result: ProcessResult): StepError {
  const code = result.aborted ? "CANCELLED" : result.timedOut ? "STEP_TIMEOUT" : "STEP_FAILURE";
  return stepError(code, capability, `Capability "${capability}" ${describeFailure(result)}`, {
    exitCode: result.exitCode,
    ...(result.exitSignal !== null && { signal: result.exitSignal }),
    ...(result.stderr.trim() !== "" && { stderr: result.stderr.trim() })
  });
}

/**
 * Executes capabilities as separate processes:
 * `program ...args --input <handoffPath>`.
 */
export class StepInvoker implements CapabilityRunner {
  private readonly cwd: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly handoffParentDir: string | undefined;

  constructor(options: StepInvokerOptions) {
    this.cwd = options.cwd;
    this.env = options.env ?? process.env;
    this.handoffParentDir = options.handoffParentDir;
  }

  async invoke(
    capability: CapabilityDefinition,
    context: Readonly<StepContext>,
    options: InvokeOptions
  ): Promise<InvocationOutcome> {
    const started = Date.now();
    const fail = (error: StepError): InvocationOutcome => ({ ok: false, error, durationMs: Date.now() - started });

    let handoff: HandoffFile;
    try {
      handoff = await HandoffFile.create(capability.id, context, this.handoffParentDir);
    } catch (err) {
      return fail(toRelayError(err).toStepError(capability.id));
    }

    try {
      const runOptions: RunProcessOptions = {
        cwd: this.cwd,
        env: {
          ...this.env,
          RELAY_HANDOFF_PATH: handoff.path,
          RELAY_CAPABILITY: capability.id
        },
        timeoutMs: options.timeoutMs,
        killGraceMs: options.killGraceMs
      };
      if (options.signal !== undefined) {
        runOptions.signal = options.signal;
      }

      const result = await runProcess(capability, ["--input", handoff.path], runOptions);
      if (result.exitCode !== 0 || result.timedOut || result.aborted) {
        return fail(processFailure(capability.id, result));
      }

      try {
        const output = await handoff.read();
        return { ok: true, output, durationMs: Date.now() - started };
      } catch (err) {
        return fail(toRelayError(err).toStepError(capability.id));
      }
    } finally {
      await handoff.dispose();
    }
  }
}
