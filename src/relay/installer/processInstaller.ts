import type { CommandSpec } from "../catalog/types.js";
import { describeFailure, runProcess, type RunProcessOptions } from "../utils/process.js";
import type { InstallOptions, InstallResult, Installer } from "./types.js";

/**
 * Runs `program ...args <prerequisite>`; exit code 0 means the prerequisite
 * is present, whether it was already installed or just installed.
 */
export class ProcessInstaller implements Installer {
  readonly name: string;
  private readonly command: CommandSpec;
  private readonly cwd: string | undefined;

  constructor(command: CommandSpec, cwd?: string) {
    this.command = command;
    this.cwd = cwd;
    this.name = [command.program, ...command.args].join(" ");
  }

  async ensureInstalled(prerequisite: string, options: InstallOptions): Promise<InstallResult> {
    const runOptions: RunProcessOptions = {
      timeoutMs: options.timeoutMs,
      killGraceMs: options.killGraceMs
    };
    if (this.cwd !== undefined) runOptions.cwd = this.cwd;
    if (options.signal !== undefined) runOptions.signal = options.signal;

    const result = await runProcess(this.command, [prerequisite], runOptions);
    if (result.exitCode === 0 && !result.timedOut && !result.aborted) {
      return { ok: true };
    }
    return {
      ok: false,
      reason: describeFailure(result),
      details: {
        exitCode: result.exitCode,
        timedOut: result.timedOut,
        aborted: result.aborted,
        ...(result.stderr.trim() !== "" && { stderr: result.stderr.trim() })
      }
    };
  }
}
