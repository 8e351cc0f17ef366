import type { CapabilityDefinition } from "../catalog/types.js";
import { stepError, type StepError } from "../errors.js";
import type { InstallOptions, Installer } from "../installer/types.js";

export type PrerequisiteFailure = {
  prerequisite: string;
  reason: string;
  details?: unknown;
};

export type GateResult =
  | { ok: true; checked: string[] }
  | { ok: false; checked: string[]; failed: PrerequisiteFailure[]; error: StepError };

/**
 * Verifies a capability's prerequisites through the installer before every
 * attempt. Every prerequisite is tried so the failure list is complete.
 */
export class DependencyGate {
  private readonly installer: Installer;

  constructor(installer: Installer) {
    this.installer = installer;
  }

  get installerName(): string {
    return this.installer.name;
  }

  async check(capability: CapabilityDefinition, options: InstallOptions): Promise<GateResult> {
    const checked: string[] = [];
    const failed: PrerequisiteFailure[] = [];

    for (const prerequisite of capability.requires) {
      if (options.signal?.aborted) {
        failed.push({ prerequisite, reason: "cancelled" });
        break;
      }
      checked.push(prerequisite);
      const result = await this.installer.ensureInstalled(prerequisite, options);
      if (!result.ok) {
        const failure: PrerequisiteFailure = { prerequisite, reason: result.reason };
        if (result.details !== undefined) failure.details = result.details;
        failed.push(failure);
      }
    }

    if (failed.length === 0) {
      return { ok: true, checked };
    }

    const names = failed.map((f) => f.prerequisite);
    return {
      ok: false,
      checked,
      failed,
      error: stepError(
        "DEPENDENCY_FAILURE",
        capability.id,
        `Prerequisites unavailable for "${capability.id}": ${names.join(", ")}`,
        { failed }
      )
    };
  }
}
