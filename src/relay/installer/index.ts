export type { Installer, InstallOptions, InstallResult } from "./types.js";
export { ProcessInstaller } from "./processInstaller.js";
export { PathLookupInstaller } from "./pathLookupInstaller.js";

import type { CommandSpec } from "../catalog/types.js";
import { PathLookupInstaller } from "./pathLookupInstaller.js";
import { ProcessInstaller } from "./processInstaller.js";
import type { Installer } from "./types.js";

/**
 * A configured installer command runs as a ProcessInstaller; without one,
 * prerequisites are looked up on PATH.
 */
export function createInstaller(command: CommandSpec | undefined, cwd?: string): Installer {
  if (command) {
    return new ProcessInstaller(command, cwd);
  }
  return new PathLookupInstaller();
}
