import fs from "node:fs/promises";
import path from "node:path";
import type { InstallOptions, InstallResult, Installer } from "./types.js";

async function isExecutable(file: string): Promise<boolean> {
  try {
    const stat = await fs.stat(file);
    if (!stat.isFile()) return false;
    await fs.access(file, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Default installer when none is configured: installs nothing, only
 * succeeds when the prerequisite is already an executable on PATH.
 */
export class PathLookupInstaller implements Installer {
  readonly name = "path-lookup";
  private readonly searchPath: string;

  constructor(searchPath: string = process.env.PATH ?? "") {
    this.searchPath = searchPath;
  }

  async ensureInstalled(prerequisite: string, options: InstallOptions): Promise<InstallResult> {
    if (options.signal?.aborted) {
      return { ok: false, reason: "cancelled" };
    }

    const candidates = prerequisite.includes("/") || prerequisite.includes(path.sep)
      ? [path.resolve(prerequisite)]
      : this.searchPath
          .split(path.delimiter)
          .filter((dir) => dir.length > 0)
          .map((dir) => path.join(dir, prerequisite));

    for (const candidate of candidates) {
      if (await isExecutable(candidate)) return { ok: true };
    }
    return { ok: false, reason: `"${prerequisite}" not found on PATH` };
  }
}
