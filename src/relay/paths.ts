import path from "node:path";
import fs from "node:fs";

export const DEFAULT_CATALOG_FILE = "relay.catalog.xml";
export const DEFAULT_RUN_LOG_DIR = path.join(".relay", "runs");

export type RelayPaths = {
  workDir: string;
  catalogPath: string;
  runLogDir: string;
};

export function resolveRelayPaths(workDir: string): RelayPaths {
  const root = path.resolve(workDir);
  return {
    workDir: root,
    catalogPath: path.resolve(root, DEFAULT_CATALOG_FILE),
    runLogDir: path.resolve(root, DEFAULT_RUN_LOG_DIR)
  };
}

export function ensureDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}
