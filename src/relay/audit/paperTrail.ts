import fs from "node:fs";
import path from "node:path";
import { ensureDir } from "../paths.js";

function isoNow(): string {
  return new Date().toISOString();
}

export type PaperTrail = {
  runDir: string;
  progressPath: string;
  errorsPath: string;
};

/**
 * Create `<runLogDir>/<runId>/` with its progress and error logs.
 */
export function createPaperTrail(runLogDir: string, runId: string, query: string): PaperTrail {
  const runDir = path.join(runLogDir, runId);
  ensureDir(runDir);
  const progressPath = path.join(runDir, "progress.md");
  const errorsPath = path.join(runDir, "errors.md");
  if (!fs.existsSync(progressPath)) fs.writeFileSync(progressPath, `# Run ${runId}\n\nQuery: ${query}\n\n`, "utf8");
  if (!fs.existsSync(errorsPath)) fs.writeFileSync(errorsPath, "# Errors\n\n", "utf8");
  return { runDir, progressPath, errorsPath };
}

export function appendProgress(progressPath: string, line: string): void {
  fs.appendFileSync(progressPath, `- [${isoNow()}] ${line}\n`, "utf8");
}

export function appendError(errorsPath: string, title: string, details?: string): void {
  const header = `## ${isoNow()} ${title}\n`;
  const body = details ? `\n${details}\n` : "\n";
  fs.appendFileSync(errorsPath, `${header}${body}\n`, "utf8");
}
