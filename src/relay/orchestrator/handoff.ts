/**
 * Handoff documents: the context exchanged with a capability process.
 *
 * The orchestrator writes a versioned envelope into a private temporary
 * directory and passes its path to the capability, which may overwrite it
 * with an updated envelope before exiting.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { RelayError } from "../errors.js";
import type { StepContext } from "./types.js";

export const HANDOFF_FORMAT = "skillrelay.handoff";
export const HANDOFF_VERSION = 1;
export const HANDOFF_FILE_NAME = "context.json";

export type HandoffDocument = {
  format: typeof HANDOFF_FORMAT;
  version: typeof HANDOFF_VERSION;
  capability: string;
  context: StepContext;
};

const HandoffSchema = z.object({
  format: z.literal(HANDOFF_FORMAT),
  version: z.number().int(),
  capability: z.string().optional(),
  context: z.record(z.unknown())
});

export function encodeHandoff(capability: string, context: Readonly<StepContext>): string {
  const doc: HandoffDocument = {
    format: HANDOFF_FORMAT,
    version: HANDOFF_VERSION,
    capability,
    context: { ...context }
  };
  return JSON.stringify(doc, null, 2);
}

/**
 * Parse a handoff document written back by a capability.
 * @throws RelayError with HANDOFF_INVALID when the text is not a supported envelope.
 */
export function decodeHandoff(text: string): StepContext {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new RelayError("HANDOFF_INVALID", "Handoff document is not valid JSON", {
      cause: err instanceof Error ? err.message : String(err)
    });
  }

  const parsed = HandoffSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RelayError("HANDOFF_INVALID", "Handoff document does not match the envelope schema", {
      issues: parsed.error.issues
    });
  }
  if (parsed.data.version !== HANDOFF_VERSION) {
    throw new RelayError("HANDOFF_INVALID", `Unsupported handoff version: ${parsed.data.version}`, {
      supported: HANDOFF_VERSION
    });
  }
  return parsed.data.context;
}

/**
 * A handoff file in its own temporary directory. `dispose()` removes the
 * directory and is safe to call more than once.
 */
export class HandoffFile {
  readonly dir: string;
  readonly path: string;
  private disposed = false;

  private constructor(dir: string) {
    this.dir = dir;
    this.path = path.join(dir, HANDOFF_FILE_NAME);
  }

  static async create(
    capability: string,
    context: Readonly<StepContext>,
    parentDir: string = os.tmpdir()
  ): Promise<HandoffFile> {
    const dir = await fs.mkdtemp(path.join(parentDir, "relay-handoff-"));
    const file = new HandoffFile(dir);
    try {
      await fs.writeFile(file.path, encodeHandoff(capability, context), "utf8");
    } catch (err) {
      await file.dispose();
      throw new RelayError("IO_ERROR", `Cannot write handoff file: ${file.path}`, {
        cause: err instanceof Error ? err.message : String(err)
      });
    }
    return file;
  }

  async read(): Promise<StepContext> {
    let text: string;
    try {
      text = await fs.readFile(this.path, "utf8");
    } catch (err) {
      throw new RelayError("HANDOFF_INVALID", `Handoff file is unreadable: ${this.path}`, {
        cause: err instanceof Error ? err.message : String(err)
      });
    }
    return decodeHandoff(text);
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await fs.rm(this.dir, { recursive: true, force: true });
  }
}
