import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseCatalogXml } from "../src/relay/catalog/catalogXml.js";
import type { CapabilityCatalog, CapabilityDefinition } from "../src/relay/catalog/types.js";
import { stepError } from "../src/relay/errors.js";
import type { InstallOptions, InstallResult, Installer } from "../src/relay/installer/types.js";
import type { CapabilityRunner, InvokeOptions } from "../src/relay/orchestrator/stepInvoker.js";
import type { InvocationOutcome, StepContext } from "../src/relay/orchestrator/types.js";

export const FIXTURES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures");

export function fixtureCatalog(): CapabilityCatalog {
  const file = path.join(FIXTURES_DIR, "relay.catalog.xml");
  return parseCatalogXml(fs.readFileSync(file, "utf8"), file);
}

export function catalogFromXml(xml: string): CapabilityCatalog {
  return parseCatalogXml(xml, "/catalogs/relay.catalog.xml");
}

export function makeTempDir(prefix = "relay-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Write a small ESM script and return it as a command runnable with the
 * current Node binary.
 */
export function writeScript(dir: string, name: string, source: string): { program: string; args: string[] } {
  const file = path.join(dir, name);
  fs.writeFileSync(file, source, "utf8");
  return { program: process.execPath, args: [file] };
}

export class FakeInstaller implements Installer {
  readonly name = "fake";
  readonly calls: string[] = [];
  private readonly missing: Set<string>;

  constructor(missing: string[] = []) {
    this.missing = new Set(missing);
  }

  async ensureInstalled(prerequisite: string, _options: InstallOptions): Promise<InstallResult> {
    this.calls.push(prerequisite);
    return this.missing.has(prerequisite) ? { ok: false, reason: "exited with code 1" } : { ok: true };
  }
}

export type RunnerCall = {
  capability: string;
  context: StepContext;
  options: InvokeOptions;
};

type Responder = (capability: string, context: Readonly<StepContext>, call: number) => StepContext | Error;

/**
 * Runner answering from a function: a returned object is the step output,
 * a returned Error becomes a STEP_FAILURE.
 */
export class FakeRunner implements CapabilityRunner {
  readonly calls: RunnerCall[] = [];
  private readonly respond: Responder;

  constructor(respond: Responder = () => ({})) {
    this.respond = respond;
  }

  async invoke(
    capability: CapabilityDefinition,
    context: Readonly<StepContext>,
    options: InvokeOptions
  ): Promise<InvocationOutcome> {
    this.calls.push({ capability: capability.id, context: { ...context }, options });
    const answer = this.respond(capability.id, context, this.calls.length);
    if (answer instanceof Error) {
      return { ok: false, error: stepError("STEP_FAILURE", capability.id, answer.message), durationMs: 1 };
    }
    return { ok: true, output: answer, durationMs: 1 };
  }

  invokedCapabilities(): string[] {
    return this.calls.map((c) => c.capability);
  }
}

export function flushEvents(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
