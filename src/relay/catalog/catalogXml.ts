import fs from "node:fs";
import path from "node:path";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { RelayError } from "../errors.js";
import {
  CATALOG_VERSION,
  type CapabilityCatalog,
  type CapabilityDefinition,
  type CommandSpec,
  type PipelineDefinition
} from "./types.js";

const ARRAY_ELEMENTS = new Set(["capability", "pipeline", "step", "arg"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  isArray: (name, _jPath, _isLeafNode, isAttribute) => !isAttribute && ARRAY_ELEMENTS.has(name)
});

const ArgSchema = z.union([z.string(), z.object({ "#text": z.string() }).transform((v) => v["#text"])]);

const CommandSchema = z.object({
  program: z.string().trim().min(1),
  arg: z.array(ArgSchema).optional()
});

const CapabilitySchema = CommandSchema.extend({
  id: z.string().trim().min(1),
  requires: z.string().optional(),
  "hint-suffixes": z.string().optional()
});

const PipelineSchema = z.object({
  id: z.string().trim().min(1),
  triggers: z.string().optional(),
  step: z.array(z.object({ capability: z.string().trim().min(1) })).optional()
});

const CatalogDocSchema = z.object({
  catalog: z.object({
    version: z.string().optional(),
    installer: CommandSchema.optional(),
    capabilities: z.union([z.literal(""), z.object({ capability: z.array(CapabilitySchema).optional() })]).optional(),
    pipelines: z.union([z.literal(""), z.object({ pipeline: z.array(PipelineSchema).optional() })]).optional()
  })
});

type ParsedCommand = z.infer<typeof CommandSchema>;

function splitList(raw: string | undefined, separator: RegExp): string[] {
  if (!raw) return [];
  return raw
    .split(separator)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function toCommand(raw: ParsedCommand): CommandSpec {
  return { program: raw.program, args: raw.arg ?? [] };
}

function invalid(sourcePath: string, message: string, details?: unknown): RelayError {
  return new RelayError("CATALOG_INVALID", `${message} (${sourcePath})`, details);
}

/**
 * Parse catalog XML into a frozen CapabilityCatalog.
 * @throws RelayError with CATALOG_INVALID on any structural problem.
 */
export function parseCatalogXml(xml: string, sourcePath: string): CapabilityCatalog {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw invalid(sourcePath, `Malformed catalog XML: ${validation.err.msg}`, {
      line: validation.err.line,
      col: validation.err.col
    });
  }

  const parsed = CatalogDocSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    throw invalid(sourcePath, "Catalog document does not match the expected shape", {
      issues: parsed.error.issues
    });
  }
  const doc = parsed.data.catalog;

  const version = doc.version === undefined ? CATALOG_VERSION : Number(doc.version);
  if (version !== CATALOG_VERSION) {
    throw invalid(sourcePath, `Unsupported catalog version: ${doc.version ?? ""}`);
  }

  const capabilities = new Map<string, CapabilityDefinition>();
  const rawCapabilities = doc.capabilities === "" ? [] : (doc.capabilities?.capability ?? []);
  for (const raw of rawCapabilities) {
    if (capabilities.has(raw.id)) {
      throw invalid(sourcePath, `Duplicate capability id: ${raw.id}`);
    }
    capabilities.set(raw.id, {
      id: raw.id,
      ...toCommand(raw),
      requires: splitList(raw.requires, /[\s,]+/),
      hintSuffixes: splitList(raw["hint-suffixes"], /[\s,]+/).map((s) => s.toLowerCase())
    });
  }

  const pipelines: PipelineDefinition[] = [];
  const rawPipelines = doc.pipelines === "" ? [] : (doc.pipelines?.pipeline ?? []);
  for (const raw of rawPipelines) {
    if (pipelines.some((p) => p.id === raw.id)) {
      throw invalid(sourcePath, `Duplicate pipeline id: ${raw.id}`);
    }
    const steps = (raw.step ?? []).map((s) => s.capability);
    if (steps.length === 0) {
      throw invalid(sourcePath, `Pipeline has no steps: ${raw.id}`);
    }
    const unknown = steps.filter((s) => !capabilities.has(s));
    if (unknown.length > 0) {
      throw invalid(sourcePath, `Pipeline ${raw.id} refers to undeclared capabilities: ${unknown.join(", ")}`, {
        pipeline: raw.id,
        unknown
      });
    }
    pipelines.push({
      id: raw.id,
      triggers: splitList(raw.triggers, /,/).map((t) => t.toLowerCase()),
      steps
    });
  }

  const catalog: CapabilityCatalog = {
    baseDir: path.dirname(path.resolve(sourcePath)),
    sourcePath: path.resolve(sourcePath),
    pipelines: Object.freeze(pipelines.map((p) => Object.freeze(p))),
    capabilities
  };
  if (doc.installer) {
    return Object.freeze({ ...catalog, installer: toCommand(doc.installer) });
  }
  return Object.freeze(catalog);
}

export function loadCatalog(catalogPath: string): CapabilityCatalog {
  if (!fs.existsSync(catalogPath)) {
    throw new RelayError("CATALOG_INVALID", `Catalog not found: ${path.resolve(catalogPath)}`);
  }
  let xml: string;
  try {
    xml = fs.readFileSync(catalogPath, "utf8");
  } catch (err) {
    throw new RelayError("IO_ERROR", `Cannot read catalog: ${path.resolve(catalogPath)}`, {
      cause: err instanceof Error ? err.message : String(err)
    });
  }
  return parseCatalogXml(xml, catalogPath);
}
