/**
 * Pipeline selection: an explicit ordered rule list compiled from the catalog.
 * First match wins; catalog declaration order is the tie-break.
 */

import type { CapabilityCatalog } from "../catalog/types.js";
import type { PipelineRequest } from "./types.js";

export type SelectionRule = Readonly<{
  pipeline: string;
  terms: readonly string[];
  steps: readonly string[];
}>;

export type Selection =
  | { pipeline: string; steps: readonly string[]; matchedTerm: string }
  | { pipeline: null; steps: readonly string[] };

export function compileSelectionRules(catalog: CapabilityCatalog): SelectionRule[] {
  return catalog.pipelines.map((p) => ({
    pipeline: p.id,
    terms: p.triggers,
    steps: p.steps
  }));
}

export function selectPipeline(request: PipelineRequest, rules: readonly SelectionRule[]): Selection {
  const query = request.query.toLowerCase();
  for (const rule of rules) {
    const matchedTerm = rule.terms.find((term) => term.length > 0 && query.includes(term));
    if (matchedTerm !== undefined) {
      return { pipeline: rule.pipeline, steps: rule.steps, matchedTerm };
    }
  }
  return { pipeline: null, steps: [] };
}
