/**
 * An external program invocation: the program plus its fixed arguments.
 * Relative paths resolve against the catalog directory, which is also the
 * working directory of every spawned process.
 */
export type CommandSpec = {
  program: string;
  args: string[];
};

export type CapabilityDefinition = CommandSpec & {
  id: string;
  /** Prerequisite names handed to the installer before every attempt */
  requires: string[];
  /**
   * Context values ending with one of these suffixes are reported as hints
   * before the capability runs (e.g. ".pdf" for a document extractor).
   */
  hintSuffixes: string[];
};

export type PipelineDefinition = {
  id: string;
  /** Lower-cased trigger terms, in declaration order */
  triggers: string[];
  /** Ordered capability ids */
  steps: string[];
};

/**
 * Read-only registry loaded once per orchestration run.
 * Pipeline order is significant: it is the selection tie-break.
 */
export type CapabilityCatalog = {
  readonly baseDir: string;
  readonly sourcePath: string;
  readonly pipelines: readonly PipelineDefinition[];
  readonly capabilities: ReadonlyMap<string, CapabilityDefinition>;
  readonly installer?: CommandSpec;
};

export const CATALOG_VERSION = 1;
