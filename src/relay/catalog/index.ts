export type { CapabilityCatalog, CapabilityDefinition, CommandSpec, PipelineDefinition } from "./types.js";
export { CATALOG_VERSION } from "./types.js";
export { loadCatalog, parseCatalogXml } from "./catalogXml.js";
