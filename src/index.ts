export * from "./relay/orchestrator/index.js";
export * from "./relay/catalog/index.js";
export * from "./relay/installer/index.js";
export { RelayError, RELAY_ERROR_CODES, toRelayError, stepError, type RelayErrorCode, type StepError } from "./relay/errors.js";
export { resolveConfig, validateConfig, configFromEnv, DEFAULT_ORCHESTRATION_CONFIG, type ConfigInput } from "./relay/config.js";
export { resolveRelayPaths, DEFAULT_CATALOG_FILE, DEFAULT_RUN_LOG_DIR } from "./relay/paths.js";
export { runProcess, type ProcessResult, type RunProcessOptions } from "./relay/utils/process.js";
