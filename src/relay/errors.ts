import { ZodError } from "zod";

/**
 * Failure codes of a run, in the order a pipeline can hit them, followed by
 * the codes raised while loading a catalog or configuration.
 */
export const RELAY_ERROR_CODES = [
  "SELECTION_MISS",
  "DEPENDENCY_FAILURE",
  "STEP_FAILURE",
  "STEP_TIMEOUT",
  "HANDOFF_INVALID",
  "EXHAUSTED_RETRIES",
  "CANCELLED",
  "CATALOG_INVALID",
  "CONFIG_INVALID",
  "BAD_REQUEST",
  "IO_ERROR",
  "INTERNAL"
] as const;

export type RelayErrorCode = (typeof RELAY_ERROR_CODES)[number];

/**
 * Failure record kept on a pipeline instance. Unlike RelayError this is plain
 * data: failures inside a run are recorded, never thrown.
 */
export type StepError = {
  code: RelayErrorCode;
  /** Capability the failure belongs to; null before a step was selected */
  capability: string | null;
  message: string;
  details?: unknown;
  /** The failure that led to this one (set on EXHAUSTED_RETRIES) */
  cause?: StepError;
};

export function stepError(
  code: RelayErrorCode,
  capability: string | null,
  message: string,
  details?: unknown
): StepError {
  const error: StepError = { code, capability, message };
  if (details !== undefined) {
    error.details = details;
  }
  return error;
}

/**
 * Thrown outside a run (catalog, configuration, handoff I/O) and turned into
 * a StepError when it surfaces inside one.
 */
export class RelayError extends Error {
  readonly code: RelayErrorCode;
  readonly details?: unknown;

  constructor(code: RelayErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "RelayError";
    this.code = code;
    this.details = details;
  }

  /** Record this error against the capability that was running. */
  toStepError(capability: string | null): StepError {
    return stepError(this.code, capability, this.message, this.details);
  }

  toJSON(): { code: RelayErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

/**
 * Normalise anything thrown. Filesystem errors become IO_ERROR, zod
 * failures BAD_REQUEST, everything else INTERNAL.
 */
export function toRelayError(err: unknown): RelayError {
  if (err instanceof RelayError) return err;
  if (err instanceof ZodError) {
    return new RelayError("BAD_REQUEST", "Validation error", { issues: err.issues });
  }
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
    if (code !== undefined && "syscall" in err) {
      return new RelayError("IO_ERROR", err.message, { code });
    }
    return new RelayError("INTERNAL", err.message, { name: err.name, stack: err.stack });
  }
  return new RelayError("INTERNAL", "Unknown error", { err });
}
