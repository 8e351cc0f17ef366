export type InstallOptions = {
  /** Deadline for one prerequisite; 0 disables it */
  timeoutMs: number;
  killGraceMs: number;
  signal?: AbortSignal;
};

export type InstallResult =
  | { ok: true }
  | { ok: false; reason: string; details?: unknown };

/**
 * External installer collaborator: makes sure one prerequisite is present,
 * installing it if needed. Implementations report failures, never reject.
 */
export interface Installer {
  readonly name: string;
  ensureInstalled(prerequisite: string, options: InstallOptions): Promise<InstallResult>;
}
