import type { Ecosystem } from "../installer/backends.js";

export type InstallResult = {
  readonly package: string;
  readonly installer: Ecosystem;
  readonly command: readonly string[];
  /** null when the process was killed before exiting. */
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  /** stdout followed by stderr, verbatim. */
  readonly output: string;
  readonly success: boolean;
  readonly timedOut: boolean;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
};
