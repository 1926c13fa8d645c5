import type { PolicyDecision } from "./decision.js";
import type { InstallResult } from "./install.js";

export type OutcomeKind =
  | "installed"
  | "policy_denied"
  | "not_found"
  | "unsupported_ecosystem"
  | "installer_unavailable"
  | "install_failed";

export const OUTCOME_KINDS: readonly OutcomeKind[] = [
  "installed",
  "policy_denied",
  "not_found",
  "unsupported_ecosystem",
  "installer_unavailable",
  "install_failed",
];

/** Everything the gateway knows when it writes the audit entry. */
export type AuditEntryInput = {
  package: string;
  actor: string;
  outcome: OutcomeKind;
  abortReason: string | null;
  decision: PolicyDecision | null;
  install: InstallResult | null;
  error: string | null;
};

export type AuditRecord = Readonly<
  AuditEntryInput & {
    seq: number;
    ts: string;
    aborted: boolean;
    previousHash: string;
    hash: string;
  }
>;

export type AuditFilter = {
  /** minimatch glob over the requested package name, case-insensitive. */
  package?: string;
  outcome?: OutcomeKind;
  actor?: string;
  since?: string | Date;
  until?: string | Date;
};

export type AuditVerification = {
  ok: boolean;
  total: number;
  errors: string[];
};
