import type { GatewayOutcome } from "../core/gateway.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  INSTALL_FAILED: 1,
  POLICY_DENIED: 2,
  INVALID_ARGS: 3,
  NOT_FOUND: 4,
  UNSUPPORTED_ECOSYSTEM: 5,
  INSTALLER_UNAVAILABLE: 6,
  AUDIT_FAILED: 7,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** A failed audit write overrides the outcome, even a successful install. */
export function exitCodeFor(outcome: GatewayOutcome): ExitCode {
  if (!outcome.audit.ok) return EXIT.AUDIT_FAILED;
  switch (outcome.kind) {
    case "installed":
      return EXIT.SUCCESS;
    case "install_failed":
      return EXIT.INSTALL_FAILED;
    case "policy_denied":
      return EXIT.POLICY_DENIED;
    case "not_found":
      return EXIT.NOT_FOUND;
    case "unsupported_ecosystem":
      return EXIT.UNSUPPORTED_ECOSYSTEM;
    case "installer_unavailable":
      return EXIT.INSTALLER_UNAVAILABLE;
  }
}

/** First non-zero code in argument order. */
export function batchExitCode(outcomes: readonly GatewayOutcome[]): ExitCode {
  for (const outcome of outcomes) {
    const code = exitCodeFor(outcome);
    if (code !== EXIT.SUCCESS) return code;
  }
  return EXIT.SUCCESS;
}
