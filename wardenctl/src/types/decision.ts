import type { IntentCheckResult } from "./intent.js";

export type PolicyChecks = {
  compliant: boolean;
  verified: boolean;
  trust: boolean;
};

export type PolicyDecision = {
  readonly package: string;
  readonly verdict: boolean;
  readonly minTrust: number;
  readonly reasons: readonly string[];
  readonly checks: Readonly<PolicyChecks>;
  readonly intent?: IntentCheckResult;
};
