import type { PackageRecord } from "../types/package.js";
import type { PolicyDecision } from "../types/decision.js";
import type { IntentCheckResult } from "../types/intent.js";

export const DEFAULT_MIN_TRUST = 0.5;

export function assertThreshold(minTrust: number): void {
  if (!Number.isFinite(minTrust) || minTrust < 0 || minTrust > 1) {
    throw new RangeError(`minimum trust must be within [0, 1], got ${minTrust}`);
  }
}

/**
 * Static policy: compliant AND verified AND trustScore >= minTrust.
 *
 * Every failing check adds its own reason so callers can report all
 * violations at once. Pure; the returned decision is frozen.
 */
export function evaluate(record: PackageRecord, minTrust: number = DEFAULT_MIN_TRUST): PolicyDecision {
  assertThreshold(minTrust);

  const checks = Object.freeze({
    compliant: record.compliant,
    verified: record.verified,
    trust: record.trustScore >= minTrust,
  });

  const reasons: string[] = [];
  if (!checks.compliant) reasons.push("not compliant");
  if (!checks.verified) reasons.push("not verified");
  if (!checks.trust) reasons.push(`trust score ${record.trustScore} below threshold ${minTrust}`);

  return Object.freeze({
    package: record.name,
    verdict: checks.compliant && checks.verified && checks.trust,
    minTrust,
    reasons: Object.freeze(reasons),
    checks,
  });
}

/**
 * Attach an intent result to a decision, producing a new decision.
 * Only a `flagged` result with `denyOnFlag` can turn the verdict false.
 */
export function withIntent(
  decision: PolicyDecision,
  intent: IntentCheckResult,
  denyOnFlag: boolean,
): PolicyDecision {
  const deny = denyOnFlag && intent.status === "flagged";
  return Object.freeze({
    ...decision,
    verdict: decision.verdict && !deny,
    reasons: Object.freeze(deny ? [...decision.reasons, `intent check flagged: ${intent.rationale}`] : [...decision.reasons]),
    intent: Object.freeze({ ...intent }),
  });
}
