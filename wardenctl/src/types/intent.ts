/**
 * Result of the advisory intent check.
 *
 * `unchecked` means the endpoint was absent, unreachable, slow or answered
 * with something unusable. It never means "safe".
 */
export type IntentCheckResult =
  | { status: "unchecked"; checked: false; flagged: false; rationale: string }
  | { status: "clear"; checked: true; flagged: false; rationale: string }
  | { status: "flagged"; checked: true; flagged: true; rationale: string };

export type IntentStatus = IntentCheckResult["status"];
