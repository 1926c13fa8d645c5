import { errorMessage } from "../core/errors.js";
import { diag, discard, type DiagnosticSink } from "../log/diagnostics.js";
import { DEFAULT_FLAG_MARKERS } from "../config/loader.js";
import type { IntentCheckResult } from "../types/intent.js";
import type { FetchLike } from "../types/http.js";

export type IntentValidatorOptions = {
  /** Ollama-style generate endpoint; null disables the check. */
  endpoint: string | null;
  model?: string;
  timeoutMs?: number;
  flagMarkers?: string[];
  fetchImpl?: FetchLike;
  log?: DiagnosticSink;
};

type GenerateRequest = {
  model: string;
  prompt: string;
  stream: false;
  options: { num_predict: number };
};

const DEFAULT_TIMEOUT_MS = 3_000;

export function unchecked(rationale: string): IntentCheckResult {
  return { status: "unchecked", checked: false, flagged: false, rationale };
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isTimeout(e: unknown): boolean {
  return typeof e === "object" && e !== null && "name" in e && (e.name === "TimeoutError" || e.name === "AbortError");
}

function readResponseField(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("response" in body)) return null;
  return typeof body.response === "string" ? body.response : null;
}

/**
 * Advisory injection check against a local inference endpoint.
 *
 * Fails open: a missing, unreachable, slow or malformed endpoint yields
 * `unchecked`, never an exception. Not retried.
 */
export class IntentValidator {
  private readonly endpoint: string | null;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly markers: RegExp | null;
  private readonly fetchImpl: FetchLike;
  private readonly log: DiagnosticSink;

  constructor(opts: IntentValidatorOptions) {
    this.endpoint = opts.endpoint && opts.endpoint.trim() !== "" ? opts.endpoint : null;
    this.model = opts.model ?? "guard";
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const markers = (opts.flagMarkers ?? DEFAULT_FLAG_MARKERS).filter((m) => m.trim() !== "");
    this.markers = markers.length > 0 ? new RegExp(`\\b(?:${markers.map(escapeRegExp).join("|")})\\b`, "i") : null;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.log = opts.log ?? discard;
  }

  get configured(): boolean {
    return this.endpoint !== null;
  }

  async checkInjection(text: string): Promise<IntentCheckResult> {
    if (!this.endpoint) return unchecked("intent endpoint not configured");

    const result = await this.request(this.endpoint, text);
    if (result.status === "unchecked") {
      this.log(
        diag("warn", "INTENT_CHECK_UNAVAILABLE", `Intent check skipped: ${result.rationale}`, {
          details: { endpoint: this.endpoint },
        }),
      );
    }
    return result;
  }

  private async request(endpoint: string, text: string): Promise<IntentCheckResult> {
    const body: GenerateRequest = {
      model: this.model,
      prompt: `[CHECK] ${text}`,
      stream: false,
      options: { num_predict: 50 },
    };

    let response: Response;
    try {
      response = await this.fetchImpl(endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (e) {
      if (isTimeout(e)) return unchecked(`timed out after ${this.timeoutMs}ms`);
      return unchecked(`endpoint unavailable: ${errorMessage(e)}`);
    }

    if (!response.ok) return unchecked(`endpoint returned HTTP ${response.status}`);

    let parsed: unknown;
    try {
      parsed = await response.json();
    } catch (e) {
      if (isTimeout(e)) return unchecked(`timed out after ${this.timeoutMs}ms`);
      return unchecked("endpoint returned a non-JSON body");
    }

    const answer = readResponseField(parsed);
    if (answer === null) return unchecked("endpoint response has no 'response' text");

    const rationale = answer.trim();
    if (this.markers?.test(rationale)) {
      return { status: "flagged", checked: true, flagged: true, rationale };
    }
    return { status: "clear", checked: true, flagged: false, rationale };
  }
}
