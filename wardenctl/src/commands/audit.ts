import path from "node:path";
import { AuditTrail } from "../audit/trail.js";
import { JsonlAuditStore } from "../audit/store.js";
import { diag } from "../log/diagnostics.js";
import { OUTCOME_KINDS, type AuditFilter, type AuditRecord, type OutcomeKind } from "../types/audit.js";
import { createAuditTrail, emit, runCommand, type CommandContext, type CommandResult, type CommonOptions } from "./context.js";
import { EXIT } from "./exit-codes.js";

export type AuditOptions = CommonOptions & {
  /** Audit directory; defaults to `audit.dir` from config. */
  dir?: string;
};

export type HistoryOptions = AuditOptions & {
  package?: string;
  outcome?: string;
  actor?: string;
  since?: string;
  until?: string;
  /** Keep only the most recent n records. */
  limit?: number;
};

function trailFor(ctx: CommandContext, dir?: string): AuditTrail {
  if (!dir) return createAuditTrail(ctx);
  const store = new JsonlAuditStore(path.resolve(ctx.cwd, dir), { lockTimeoutMs: ctx.config.audit.lock_timeout_ms });
  return new AuditTrail(store, { schemas: ctx.schemas });
}

function isOutcomeKind(v: string): v is OutcomeKind {
  return OUTCOME_KINDS.some((k) => k === v);
}

function isValidDate(v: string): boolean {
  return !Number.isNaN(Date.parse(v));
}

function humanRecord(r: AuditRecord): string {
  const reason = r.abortReason ?? (r.decision && !r.decision.verdict ? r.decision.reasons.join("; ") : null);
  return `#${r.seq} ${r.ts} ${r.actor} ${r.package} ${r.outcome}${reason ? ` (${reason})` : ""}`;
}

export function history(opts: HistoryOptions): Promise<CommandResult> {
  return runCommand(opts, async (ctx) => {
    const filter: AuditFilter = {};
    if (opts.package) filter.package = opts.package;
    if (opts.actor) filter.actor = opts.actor;
    if (opts.outcome !== undefined) {
      if (!isOutcomeKind(opts.outcome)) {
        ctx.log(diag("error", "INVALID_ARGS", `--outcome must be one of ${OUTCOME_KINDS.join(", ")}`));
        return EXIT.INVALID_ARGS;
      }
      filter.outcome = opts.outcome;
    }
    for (const [flag, value] of [["since", opts.since], ["until", opts.until]] as const) {
      if (value !== undefined && !isValidDate(value)) {
        ctx.log(diag("error", "INVALID_ARGS", `--${flag} is not a valid date: ${value}`));
        return EXIT.INVALID_ARGS;
      }
    }
    if (opts.since) filter.since = opts.since;
    if (opts.until) filter.until = opts.until;
    if (opts.limit !== undefined && (!Number.isInteger(opts.limit) || opts.limit < 1)) {
      ctx.log(diag("error", "INVALID_ARGS", `--limit must be a positive integer, got ${opts.limit}`));
      return EXIT.INVALID_ARGS;
    }

    const trail = trailFor(ctx, opts.dir);
    const kept: AuditRecord[] = [];
    for await (const record of trail.history(filter)) {
      kept.push(record);
      if (opts.limit !== undefined && kept.length > opts.limit) kept.shift();
    }

    if (kept.length === 0) ctx.log(diag("info", "AUDIT_EMPTY", `No audit records in ${trail.location}`));
    for (const record of kept) emit(ctx, humanRecord(record), record);
    return EXIT.SUCCESS;
  });
}

/** Walks the hash chain; exits 1 when it is broken. */
export function verify(opts: AuditOptions): Promise<CommandResult> {
  return runCommand(opts, async (ctx) => {
    const trail = trailFor(ctx, opts.dir);
    const res = await trail.verify();
    for (const message of res.errors) {
      ctx.log(diag("error", "AUDIT_CHAIN_BROKEN", message, { path: trail.location }));
    }
    emit(ctx, res.ok ? `Audit trail intact: ${res.total} record(s)` : `Audit trail broken: ${res.errors.length} problem(s) in ${res.total} record(s)`, {
      ok: res.ok,
      total: res.total,
      errors: res.errors,
      location: trail.location,
    });
    return res.ok ? EXIT.SUCCESS : 1;
  });
}
