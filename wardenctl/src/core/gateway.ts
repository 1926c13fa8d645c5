import {
  AuditWriteFailedError,
  errorMessage,
  InstallerUnavailableError,
  NotFoundError,
  UnsupportedEcosystemError,
} from "./errors.js";
import { StateTrace, type GatewayState, type TerminalState } from "./state-machine.js";
import type { AuditTrail } from "../audit/trail.js";
import type { InstallerRouter } from "../installer/router.js";
import type { IntentValidator } from "../intent/validator.js";
import { diag, discard, type DiagnosticSink } from "../log/diagnostics.js";
import { assertThreshold, DEFAULT_MIN_TRUST, evaluate, withIntent } from "../policy/evaluator.js";
import { normalizeName, type RegistryStore } from "../registry/registry.js";
import type { AuditEntryInput, AuditRecord, OutcomeKind } from "../types/audit.js";
import type { PolicyDecision } from "../types/decision.js";
import type { InstallResult } from "../types/install.js";
import type { PackageRecord } from "../types/package.js";

export type GatewayOptions = {
  registry: RegistryStore;
  /** null when no intent endpoint is configured. */
  intent: IntentValidator | null;
  router: InstallerRouter;
  audit: AuditTrail;
  minTrust?: number;
  /** Turn a flagged intent check into a denial. */
  denyOnFlag?: boolean;
  actor?: string;
  log?: DiagnosticSink;
};

export type InstallRequest = {
  minTrust?: number;
  actor?: string;
};

export type DependencyStatus = { name: string; found: boolean };

export type AuditStatus = { ok: true; record: AuditRecord } | { ok: false; error: AuditWriteFailedError };

export type GatewayOutcome = {
  /** Requested name, normalized. */
  package: string;
  kind: OutcomeKind;
  state: TerminalState;
  trace: readonly GatewayState[];
  record: PackageRecord | null;
  decision: PolicyDecision | null;
  install: InstallResult | null;
  dependencies: readonly DependencyStatus[];
  message: string;
  audit: AuditStatus;
};

type OutcomeExtras = Pick<GatewayOutcome, "record" | "dependencies" | "message">;

/**
 * Runs one install request through lookup, policy, the optional
 * intent check and the installer, and audits the result.
 *
 * Install is attempted iff the final verdict is true. Every call writes
 * exactly one audit record, aborts included.
 */
export class Gateway {
  private readonly minTrust: number;
  private readonly denyOnFlag: boolean;
  private readonly actor: string;
  private readonly log: DiagnosticSink;

  constructor(private readonly opts: GatewayOptions) {
    this.minTrust = opts.minTrust ?? DEFAULT_MIN_TRUST;
    assertThreshold(this.minTrust);
    this.denyOnFlag = opts.denyOnFlag ?? false;
    this.actor = opts.actor ?? "wardenctl";
    this.log = opts.log ?? discard;
  }

  async install(name: string, req: InstallRequest = {}): Promise<GatewayOutcome> {
    const minTrust = req.minTrust ?? this.minTrust;
    assertThreshold(minTrust);
    const actor = req.actor ?? this.actor;
    const requested = normalizeName(name);
    const trace = new StateTrace();
    const snapshot = this.opts.registry.current();

    let record: PackageRecord;
    try {
      record = snapshot.lookup(requested);
    } catch (e) {
      if (!(e instanceof NotFoundError)) throw e;
      return this.finish(
        trace,
        { package: requested, actor, outcome: "not_found", abortReason: "not found", decision: null, install: null, error: e.message },
        { record: null, dependencies: [], message: e.message },
      );
    }
    trace.to("looked_up");

    const dependencies = record.dependencies.map((dep) => ({ name: dep, found: snapshot.get(dep) !== undefined }));
    for (const dep of dependencies.filter((d) => !d.found)) {
      this.log(diag("warn", "DEPENDENCY_MISSING", `${record.name} depends on '${dep.name}', which is not in the registry`));
    }

    let decision = evaluate(record, minTrust);
    trace.to("evaluated");

    const intent = this.opts.intent;
    if (decision.verdict && intent?.configured) {
      const result = await intent.checkInjection(`install ${record.target}: ${record.description}`);
      decision = withIntent(decision, result, this.denyOnFlag);
      trace.to("intent_checked");
      if (result.status === "flagged") {
        this.log(diag("warn", "INTENT_FLAGGED", `Intent check flagged ${record.name}: ${result.rationale}`));
      }
    }
    trace.to("decided");

    const base = { package: requested, actor, decision };
    if (!decision.verdict) {
      trace.to("skipped");
      return this.finish(
        trace,
        { ...base, outcome: "policy_denied", abortReason: null, install: null, error: null },
        { record, dependencies, message: `Policy denied ${record.name}: ${decision.reasons.join("; ")}` },
      );
    }

    let install: InstallResult;
    try {
      install = await this.opts.router.install(record);
    } catch (e) {
      if (e instanceof UnsupportedEcosystemError) {
        return this.finish(
          trace,
          { ...base, outcome: "unsupported_ecosystem", abortReason: e.message, install: null, error: e.message },
          { record, dependencies, message: e.message },
        );
      }
      if (e instanceof InstallerUnavailableError) {
        return this.finish(
          trace,
          { ...base, outcome: "installer_unavailable", abortReason: null, install: null, error: e.message },
          { record, dependencies, message: e.message },
        );
      }
      // A runner that rejects outright still leaves the install unattempted.
      const message = `Installer for ${record.name} could not run: ${errorMessage(e)}`;
      return this.finish(
        trace,
        { ...base, outcome: "installer_unavailable", abortReason: null, install: null, error: message },
        { record, dependencies, message },
      );
    }
    trace.to("installed");

    if (install.success) {
      return this.finish(
        trace,
        { ...base, outcome: "installed", abortReason: null, install, error: null },
        { record, dependencies, message: `Installed ${record.name} (${install.installer}: ${record.target})` },
      );
    }

    const failure = install.timedOut
      ? `Install of ${record.name} timed out`
      : `Install of ${record.name} failed with exit code ${install.exitCode}`;
    return this.finish(
      trace,
      { ...base, outcome: "install_failed", abortReason: null, install, error: failure },
      { record, dependencies, message: failure },
    );
  }

  /** Runs the requests concurrently; results keep argument order. */
  installMany(names: readonly string[], req: InstallRequest = {}): Promise<GatewayOutcome[]> {
    return Promise.all(names.map((name) => this.install(name, req)));
  }

  private finish(trace: StateTrace, entry: AuditEntryInput, extras: OutcomeExtras): GatewayOutcome {
    trace.to("audited");

    let audit: AuditStatus;
    try {
      audit = { ok: true, record: this.opts.audit.record(entry) };
    } catch (e) {
      if (!(e instanceof AuditWriteFailedError)) throw e;
      audit = { ok: false, error: e };
      this.log(diag("error", "AUDIT_WRITE_FAILED", e.message, { details: { package: entry.package, outcome: entry.outcome } }));
    }

    trace.to(entry.abortReason !== null ? "aborted" : "done");
    const state = trace.current === "aborted" ? "aborted" : "done";

    this.log(
      diag("debug", "GATEWAY_OUTCOME", extras.message, {
        details: { package: entry.package, outcome: entry.outcome, actor: entry.actor, trace: trace.states() },
      }),
    );

    return Object.freeze({
      package: entry.package,
      kind: entry.outcome,
      state,
      trace: trace.states(),
      install: entry.install,
      decision: entry.decision,
      audit,
      ...extras,
    });
  }
}
