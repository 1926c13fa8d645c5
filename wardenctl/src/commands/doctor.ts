import fs from "node:fs";
import { errorMessage } from "../core/errors.js";
import { backendFor, ECOSYSTEMS } from "../installer/backends.js";
import { which as whichOnPath } from "../installer/which.js";
import { auditDir, emit, openRegistry, runCommand, type CommandContext, type CommandResult, type CommonOptions } from "./context.js";
import { EXIT } from "./exit-codes.js";

export type DoctorCheck = {
  name: string;
  ok: boolean;
  detail: string;
};

export type DoctorOptions = CommonOptions & {
  which?: (cmd: string) => string | null;
};

const REQUIRED_SCHEMAS = ["audit-record", "config", "registry"];

async function probeIntent(ctx: CommandContext): Promise<DoctorCheck> {
  const { endpoint, health_url: healthUrl, timeout_ms: timeoutMs } = ctx.config.intent;
  if (!endpoint) return { name: "intent", ok: true, detail: "not configured (checks are skipped)" };
  if (!healthUrl) return { name: "intent", ok: true, detail: `${endpoint} (no health_url to probe)` };

  try {
    const res = await ctx.fetchImpl(healthUrl, { signal: AbortSignal.timeout(timeoutMs) });
    return res.ok
      ? { name: "intent", ok: true, detail: `${healthUrl} reachable` }
      : { name: "intent", ok: false, detail: `${healthUrl} returned HTTP ${res.status}` };
  } catch (e) {
    return { name: "intent", ok: false, detail: `${healthUrl} unreachable: ${errorMessage(e)}` };
  }
}

function checkAuditDir(ctx: CommandContext): DoctorCheck {
  const dir = auditDir(ctx);
  try {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    fs.accessSync(dir, fs.constants.W_OK);
    return { name: "audit", ok: true, detail: `${dir} writable` };
  } catch (e) {
    return { name: "audit", ok: false, detail: `${dir} not writable: ${errorMessage(e)}` };
  }
}

export async function runChecks(ctx: CommandContext, which: (cmd: string) => string | null): Promise<DoctorCheck[]> {
  const checks: DoctorCheck[] = [{ name: "config", ok: true, detail: `min_trust=${ctx.config.min_trust}` }];

  const missing = REQUIRED_SCHEMAS.filter((n) => !ctx.schemas.get(n));
  checks.push(
    missing.length === 0
      ? { name: "schemas", ok: true, detail: ctx.schemas.names().join(", ") }
      : { name: "schemas", ok: false, detail: `missing: ${missing.join(", ")}` },
  );

  const { registry, source, location } = await openRegistry(ctx);
  checks.push(
    source === "empty"
      ? { name: "registry", ok: false, detail: "no registry source could be loaded" }
      : { name: "registry", ok: true, detail: `${registry.size} package(s) from ${source} (${location ?? "-"})` },
  );

  for (const ecosystem of ECOSYSTEMS) {
    const [cmd] = backendFor(ecosystem, ctx.config.installers).command;
    const found = which(cmd);
    checks.push(
      found
        ? { name: `installer:${ecosystem}`, ok: true, detail: found }
        : { name: `installer:${ecosystem}`, ok: false, detail: `'${cmd}' not found on PATH` },
    );
  }

  checks.push(checkAuditDir(ctx));
  checks.push(await probeIntent(ctx));
  return checks;
}

/** Environment checks; exits 1 when any fails. */
export function doctor(opts: DoctorOptions): Promise<CommandResult> {
  return runCommand(opts, async (ctx) => {
    const checks = await runChecks(ctx, opts.which ?? ((cmd) => whichOnPath(cmd)));
    for (const c of checks) {
      emit(ctx, `[${c.ok ? "ok" : "fail"}] ${c.name}: ${c.detail}`, c);
    }
    return checks.every((c) => c.ok) ? EXIT.SUCCESS : 1;
  });
}
