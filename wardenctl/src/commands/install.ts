import type { GatewayOutcome } from "../core/gateway.js";
import { diag } from "../log/diagnostics.js";
import { RegistryStore } from "../registry/registry.js";
import { createGateway, emit, openRegistry, runCommand, type CommandContext, type CommandResult, type CommonOptions } from "./context.js";
import { batchExitCode, EXIT, exitCodeFor } from "./exit-codes.js";

export type InstallOptions = CommonOptions & {
  minTrust?: number;
  actor?: string;
};

function humanOutcome(o: GatewayOutcome): string {
  const lines = [`${o.kind === "installed" ? "ok" : "FAILED"} ${o.package}: ${o.message}`];
  if (o.decision?.intent && o.decision.intent.status !== "unchecked") {
    lines.push(`  intent: ${o.decision.intent.status} (${o.decision.intent.rationale})`);
  }
  if (o.kind === "install_failed" && o.install && o.install.output.trim() !== "") {
    lines.push(...o.install.output.trimEnd().split("\n").map((l) => `  | ${l}`));
  }
  const mcp = o.record?.mcpConfig;
  if (o.kind === "installed" && mcp) {
    lines.push(`  MCP server: ${[mcp.command, ...(mcp.args ?? [])].join(" ")}`);
  }
  if (!o.audit.ok) lines.push(`  ${o.audit.error.message}`);
  return lines.join("\n");
}

function outcomeData(o: GatewayOutcome): Record<string, unknown> {
  return {
    package: o.package,
    outcome: o.kind,
    state: o.state,
    exit_code: exitCodeFor(o),
    message: o.message,
    trace: [...o.trace],
    reasons: o.decision ? [...o.decision.reasons] : [],
    intent: o.decision?.intent ?? null,
    dependencies: [...o.dependencies],
    install: o.install
      ? {
          command: [...o.install.command],
          exit_code: o.install.exitCode,
          timed_out: o.install.timedOut,
          duration_ms: o.install.durationMs,
          output: o.install.output,
        }
      : null,
    audit: o.audit.ok ? { ok: true, seq: o.audit.record.seq, hash: o.audit.record.hash } : { ok: false, error: o.audit.error.message },
  };
}

export function reportOutcome(ctx: CommandContext, o: GatewayOutcome): void {
  emit(ctx, humanOutcome(o), outcomeData(o));
}

/** Runs every name through the gateway concurrently. */
export function install(names: string[], opts: InstallOptions): Promise<CommandResult> {
  return runCommand(opts, async (ctx) => {
    if (names.length === 0) {
      ctx.log(diag("error", "INVALID_ARGS", "No package names given"));
      return EXIT.INVALID_ARGS;
    }
    const minTrust = opts.minTrust;
    if (minTrust !== undefined && (!Number.isFinite(minTrust) || minTrust < 0 || minTrust > 1)) {
      ctx.log(diag("error", "INVALID_ARGS", `--min-trust must be within [0, 1], got ${minTrust}`));
      return EXIT.INVALID_ARGS;
    }

    const { registry } = await openRegistry(ctx);
    const gateway = createGateway(ctx, new RegistryStore(registry));
    const outcomes = await gateway.installMany(names, { minTrust, actor: opts.actor });

    for (const o of outcomes) reportOutcome(ctx, o);
    return batchExitCode(outcomes);
  });
}
