import { diag } from "../log/diagnostics.js";
import type { PackageRecord } from "../types/package.js";
import { emit, openRegistry, runCommand, type CommandContext, type CommandResult, type CommonOptions } from "./context.js";
import { EXIT } from "./exit-codes.js";

export function recordSummary(r: PackageRecord): string {
  const flags = [r.compliant ? "compliant" : "non-compliant", r.verified ? "verified" : "unverified"].join(", ");
  return `${r.name} [${r.ecosystem}] trust=${r.trustScore} (${flags}) - ${r.description}`;
}

export function recordData(r: PackageRecord): Record<string, unknown> {
  return {
    name: r.name,
    version: r.version,
    description: r.description,
    ecosystem: r.ecosystem,
    target: r.target,
    compliant: r.compliant,
    verified: r.verified,
    trust_score: r.trustScore,
    dependencies: [...r.dependencies],
    author: r.author,
  };
}

export function emitRecords(ctx: CommandContext, records: readonly PackageRecord[]): void {
  for (const r of records) emit(ctx, recordSummary(r), recordData(r));
}

/** Every registry record in insertion order. */
export function list(opts: CommonOptions): Promise<CommandResult> {
  return runCommand(opts, async (ctx) => {
    const { registry, source } = await openRegistry(ctx);
    ctx.log(diag("debug", "REGISTRY_SOURCE", `Registry source: ${source}`));
    emitRecords(ctx, registry.listAll());
    return EXIT.SUCCESS;
  });
}
