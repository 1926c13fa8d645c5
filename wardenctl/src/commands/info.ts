import { diag } from "../log/diagnostics.js";
import { evaluate } from "../policy/evaluator.js";
import { emit, openRegistry, runCommand, type CommandResult, type CommonOptions } from "./context.js";
import { EXIT } from "./exit-codes.js";
import { recordData } from "./list.js";

/** Record details plus a policy preview at the configured threshold. */
export function info(name: string, opts: CommonOptions): Promise<CommandResult> {
  return runCommand(opts, async (ctx) => {
    const { registry } = await openRegistry(ctx);
    const record = registry.get(name);
    if (!record) {
      ctx.log(diag("error", "NOT_FOUND", `Package '${name.trim().toLowerCase()}' not found`));
      return EXIT.NOT_FOUND;
    }

    const decision = evaluate(record, ctx.config.min_trust);
    const lines = [
      `Name:         ${record.name}`,
      `Version:      ${record.version}`,
      `Description:  ${record.description}`,
      `Ecosystem:    ${record.ecosystem}`,
      `Target:       ${record.target}`,
      `Author:       ${record.author}`,
      `Compliant:    ${record.compliant ? "yes" : "no"}`,
      `Verified:     ${record.verified ? "yes" : "no"}`,
      `Trust score:  ${record.trustScore}`,
      `Dependencies: ${record.dependencies.length > 0 ? record.dependencies.join(", ") : "none"}`,
      `Policy:       ${decision.verdict ? "pass" : `deny (${decision.reasons.join("; ")})`}`,
    ];
    if (record.mcpConfig) {
      lines.push(`MCP server:   ${[record.mcpConfig.command, ...(record.mcpConfig.args ?? [])].join(" ")}`);
    }

    emit(ctx, lines.join("\n"), {
      ...recordData(record),
      mcp_config: record.mcpConfig ?? null,
      policy: { verdict: decision.verdict, min_trust: decision.minTrust, reasons: [...decision.reasons] },
    });
    return EXIT.SUCCESS;
  });
}
