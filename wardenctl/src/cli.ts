#!/usr/bin/env node

import { Command, Option } from "commander";
import { history, verify } from "./commands/audit.js";
import type { CommandResult, CommonOptions } from "./commands/context.js";
import { doctor } from "./commands/doctor.js";
import { info } from "./commands/info.js";
import { install } from "./commands/install.js";
import { list } from "./commands/list.js";
import { search } from "./commands/search.js";
import { update } from "./commands/update.js";
import { validate } from "./commands/validate.js";

const program = new Command();

program
  .name("wardenctl")
  .description("Policy-gated package installs with a tamper-evident audit trail")
  .version("0.1.0");

/** --config, --env, --format and --verbose on every command. */
function common(cmd: Command): Command {
  return cmd
    .option("--config <dir>", "Config directory (default: bundled config, or WARDEN_CONFIG_DIR)")
    .option("--env <name>", "Config overlay: config/<name>.yaml (default: WARDEN_ENV)")
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"))
    .option("--verbose", "Show debug diagnostics");
}

function finish(res: CommandResult): void {
  process.exitCode = res.exitCode;
}

function toNumber(value: string): number {
  return Number(value);
}

common(program.command("list").description("List every package in the registry")).action(async (opts: CommonOptions) => {
  finish(await list(opts));
});

common(program.command("search").description("Search names and descriptions").argument("<keyword>", "Keyword")).action(
  async (keyword: string, opts: CommonOptions) => {
    finish(await search(keyword, opts));
  },
);

common(program.command("info").description("Show a package record and its policy verdict").argument("<name>", "Package name")).action(
  async (name: string, opts: CommonOptions) => {
    finish(await info(name, opts));
  },
);

common(
  program
    .command("install")
    .description("Check policy, install and audit one or more packages")
    .argument("<name...>", "Package names")
    .option("--min-trust <n>", "Minimum trust score for this run (0..1)", toNumber)
    .option("--actor <name>", "Actor recorded in the audit trail"),
).action(async (names: string[], opts: CommonOptions & { minTrust?: number; actor?: string }) => {
  finish(await install(names, opts));
});

common(program.command("doctor").description("Check config, registry, installers, audit dir and intent endpoint")).action(
  async (opts: CommonOptions) => {
    finish(await doctor(opts));
  },
);

common(program.command("update").description("Refresh the local registry cache from registry.remote_url")).action(
  async (opts: CommonOptions) => {
    finish(await update(opts));
  },
);

common(
  program
    .command("validate")
    .description("Validate config layers, registry documents and (optionally) an audit trail")
    .option("--registry <file>", "Registry document to validate")
    .option("--audit <dir>", "Audit directory to validate"),
).action(async (opts: CommonOptions & { registry?: string; audit?: string }) => {
  finish(await validate(opts));
});

const audit = program.command("audit").description("Inspect the audit trail");

common(
  audit
    .command("history")
    .description("Show audit records, oldest first")
    .option("--dir <dir>", "Audit directory (default: audit.dir)")
    .option("--package <glob>", "Package name glob")
    .option("--outcome <kind>", "Outcome kind")
    .option("--actor <name>", "Actor")
    .option("--since <iso>", "Only records at or after this time")
    .option("--until <iso>", "Only records at or before this time")
    .option("--limit <n>", "Only the most recent n records", toNumber),
).action(
  async (
    opts: CommonOptions & { dir?: string; package?: string; outcome?: string; actor?: string; since?: string; until?: string; limit?: number },
  ) => {
    finish(await history(opts));
  },
);

common(audit.command("verify").description("Verify the audit hash chain").option("--dir <dir>", "Audit directory (default: audit.dir)")).action(
  async (opts: CommonOptions & { dir?: string }) => {
    finish(await verify(opts));
  },
);

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
