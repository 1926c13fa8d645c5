import { AuditTrail } from "../audit/trail.js";
import { JsonlAuditStore } from "../audit/store.js";
import { resolveConfig } from "../config/validator.js";
import { ConfigError, errorMessage } from "../core/errors.js";
import { Gateway } from "../core/gateway.js";
import { InstallerRouter } from "../installer/router.js";
import type { ProcessRunner } from "../installer/process.js";
import { IntentValidator } from "../intent/validator.js";
import { createReporter, diag, type DiagnosticSink, type OutputFormat } from "../log/diagnostics.js";
import { resolveUserPath } from "../paths.js";
import { RegistryStore } from "../registry/registry.js";
import { loadRegistry, type RegistryLoad } from "../registry/source.js";
import { SchemaRegistry } from "../schema/registry.js";
import type { WardenConfig } from "../types/config.js";
import type { FetchLike } from "../types/http.js";
import { EXIT } from "./exit-codes.js";

/** Options every command accepts; the stream and fetch hooks exist for tests. */
export type CommonOptions = {
  config?: string;
  env?: string;
  format?: OutputFormat;
  verbose?: boolean;
  cwd?: string;
  schemaDir?: string;
  processEnv?: NodeJS.ProcessEnv;
  fetchImpl?: FetchLike;
  runner?: ProcessRunner;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
};

export type CommandResult = { exitCode: number };

export type CommandContext = {
  config: WardenConfig;
  schemas: SchemaRegistry;
  format: OutputFormat;
  log: DiagnosticSink;
  out: NodeJS.WritableStream;
  cwd: string;
  fetchImpl: FetchLike;
  runner?: ProcessRunner;
};

export function createLog(opts: CommonOptions): DiagnosticSink {
  return createReporter(opts.format ?? "human", { verbose: opts.verbose, stdout: opts.stdout, stderr: opts.stderr });
}

/** Throws ConfigError when the merged config cannot be loaded or is invalid. */
export function createContext(opts: CommonOptions, log: DiagnosticSink = createLog(opts)): CommandContext {
  const schemas = new SchemaRegistry(opts.schemaDir);

  let config: WardenConfig;
  try {
    config = resolveConfig({ env: opts.env, configDir: opts.config, processEnv: opts.processEnv, schemas });
  } catch (e) {
    if (e instanceof ConfigError) throw e;
    throw new ConfigError(`Config could not be loaded: ${errorMessage(e)}`);
  }

  return {
    config,
    schemas,
    format: opts.format ?? "human",
    log,
    out: opts.stdout ?? process.stdout,
    cwd: opts.cwd ?? process.cwd(),
    fetchImpl: opts.fetchImpl ?? fetch,
    runner: opts.runner,
  };
}

/** Builds the context and runs `body`; a config failure exits with INVALID_ARGS. */
export async function runCommand(
  opts: CommonOptions,
  body: (ctx: CommandContext) => Promise<number>,
): Promise<CommandResult> {
  const log = createLog(opts);
  let ctx: CommandContext;
  try {
    ctx = createContext(opts, log);
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    log(diag("error", e.code, e.message));
    return { exitCode: EXIT.INVALID_ARGS };
  }
  return { exitCode: await body(ctx) };
}

/** One result line: JSON under jsonl, `human` otherwise. */
export function emit(ctx: CommandContext, human: string, data: Record<string, unknown>): void {
  ctx.out.write((ctx.format === "jsonl" ? JSON.stringify(data) : human) + "\n");
}

export function openRegistry(ctx: CommandContext): Promise<RegistryLoad> {
  return loadRegistry({
    config: ctx.config.registry,
    schemas: ctx.schemas,
    fetchImpl: ctx.fetchImpl,
    log: ctx.log,
    cwd: ctx.cwd,
  });
}

export function auditDir(ctx: CommandContext): string {
  return resolveUserPath(ctx.config.audit.dir, ctx.cwd);
}

export function createAuditTrail(ctx: CommandContext): AuditTrail {
  const store = new JsonlAuditStore(auditDir(ctx), { lockTimeoutMs: ctx.config.audit.lock_timeout_ms });
  return new AuditTrail(store, { schemas: ctx.schemas });
}

export function createGateway(ctx: CommandContext, registry: RegistryStore): Gateway {
  const { intent } = ctx.config;
  const validator = intent.endpoint
    ? new IntentValidator({
        endpoint: intent.endpoint,
        model: intent.model,
        timeoutMs: intent.timeout_ms,
        flagMarkers: intent.flag_markers,
        fetchImpl: ctx.fetchImpl,
        log: ctx.log,
      })
    : null;

  return new Gateway({
    registry,
    intent: validator,
    router: new InstallerRouter({ overrides: ctx.config.installers, runner: ctx.runner, cwd: ctx.cwd, log: ctx.log }),
    audit: createAuditTrail(ctx),
    minTrust: ctx.config.min_trust,
    denyOnFlag: intent.deny_on_flag,
    actor: ctx.config.actor,
    log: ctx.log,
  });
}
