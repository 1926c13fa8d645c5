import fs from "node:fs";
import path from "node:path";
import { AuditTrail } from "../audit/trail.js";
import { JsonlAuditStore } from "../audit/store.js";
import { loadConfig, loadYaml } from "../config/loader.js";
import { errorMessage } from "../core/errors.js";
import { diag, type Diagnostic } from "../log/diagnostics.js";
import { DEFAULT_CONFIG_DIR, resolveUserPath } from "../paths.js";
import { readRegistryFile } from "../registry/source.js";
import { SchemaRegistry } from "../schema/registry.js";
import { createLog, type CommandResult, type CommonOptions } from "./context.js";
import { EXIT } from "./exit-codes.js";

export type ValidateOptions = CommonOptions & {
  /** Registry document to check instead of the configured cache and bundled files. */
  registry?: string;
  /** Audit directory whose records and chain are checked. */
  audit?: string;
};

export type ValidateResult = { ok: true; checked: string[] } | { ok: false; errors: Diagnostic[] };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function listYamlFiles(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isFile() && (e.name.endsWith(".yml") || e.name.endsWith(".yaml")))
    .map((e) => path.join(dir, e.name))
    .sort();
}

function registryFiles(opts: ValidateOptions, merged: Record<string, unknown>, cwd: string): string[] {
  if (opts.registry) return [path.resolve(cwd, opts.registry)];
  const registry = merged.registry;
  if (!isRecord(registry)) return [];

  const files: string[] = [];
  for (const key of ["cache_path", "bundled_path"]) {
    const value = registry[key];
    if (typeof value === "string") files.push(resolveUserPath(value, cwd));
  }
  return files.filter((f) => fs.existsSync(f));
}

async function validateAudit(dir: string, schemas: SchemaRegistry, errors: Diagnostic[]): Promise<void> {
  const store = new JsonlAuditStore(dir);
  if (!fs.existsSync(store.location)) {
    errors.push(diag("error", "AUDIT_MISSING", `No audit trail at ${store.location}`, { path: store.location }));
    return;
  }

  let lineNo = 0;
  for await (const line of store.lines()) {
    lineNo++;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (e) {
      errors.push(diag("error", "AUDIT_RECORD_INVALID", `Line ${lineNo} is not JSON: ${errorMessage(e)}`, { path: `${store.location}:${lineNo}` }));
      continue;
    }
    const res = schemas.validate("audit-record", parsed);
    if (!res.valid) {
      errors.push(diag("error", "AUDIT_RECORD_INVALID", `Line ${lineNo}: ${res.errors ?? "invalid"}`, { path: `${store.location}:${lineNo}` }));
    }
  }

  const verification = await new AuditTrail(store, { schemas }).verify();
  for (const message of verification.errors) {
    errors.push(diag("error", "AUDIT_CHAIN_BROKEN", message, { path: store.location }));
  }
}

/**
 * Validate every config layer, the merged config, registry documents and,
 * optionally, an audit trail. Collects all problems instead of stopping at the first.
 */
export async function validateAll(opts: ValidateOptions): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];
  const checked: string[] = [];
  const cwd = opts.cwd ?? process.cwd();
  const processEnv = opts.processEnv ?? process.env;
  const schemas = new SchemaRegistry(opts.schemaDir);

  const configDir = path.resolve(cwd, opts.config ?? processEnv.WARDEN_CONFIG_DIR ?? DEFAULT_CONFIG_DIR);
  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`, { path: configDir })] };
  }

  let layersOk = true;
  for (const file of listYamlFiles(configDir)) {
    try {
      loadYaml(file);
      checked.push(file);
    } catch (e) {
      layersOk = false;
      errors.push(diag("error", "CONFIG_PARSE_ERROR", errorMessage(e), { path: file }));
    }
  }

  let merged: Record<string, unknown> = {};
  if (layersOk) {
    try {
      merged = loadConfig(opts.env, configDir, processEnv);
      const res = schemas.validate("config", merged);
      if (!res.valid) {
        errors.push(diag("error", "CONFIG_INVALID", `Config invalid: ${res.errors ?? "unknown error"}`, { path: configDir }));
      }
    } catch (e) {
      errors.push(diag("error", "CONFIG_PARSE_ERROR", errorMessage(e), { path: configDir }));
    }
  }

  for (const file of registryFiles(opts, merged, cwd)) {
    try {
      readRegistryFile(file, schemas);
      checked.push(file);
    } catch (e) {
      errors.push(diag("error", "REGISTRY_INVALID", errorMessage(e), { path: file }));
    }
  }

  if (opts.audit) {
    const dir = path.resolve(cwd, opts.audit);
    await validateAudit(dir, schemas, errors);
    checked.push(dir);
  }

  return errors.length > 0 ? { ok: false, errors } : { ok: true, checked };
}

export async function validate(opts: ValidateOptions): Promise<CommandResult> {
  const log = createLog(opts);
  const res = await validateAll(opts);
  if (!res.ok) {
    for (const e of res.errors) log(e);
    return { exitCode: 1 };
  }
  for (const file of res.checked) log(diag("debug", "VALIDATED", `Valid: ${file}`, { path: file }));
  log(diag("info", "OK", "OK"));
  return { exitCode: EXIT.SUCCESS };
}
