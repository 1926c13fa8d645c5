import fs from "node:fs";
import path from "node:path";
import { Registry, normalizeName } from "./registry.js";
import { SchemaRegistry } from "../schema/registry.js";
import { RegistryUnavailableError, errorMessage } from "../core/errors.js";
import { diag, discard, type DiagnosticSink } from "../log/diagnostics.js";
import { resolveUserPath } from "../paths.js";
import type { RegistryConfig } from "../types/config.js";
import type { PackageRecord, RegistryDocument, RegistryEntry } from "../types/package.js";
import type { FetchLike } from "../types/http.js";

export type RegistrySourceKind = "cache" | "bundled" | "remote" | "empty";

export type RegistryLoad = {
  registry: Registry;
  source: RegistrySourceKind;
  location: string | null;
};

export type RegistrySourceOptions = {
  config: RegistryConfig;
  schemas?: SchemaRegistry;
  fetchImpl?: FetchLike;
  log?: DiagnosticSink;
  cwd?: string;
};

export function entryToRecord(entry: RegistryEntry): PackageRecord {
  return {
    name: normalizeName(entry.name),
    version: entry.version ?? "0.0.0",
    description: entry.description,
    ecosystem: entry.ecosystem.trim().toLowerCase(),
    target: entry.target ?? entry.name,
    compliant: entry.compliant,
    verified: entry.verified,
    trustScore: entry.trust_score,
    dependencies: entry.dependencies ?? [],
    author: entry.author ?? "Unknown",
    ...(entry.mcp_config ? { mcpConfig: entry.mcp_config } : {}),
  };
}

/** Build a registry from a validated document; later duplicates are dropped with a warning. */
export function registryFromDocument(doc: RegistryDocument, log: DiagnosticSink = discard): Registry {
  const seen = new Set<string>();
  const records: PackageRecord[] = [];
  for (const entry of doc.packages) {
    const record = entryToRecord(entry);
    if (seen.has(record.name)) {
      log(diag("warn", "REGISTRY_DUPLICATE", `Duplicate package '${record.name}' ignored`, { details: { name: entry.name } }));
      continue;
    }
    seen.add(record.name);
    records.push(record);
  }
  return new Registry(records);
}

export function parseRegistryDocument(raw: string, origin: string, schemas: SchemaRegistry): RegistryDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new RegistryUnavailableError(`Invalid JSON in registry (${origin}): ${errorMessage(e)}`, { cause: e });
  }
  if (!schemas.is("registry", parsed)) {
    const { errors } = schemas.validate("registry", parsed);
    throw new RegistryUnavailableError(`Registry document invalid (${origin}): ${errors ?? "unknown error"}`);
  }
  return parsed;
}

export function readRegistryFile(filePath: string, schemas: SchemaRegistry): RegistryDocument {
  return parseRegistryDocument(fs.readFileSync(filePath, "utf8"), filePath, schemas);
}

async function fetchRegistryText(url: string, timeoutMs: number, fetchImpl: FetchLike): Promise<string> {
  let response: Response;
  try {
    response = await fetchImpl(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (e) {
    throw new RegistryUnavailableError(`Remote registry unreachable (${url}): ${errorMessage(e)}`, { cause: e });
  }
  if (!response.ok) {
    throw new RegistryUnavailableError(`Remote registry returned HTTP ${response.status} (${url})`);
  }
  return response.text();
}

/**
 * Load the registry from the first usable source: local cache, bundled
 * default, then the remote URL. Unusable sources are reported and skipped;
 * with none usable the registry is empty.
 */
export async function loadRegistry(opts: RegistrySourceOptions): Promise<RegistryLoad> {
  const schemas = opts.schemas ?? new SchemaRegistry();
  const log = opts.log ?? discard;
  const cwd = opts.cwd ?? process.cwd();

  const files: Array<{ source: RegistrySourceKind; filePath: string }> = [
    { source: "cache", filePath: resolveUserPath(opts.config.cache_path, cwd) },
  ];
  if (opts.config.bundled_path) {
    files.push({ source: "bundled", filePath: resolveUserPath(opts.config.bundled_path, cwd) });
  }

  for (const { source, filePath } of files) {
    if (!fs.existsSync(filePath)) {
      log(diag("debug", "REGISTRY_SOURCE_MISSING", `No ${source} registry at ${filePath}`, { path: filePath }));
      continue;
    }
    try {
      const registry = registryFromDocument(readRegistryFile(filePath, schemas), log);
      log(diag("debug", "REGISTRY_LOADED", `Loaded ${registry.size} package(s) from ${source}`, { path: filePath }));
      return { registry, source, location: filePath };
    } catch (e) {
      log(diag("warn", "REGISTRY_SOURCE_INVALID", errorMessage(e), { path: filePath }));
    }
  }

  const url = opts.config.remote_url;
  if (url) {
    try {
      const raw = await fetchRegistryText(url, opts.config.timeout_ms, opts.fetchImpl ?? fetch);
      const registry = registryFromDocument(parseRegistryDocument(raw, url, schemas), log);
      return { registry, source: "remote", location: url };
    } catch (e) {
      log(diag("warn", "REGISTRY_SOURCE_INVALID", errorMessage(e), { details: { url } }));
    }
  }

  log(diag("warn", "REGISTRY_EMPTY", "No registry source could be loaded; registry is empty"));
  return { registry: Registry.empty(), source: "empty", location: null };
}

export type RegistryUpdate = {
  registry: Registry;
  cachePath: string;
  url: string;
};

/**
 * Fetch the remote registry, validate it, and write it to the cache path.
 * The cache is only written once the document validated. Throws
 * RegistryUnavailableError on any failure; the caller decides whether to swap.
 */
export async function updateRegistry(opts: RegistrySourceOptions): Promise<RegistryUpdate> {
  const schemas = opts.schemas ?? new SchemaRegistry();
  const url = opts.config.remote_url;
  if (!url) {
    throw new RegistryUnavailableError("No registry.remote_url configured");
  }

  const raw = await fetchRegistryText(url, opts.config.timeout_ms, opts.fetchImpl ?? fetch);
  const doc = parseRegistryDocument(raw, url, schemas);
  const registry = registryFromDocument(doc, opts.log ?? discard);

  const cachePath = resolveUserPath(opts.config.cache_path, opts.cwd ?? process.cwd());
  fs.mkdirSync(path.dirname(cachePath), { recursive: true });
  const tmp = `${cachePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(doc, null, 2) + "\n", "utf8");
  fs.renameSync(tmp, cachePath);

  return { registry, cachePath, url };
}
