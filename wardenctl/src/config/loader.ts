import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { BUNDLED_REGISTRY_PATH, DEFAULT_CONFIG_DIR } from "../paths.js";
import type { WardenConfig } from "../types/config.js";

type Layer = Record<string, unknown>;

const ENV_PREFIX = "WARDEN_";
/** Variables with the prefix that select behaviour instead of overriding keys. */
const RESERVED_ENV = new Set(["WARDEN_ENV", "WARDEN_DEBUG", "WARDEN_CONFIG_DIR"]);

export const DEFAULT_FLAG_MARKERS = ["INJECTION", "UNSAFE", "BLOCK", "BLOCKED", "DENY"];

export const DEFAULT_CONFIG: WardenConfig = {
  schema_version: "1.0.0",
  min_trust: 0.5,
  actor: "wardenctl",
  registry: {
    cache_path: "~/.wardenctl/packages.json",
    bundled_path: BUNDLED_REGISTRY_PATH,
    remote_url: null,
    timeout_ms: 10_000,
  },
  intent: {
    endpoint: null,
    model: "guard",
    timeout_ms: 3_000,
    deny_on_flag: false,
    flag_markers: DEFAULT_FLAG_MARKERS,
    health_url: null,
  },
  installers: {},
  audit: {
    dir: ".wardenctl/audit",
    lock_timeout_ms: 2_000,
  },
};

function isPlainObject(v: unknown): v is Layer {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Deep merge two layers. `override` values take precedence, including null.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Layer, override: Layer): Layer {
  const result: Layer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file as a layer, or an empty layer if it does not exist. */
export function loadYaml(filePath: string): Layer {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file is not a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * WARDEN_* variables as a layer.
 * WARDEN_MIN_TRUST=0.8 → { min_trust: 0.8 }
 * WARDEN_INTENT__ENDPOINT=http://h/api → { intent: { endpoint: "http://h/api" } }
 * Values are parsed as YAML scalars, so numbers, booleans and null keep their type.
 */
export function envLayer(env: NodeJS.ProcessEnv): Layer {
  const layer: Layer = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined || RESERVED_ENV.has(key)) continue;

    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter(Boolean);
    if (segments.length === 0) continue;

    let node = layer;
    for (const segment of segments.slice(0, -1)) {
      const next = node[segment];
      if (isPlainObject(next)) {
        node = next;
      } else {
        const created: Layer = {};
        node[segment] = created;
        node = created;
      }
    }
    node[segments[segments.length - 1]] = parseScalar(value);
  }
  return layer;
}

function parseScalar(value: string): unknown {
  try {
    return YAML.parse(value);
  } catch {
    return value;
  }
}

/**
 * Merge defaults ← base.yaml ← <envName>.yaml ← WARDEN_* variables.
 * The result is unvalidated; see `resolveConfig`.
 */
export function loadConfig(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env,
): Layer {
  const dir = configDir ?? env.WARDEN_CONFIG_DIR ?? DEFAULT_CONFIG_DIR;

  let merged = deepMerge(structuredClone(DEFAULT_CONFIG), loadYaml(path.join(dir, "base.yaml")));

  const name = envName ?? env.WARDEN_ENV;
  if (name) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${name}.yaml`)));
  }

  return deepMerge(merged, envLayer(env));
}
