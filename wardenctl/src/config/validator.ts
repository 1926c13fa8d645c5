import { SchemaRegistry } from "../schema/registry.js";
import { ConfigError } from "../core/errors.js";
import { loadConfig } from "./loader.js";
import type { WardenConfig } from "../types/config.js";

export type ConfigValidationResult = {
  valid: boolean;
  errors: string | null;
};

/** Validate a merged config against config.schema.json. */
export function validateConfig(config: unknown, schemas: SchemaRegistry = new SchemaRegistry()): ConfigValidationResult {
  return schemas.validate("config", config);
}

/** Load, merge and validate; throws ConfigError on an invalid result. */
export function resolveConfig(opts: {
  env?: string;
  configDir?: string;
  processEnv?: NodeJS.ProcessEnv;
  schemas?: SchemaRegistry;
}): WardenConfig {
  const schemas = opts.schemas ?? new SchemaRegistry();
  const merged = loadConfig(opts.env, opts.configDir, opts.processEnv ?? process.env);

  if (!schemas.is("config", merged)) {
    const { errors } = schemas.validate("config", merged);
    throw new ConfigError(`Config invalid: ${errors ?? "unknown error"}`);
  }
  return merged;
}
