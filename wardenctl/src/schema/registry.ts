import fs from "node:fs";
import path from "node:path";
import { createAjv, type AjvInstance, type AjvValidateFn } from "./ajv.js";
import { DEFAULT_SCHEMA_DIR } from "../paths.js";
import type { WardenConfig } from "../types/config.js";
import type { RegistryDocument } from "../types/package.js";
import type { AuditRecord } from "../types/audit.js";

/** Schema name → the type a passing document has. */
export type SchemaTypes = {
  config: WardenConfig;
  registry: RegistryDocument;
  "audit-record": AuditRecord;
};

export type SchemaName = keyof SchemaTypes;

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: object;
};

/**
 * Discovers *.schema.json files and compiles validators on demand.
 */
export class SchemaRegistry {
  private readonly entries = new Map<string, SchemaEntry>();
  private readonly validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = createAjv();

  constructor(private readonly schemaDir: string = DEFAULT_SCHEMA_DIR) {
    if (!fs.existsSync(schemaDir)) {
      throw new Error(`Schema directory not found: ${schemaDir}`);
    }

    for (const file of fs.readdirSync(schemaDir).filter((f) => f.endsWith(".schema.json"))) {
      const filePath = path.join(schemaDir, file);
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      if (!isObject(parsed)) throw new Error(`Schema is not an object: ${filePath}`);

      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(parsed) ?? "1.0.0", filePath, schema: parsed });
    }
  }

  get dir(): string {
    return this.schemaDir;
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) result[name] = entry.version;
    return result;
  }

  private validator(name: SchemaName): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  /** Type guard over a named schema. */
  is<K extends SchemaName>(name: K, data: unknown): data is SchemaTypes[K] {
    return this.validator(name)(data);
  }

  validate(name: SchemaName, data: unknown): { valid: boolean; errors: string | null } {
    const validate = this.validator(name);
    const valid = validate(data);
    return { valid, errors: valid ? null : this.ajv.errorsText(validate.errors, { dataVar: name }) };
  }
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Version from an `$id` ending in `@x.y.z`. */
function extractVersion(schema: Record<string, unknown>): string | null {
  if (typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)$/.exec(schema.$id);
    if (m) return m[1];
  }
  return null;
}
