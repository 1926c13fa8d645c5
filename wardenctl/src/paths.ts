import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

/** The wardenctl package directory (parent of src/ and dist/). */
export const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

export const DEFAULT_CONFIG_DIR = path.join(PACKAGE_ROOT, "config");
export const DEFAULT_SCHEMA_DIR = path.join(PACKAGE_ROOT, "schemas");
export const BUNDLED_REGISTRY_PATH = path.join(PACKAGE_ROOT, "data", "packages.json");

/** Expand a leading `~/` and resolve against `cwd`. */
export function resolveUserPath(p: string, cwd: string = process.cwd()): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return path.resolve(cwd, p);
}
