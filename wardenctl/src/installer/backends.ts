import type { InstallerConfig } from "../types/config.js";

/** Installer families the router can dispatch to. */
export const ECOSYSTEMS = ["pip", "npm"] as const;

export type Ecosystem = (typeof ECOSYSTEMS)[number];

export type InstallerBackend = {
  ecosystem: Ecosystem;
  /** argv prefix; the install target is appended. */
  command: readonly string[];
  timeoutMs: number;
};

export const DEFAULT_INSTALL_TIMEOUT_MS = 600_000;

export function isSupportedEcosystem(tag: string): tag is Ecosystem {
  return ECOSYSTEMS.some((e) => e === tag);
}

/** Total over Ecosystem: a new member fails to compile until it gets a case here. */
function defaultCommand(ecosystem: Ecosystem): readonly string[] {
  switch (ecosystem) {
    case "pip":
      return ["python3", "-m", "pip", "install"];
    case "npm":
      return ["npm", "install"];
    default: {
      const unreachable: never = ecosystem;
      throw new Error(`No installer for ${String(unreachable)}`);
    }
  }
}

export function backendFor(
  ecosystem: Ecosystem,
  overrides?: Partial<Record<Ecosystem, Partial<InstallerConfig>>>,
): InstallerBackend {
  const override = overrides?.[ecosystem];
  return {
    ecosystem,
    command: override?.command && override.command.length > 0 ? [...override.command] : defaultCommand(ecosystem),
    timeoutMs: override?.timeout_ms ?? DEFAULT_INSTALL_TIMEOUT_MS,
  };
}

/** argv for installing `target` with `backend`. */
export function installArgv(backend: InstallerBackend, target: string): string[] {
  return [...backend.command, target];
}
