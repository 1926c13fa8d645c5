import type { Ecosystem } from "../installer/backends.js";

/** Configuration types: defaults ← base.yaml ← <env>.yaml ← WARDEN_* variables. */
export type RegistryConfig = {
  cache_path: string;
  bundled_path: string | null;
  remote_url: string | null;
  timeout_ms: number;
};

export type IntentConfig = {
  endpoint: string | null;
  model: string;
  timeout_ms: number;
  deny_on_flag: boolean;
  flag_markers: string[];
  health_url: string | null;
};

export type InstallerConfig = {
  command: string[];
  timeout_ms: number;
};

export type AuditConfig = {
  dir: string;
  lock_timeout_ms: number;
};

export type WardenConfig = {
  schema_version: string;
  min_trust: number;
  actor: string;
  registry: RegistryConfig;
  intent: IntentConfig;
  installers: Partial<Record<Ecosystem, Partial<InstallerConfig>>>;
  audit: AuditConfig;
};
