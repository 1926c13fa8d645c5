/** Registry records as consumed by the gateway. */

export type McpConfig = {
  command: string;
  args?: string[];
  env?: Record<string, string>;
};

export type PackageRecord = {
  name: string;
  version: string;
  description: string;
  /** Installer family tag. Open on purpose: registries may list ecosystems we cannot install. */
  ecosystem: string;
  /** Distribution name handed to the installer; may differ from `name`. */
  target: string;
  compliant: boolean;
  verified: boolean;
  /** Normalized reputation in [0, 1]. */
  trustScore: number;
  dependencies: readonly string[];
  author: string;
  mcpConfig?: McpConfig;
};

/** One entry of a registry document, as written on disk. */
export type RegistryEntry = {
  name: string;
  version?: string;
  description: string;
  ecosystem: string;
  target?: string;
  compliant: boolean;
  verified: boolean;
  trust_score: number;
  dependencies?: string[];
  author?: string;
  mcp_config?: McpConfig;
};

export type RegistryDocument = {
  schema_version: string;
  packages: RegistryEntry[];
};
