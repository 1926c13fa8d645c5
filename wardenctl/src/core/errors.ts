export type GatewayErrorCode =
  | "NOT_FOUND"
  | "UNSUPPORTED_ECOSYSTEM"
  | "INSTALLER_UNAVAILABLE"
  | "AUDIT_WRITE_FAILED"
  | "CONFIG_INVALID"
  | "REGISTRY_UNAVAILABLE";

/** Base class for failures the gateway reports by code. */
export class GatewayError extends Error {
  readonly code: GatewayErrorCode;

  constructor(code: GatewayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends GatewayError {
  constructor(readonly packageName: string) {
    super("NOT_FOUND", `Package '${packageName}' not found`);
  }
}

export class UnsupportedEcosystemError extends GatewayError {
  constructor(readonly ecosystem: string) {
    super("UNSUPPORTED_ECOSYSTEM", `unsupported ecosystem: ${ecosystem}`);
  }
}

export class InstallerUnavailableError extends GatewayError {
  constructor(
    readonly command: string,
    readonly reason: string,
  ) {
    super("INSTALLER_UNAVAILABLE", `installer '${command}' could not be started: ${reason}`);
  }
}

export class AuditWriteFailedError extends GatewayError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("AUDIT_WRITE_FAILED", `audit write failed: ${reason}`, options);
  }
}

export class ConfigError extends GatewayError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

export class RegistryUnavailableError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("REGISTRY_UNAVAILABLE", message, options);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
