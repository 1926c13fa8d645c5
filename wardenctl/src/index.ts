export { Registry, RegistryStore, normalizeName } from "./registry/registry.js";
export { loadRegistry, updateRegistry, registryFromDocument, parseRegistryDocument } from "./registry/source.js";
export type { RegistryLoad, RegistrySourceKind, RegistrySourceOptions, RegistryUpdate } from "./registry/source.js";
export { evaluate, withIntent, assertThreshold, DEFAULT_MIN_TRUST } from "./policy/evaluator.js";
export { IntentValidator, unchecked } from "./intent/validator.js";
export type { IntentValidatorOptions } from "./intent/validator.js";
export { InstallerRouter } from "./installer/router.js";
export type { InstallerRouterOptions } from "./installer/router.js";
export { ECOSYSTEMS, backendFor, installArgv, isSupportedEcosystem } from "./installer/backends.js";
export type { Ecosystem, InstallerBackend } from "./installer/backends.js";
export { execFileRunner } from "./installer/process.js";
export type { ProcessOutcome, ProcessRunner } from "./installer/process.js";
export { AuditTrail, GENESIS_HASH } from "./audit/trail.js";
export { JsonlAuditStore, MemoryAuditStore } from "./audit/store.js";
export type { AuditStore } from "./audit/store.js";
export { Gateway } from "./core/gateway.js";
export type { GatewayOptions, GatewayOutcome, InstallRequest, AuditStatus, DependencyStatus } from "./core/gateway.js";
export { transition, canTransition, isTerminal, IllegalTransitionError, GATEWAY_STATES } from "./core/state-machine.js";
export type { GatewayState } from "./core/state-machine.js";
export * from "./core/errors.js";
export { EXIT, exitCodeFor, batchExitCode } from "./commands/exit-codes.js";
export { loadConfig } from "./config/loader.js";
export { resolveConfig, validateConfig } from "./config/validator.js";
export { SchemaRegistry } from "./schema/registry.js";
export { createReporter, collectingSink } from "./log/diagnostics.js";
export type { Diagnostic, DiagnosticSink, OutputFormat } from "./log/diagnostics.js";
export type * from "./types/package.js";
export type * from "./types/decision.js";
export type * from "./types/intent.js";
export type * from "./types/install.js";
export type * from "./types/audit.js";
export type * from "./types/config.js";
