import { InstallerUnavailableError, UnsupportedEcosystemError } from "../core/errors.js";
import { diag, discard, type DiagnosticSink } from "../log/diagnostics.js";
import { backendFor, installArgv, isSupportedEcosystem, type Ecosystem, type InstallerBackend } from "./backends.js";
import { execFileRunner, type ProcessRunner } from "./process.js";
import type { InstallerConfig } from "../types/config.js";
import type { InstallResult } from "../types/install.js";
import type { PackageRecord } from "../types/package.js";

export type InstallerRouterOptions = {
  overrides?: Partial<Record<Ecosystem, Partial<InstallerConfig>>>;
  runner?: ProcessRunner;
  cwd?: string;
  log?: DiagnosticSink;
};

/**
 * Dispatches a record to its installer backend and runs it as a subprocess.
 * Output is captured, never interpreted; success means exit code 0.
 */
export class InstallerRouter {
  private readonly runner: ProcessRunner;
  private readonly log: DiagnosticSink;

  constructor(private readonly opts: InstallerRouterOptions = {}) {
    this.runner = opts.runner ?? execFileRunner;
    this.log = opts.log ?? discard;
  }

  /** Throws UnsupportedEcosystemError for tags outside the closed set. */
  resolve(ecosystem: string): InstallerBackend {
    if (!isSupportedEcosystem(ecosystem)) throw new UnsupportedEcosystemError(ecosystem);
    return backendFor(ecosystem, this.opts.overrides);
  }

  async install(record: PackageRecord): Promise<InstallResult> {
    const backend = this.resolve(record.ecosystem);
    const [command, ...args] = installArgv(backend, record.target);

    this.log(
      diag("info", "INSTALL_START", `Installing ${record.name} via ${backend.ecosystem}: ${record.target}`, {
        details: { argv: [command, ...args] },
      }),
    );

    const started = Date.now();
    const outcome = await this.runner(command, args, { timeoutMs: backend.timeoutMs, cwd: this.opts.cwd });
    const finished = Date.now();

    if (outcome.kind === "spawn_failed") {
      throw new InstallerUnavailableError(command, `${outcome.code}: ${outcome.message}`);
    }

    return Object.freeze({
      package: record.name,
      installer: backend.ecosystem,
      command: Object.freeze([command, ...args]),
      exitCode: outcome.exitCode,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
      output: outcome.stdout + outcome.stderr,
      success: outcome.exitCode === 0 && !outcome.timedOut,
      timedOut: outcome.timedOut,
      startedAt: new Date(started).toISOString(),
      finishedAt: new Date(finished).toISOString(),
      durationMs: finished - started,
    });
  }
}
