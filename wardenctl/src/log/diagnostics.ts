export type DiagnosticLevel = "debug" | "info" | "warn" | "error";

export type Diagnostic = {
  level: DiagnosticLevel;
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type DiagnosticSink = (d: Diagnostic) => void;

export type OutputFormat = "human" | "jsonl";

export function diag(
  level: DiagnosticLevel,
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

export const discard: DiagnosticSink = () => {};

export function isDebugEnabled(): boolean {
  const v = process.env.WARDEN_DEBUG;
  return v === "1" || v === "true";
}

/**
 * Reporter for CLI commands.
 *
 * jsonl: every diagnostic (debug only when verbose) as one line on stdout.
 * human: info on stdout, warn/error on stderr, prefixed with the level.
 */
export function createReporter(
  format: OutputFormat,
  opts?: { verbose?: boolean; stdout?: NodeJS.WritableStream; stderr?: NodeJS.WritableStream },
): DiagnosticSink {
  const verbose = opts?.verbose ?? isDebugEnabled();
  const out = opts?.stdout ?? process.stdout;
  const err = opts?.stderr ?? process.stderr;

  return (d) => {
    if (d.level === "debug" && !verbose) return;

    if (format === "jsonl") {
      out.write(JSON.stringify(d) + "\n");
      return;
    }

    const line = d.level === "info" ? d.message : `[${d.level}] ${d.message}`;
    if (d.level === "warn" || d.level === "error") err.write(line + "\n");
    else out.write(line + "\n");
  };
}

/** Collects diagnostics in memory; used by `validate` and tests. */
export function collectingSink(): { sink: DiagnosticSink; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  return { sink: (d) => diagnostics.push(d), diagnostics };
}
