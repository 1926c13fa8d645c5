import { execFile } from "node:child_process";
import { promisify } from "node:util";

const pExecFile = promisify(execFile);

export type ProcessOutcome =
  | { kind: "exited"; exitCode: number | null; stdout: string; stderr: string; timedOut: boolean }
  | { kind: "spawn_failed"; code: string; message: string };

export type ProcessRunner = (
  command: string,
  args: readonly string[],
  opts: { timeoutMs: number; cwd?: string },
) => Promise<ProcessOutcome>;

/** The one string code execFile reports for a child that did run. */
const MAX_BUFFER_CODE = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";

type ExecFailure = Error & {
  code?: string | number | null;
  syscall?: string;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
  stdout?: string;
  stderr?: string;
};

function isExecFailure(e: unknown): e is ExecFailure {
  return e instanceof Error;
}

/** The child never started: spawn errno, argument validation, resource limits. */
function neverStarted(e: ExecFailure): e is ExecFailure & { code: string } {
  if (typeof e.code !== "string") return false;
  return e.code !== MAX_BUFFER_CODE || e.syscall?.startsWith("spawn") === true;
}

/**
 * execFile-backed runner: no shell, bounded by `timeoutMs`, output kept verbatim.
 */
export const execFileRunner: ProcessRunner = async (command, args, opts) => {
  try {
    const { stdout, stderr } = await pExecFile(command, [...args], {
      cwd: opts.cwd,
      timeout: opts.timeoutMs,
      maxBuffer: 50 * 1024 * 1024,
      shell: false,
      encoding: "utf8",
    });
    return { kind: "exited", exitCode: 0, stdout, stderr, timedOut: false };
  } catch (e) {
    if (!isExecFailure(e)) throw e;

    if (neverStarted(e)) {
      return { kind: "spawn_failed", code: e.code, message: e.message };
    }

    const timedOut = e.killed === true && typeof e.code !== "string" && e.signal !== null && e.signal !== undefined;
    return {
      kind: "exited",
      exitCode: typeof e.code === "number" ? e.code : null,
      stdout: e.stdout ?? "",
      stderr: e.stderr ?? "",
      timedOut,
    };
  }
};
