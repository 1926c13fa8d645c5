import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import { AuditWriteFailedError } from "../core/errors.js";

export const AUDIT_FILE_NAME = "audit.jsonl";
export const AUDIT_LOCK_NAME = "audit.lock";
export const DEFAULT_LOCK_TIMEOUT_MS = 2000;
/** A lock file older than this is left over from a crashed writer. */
export const STALE_LOCK_MS = 30_000;

const TAIL_BYTES = 8192;
const LOCK_RETRY_MS = 25;

/**
 * Line storage behind the audit trail. One JSON document per line, append only.
 * `withLock` serializes writers, across processes for the file store.
 */
export interface AuditStore {
  readonly location: string;
  withLock<T>(fn: () => T): T;
  append(line: string): void;
  lastLine(): string | null;
  lines(): AsyncIterable<string>;
}

export class JsonlAuditStore implements AuditStore {
  readonly location: string;
  private readonly lockPath: string;
  private readonly lockTimeoutMs: number;

  constructor(
    private readonly dir: string,
    opts?: { lockTimeoutMs?: number },
  ) {
    this.location = path.join(dir, AUDIT_FILE_NAME);
    this.lockPath = path.join(dir, AUDIT_LOCK_NAME);
    this.lockTimeoutMs = opts?.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
  }

  withLock<T>(fn: () => T): T {
    fs.mkdirSync(this.dir, { recursive: true, mode: 0o700 });
    const token = this.acquire();
    try {
      return fn();
    } finally {
      this.release(token);
    }
  }

  append(line: string): void {
    const fd = fs.openSync(this.location, "a", 0o600);
    try {
      fs.writeSync(fd, line + "\n");
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
  }

  /** Reads only the tail of the file; grows the window until a whole line fits. */
  lastLine(): string | null {
    if (!fs.existsSync(this.location)) return null;
    const size = fs.statSync(this.location).size;
    if (size === 0) return null;

    const fd = fs.openSync(this.location, "r");
    try {
      for (let span = TAIL_BYTES; ; span *= 2) {
        const len = Math.min(span, size);
        const buf = Buffer.alloc(len);
        fs.readSync(fd, buf, 0, len, size - len);
        const lines = buf
          .toString("utf8")
          .split("\n")
          .filter((l) => l.trim() !== "");
        if (lines.length > 1 || len === size) return lines.at(-1) ?? null;
      }
    } finally {
      fs.closeSync(fd);
    }
  }

  async *lines(): AsyncGenerator<string> {
    if (!fs.existsSync(this.location)) return;
    const rl = readline.createInterface({
      input: fs.createReadStream(this.location, { encoding: "utf8" }),
      crlfDelay: Infinity,
    });
    for await (const line of rl) {
      if (line.trim() !== "") yield line;
    }
  }

  /** Creates the lock file holding a token unique to this acquisition. */
  private acquire(): string {
    const token = `${process.pid}:${randomUUID()}`;
    const deadline = Date.now() + this.lockTimeoutMs;
    for (;;) {
      try {
        const fd = fs.openSync(this.lockPath, "wx", 0o600);
        try {
          fs.writeSync(fd, token);
        } finally {
          fs.closeSync(fd);
        }
        return token;
      } catch (e) {
        if (!isErrnoException(e) || e.code !== "EEXIST") throw e;
      }

      if (this.removeStaleLock()) continue;
      if (Date.now() >= deadline) {
        throw new AuditWriteFailedError(`could not acquire ${this.lockPath} within ${this.lockTimeoutMs}ms`);
      }
      sleepSync(LOCK_RETRY_MS);
    }
  }

  /** Removes the lock only while it still holds our token. */
  private release(token: string): void {
    let held: string;
    try {
      held = fs.readFileSync(this.lockPath, "utf8");
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return;
      throw e;
    }
    if (held === token) fs.rmSync(this.lockPath, { force: true });
  }

  /**
   * Claims a stale lock by renaming it away, so only one writer can remove it.
   * Returns true when the caller should retry the open.
   */
  private removeStaleLock(): boolean {
    let age: number;
    try {
      age = Date.now() - fs.statSync(this.lockPath).mtimeMs;
    } catch (e) {
      // Released between the open and the stat.
      if (isErrnoException(e) && e.code === "ENOENT") return true;
      throw e;
    }
    if (age < STALE_LOCK_MS) return false;

    const claimed = `${this.lockPath}.${randomUUID()}.stale`;
    try {
      fs.renameSync(this.lockPath, claimed);
    } catch (e) {
      // Another writer claimed it first.
      if (isErrnoException(e) && e.code === "ENOENT") return true;
      throw e;
    }

    // The rename can catch a lock taken after the stat; put it back.
    if (Date.now() - fs.statSync(claimed).mtimeMs < STALE_LOCK_MS) {
      try {
        fs.linkSync(claimed, this.lockPath);
      } catch (e) {
        if (!isErrnoException(e) || e.code !== "EEXIST") throw e;
      }
    }
    fs.rmSync(claimed, { force: true });
    return true;
  }
}

/** In-process store for tests and dry runs. */
export class MemoryAuditStore implements AuditStore {
  readonly location = "memory";
  readonly written: string[] = [];
  /** When set, `append` throws with this message. */
  failAppend: string | null = null;
  private locked = false;

  withLock<T>(fn: () => T): T {
    if (this.locked) throw new AuditWriteFailedError("audit store is already locked");
    this.locked = true;
    try {
      return fn();
    } finally {
      this.locked = false;
    }
  }

  append(line: string): void {
    if (this.failAppend !== null) throw new Error(this.failAppend);
    this.written.push(line);
  }

  lastLine(): string | null {
    return this.written.at(-1) ?? null;
  }

  async *lines(): AsyncGenerator<string> {
    yield* this.written;
  }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}
