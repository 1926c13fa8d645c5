import { minimatch } from "minimatch";
import { chainHash } from "./checksum.js";
import type { AuditStore } from "./store.js";
import { AuditWriteFailedError, errorMessage } from "../core/errors.js";
import { SchemaRegistry } from "../schema/registry.js";
import type { AuditEntryInput, AuditFilter, AuditRecord, AuditVerification } from "../types/audit.js";

export const GENESIS_HASH = "0".repeat(64);

type ChainLink = { seq: number; hash: string };

export type AuditTrailOptions = {
  schemas?: SchemaRegistry;
  clock?: () => Date;
};

/**
 * Append-only, hash-chained record of every gateway decision.
 *
 * Each record carries the previous record's hash and its own
 * sha256(previousHash + JSON body), so any edit or deletion breaks `verify`.
 * Appends hold the store lock; there is no update or delete.
 */
export class AuditTrail {
  private readonly schemas: SchemaRegistry;
  private readonly clock: () => Date;

  constructor(
    private readonly store: AuditStore,
    opts: AuditTrailOptions = {},
  ) {
    this.schemas = opts.schemas ?? new SchemaRegistry();
    this.clock = opts.clock ?? (() => new Date());
  }

  get location(): string {
    return this.store.location;
  }

  /** Throws AuditWriteFailedError; nothing is appended on failure. */
  record(input: AuditEntryInput): AuditRecord {
    try {
      return this.store.withLock(() => {
        const prev = this.tail();
        const previousHash = prev?.hash ?? GENESIS_HASH;
        const body = {
          seq: (prev?.seq ?? 0) + 1,
          ts: this.clock().toISOString(),
          package: input.package,
          actor: input.actor,
          outcome: input.outcome,
          aborted: input.abortReason !== null,
          abortReason: input.abortReason,
          decision: input.decision,
          install: input.install,
          error: input.error,
          previousHash,
        };
        const record: AuditRecord = { ...body, hash: chainHash(previousHash, body) };
        this.store.append(JSON.stringify(record));
        return deepFreeze(record);
      });
    } catch (e) {
      if (e instanceof AuditWriteFailedError) throw e;
      throw new AuditWriteFailedError(errorMessage(e), { cause: e });
    }
  }

  /** Records in append order, narrowed by the filter. Unparseable lines are skipped. */
  async *history(filter: AuditFilter = {}): AsyncGenerator<AuditRecord> {
    const since = filter.since !== undefined ? new Date(filter.since).getTime() : null;
    const until = filter.until !== undefined ? new Date(filter.until).getTime() : null;

    for await (const line of this.store.lines()) {
      const record = this.parse(line);
      if (!record) continue;

      if (filter.package !== undefined && !minimatch(record.package, filter.package, { nocase: true })) continue;
      if (filter.outcome !== undefined && record.outcome !== filter.outcome) continue;
      if (filter.actor !== undefined && record.actor !== filter.actor) continue;

      const ts = Date.parse(record.ts);
      if (since !== null && ts < since) continue;
      if (until !== null && ts > until) continue;

      yield deepFreeze(record);
    }
  }

  async count(filter?: AuditFilter): Promise<number> {
    let n = 0;
    for await (const _ of this.history(filter)) n++;
    return n;
  }

  /** Walks the whole chain and reports every broken link. */
  async verify(): Promise<AuditVerification> {
    const errors: string[] = [];
    let total = 0;
    let expectedSeq = 1;
    let previousHash = GENESIS_HASH;

    for await (const line of this.store.lines()) {
      total++;
      const record = this.parse(line);
      if (!record) {
        errors.push(`line ${total}: not a valid audit record`);
        continue;
      }

      if (record.seq !== expectedSeq) {
        errors.push(`seq ${record.seq}: expected seq ${expectedSeq}`);
      }
      if (record.previousHash !== previousHash) {
        errors.push(`seq ${record.seq}: previousHash does not match the preceding record`);
      }
      const { hash, ...body } = record;
      if (chainHash(record.previousHash, body) !== hash) {
        errors.push(`seq ${record.seq}: hash mismatch`);
      }

      expectedSeq = record.seq + 1;
      previousHash = hash;
    }

    return { ok: errors.length === 0, total, errors };
  }

  private tail(): ChainLink | null {
    const line = this.store.lastLine();
    if (line === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (e) {
      throw new AuditWriteFailedError(`last audit record is not JSON: ${errorMessage(e)}`, { cause: e });
    }
    if (!isChainLink(parsed)) throw new AuditWriteFailedError("last audit record has no seq/hash");
    return parsed;
  }

  private parse(line: string): AuditRecord | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      return null;
    }
    return this.schemas.is("audit-record", parsed) ? parsed : null;
  }
}

function isChainLink(v: unknown): v is ChainLink {
  return (
    typeof v === "object" &&
    v !== null &&
    "seq" in v &&
    typeof v.seq === "number" &&
    "hash" in v &&
    typeof v.hash === "string"
  );
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
