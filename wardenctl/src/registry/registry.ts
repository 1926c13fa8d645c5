import { NotFoundError } from "../core/errors.js";
import type { PackageRecord } from "../types/package.js";

export function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

function freezeRecord(record: PackageRecord): PackageRecord {
  if (!Number.isFinite(record.trustScore) || record.trustScore < 0 || record.trustScore > 1) {
    throw new RangeError(`trust score for '${record.name}' out of range [0, 1]: ${record.trustScore}`);
  }
  return Object.freeze({
    ...record,
    dependencies: Object.freeze([...record.dependencies]),
    ...(record.mcpConfig ? { mcpConfig: Object.freeze({ ...record.mcpConfig }) } : {}),
  });
}

/**
 * Immutable catalogue of package records.
 *
 * Insertion order is kept for `listAll` and `search`. Names are unique after
 * lower-casing; a refresh builds a new Registry rather than mutating this one.
 */
export class Registry {
  private readonly byName: ReadonlyMap<string, PackageRecord>;
  private readonly ordered: readonly PackageRecord[];

  constructor(records: Iterable<PackageRecord>) {
    const byName = new Map<string, PackageRecord>();
    const ordered: PackageRecord[] = [];

    for (const record of records) {
      const key = normalizeName(record.name);
      if (byName.has(key)) {
        throw new Error(`Duplicate package name in registry: ${record.name}`);
      }
      const frozen = freezeRecord(record);
      byName.set(key, frozen);
      ordered.push(frozen);
    }

    this.byName = byName;
    this.ordered = Object.freeze(ordered);
  }

  static empty(): Registry {
    return new Registry([]);
  }

  get size(): number {
    return this.ordered.length;
  }

  get(name: string): PackageRecord | undefined {
    return this.byName.get(normalizeName(name));
  }

  /** Exact, case-insensitive lookup. */
  lookup(name: string): PackageRecord {
    const record = this.get(name);
    if (!record) throw new NotFoundError(normalizeName(name));
    return record;
  }

  /** Case-insensitive substring match on name and description, in insertion order. */
  search(keyword: string): PackageRecord[] {
    const needle = keyword.trim().toLowerCase();
    return this.ordered.filter(
      (r) => r.name.toLowerCase().includes(needle) || r.description.toLowerCase().includes(needle),
    );
  }

  listAll(): PackageRecord[] {
    return [...this.ordered];
  }
}

/**
 * Holds the current registry snapshot. Readers take `current()` once and keep
 * using that snapshot; `swap` replaces it wholesale.
 */
export class RegistryStore {
  private snapshot: Registry;

  constructor(initial: Registry = Registry.empty()) {
    this.snapshot = initial;
  }

  current(): Registry {
    return this.snapshot;
  }

  /** Install `next` as the current snapshot; returns the one it replaced. */
  swap(next: Registry): Registry {
    const previous = this.snapshot;
    this.snapshot = next;
    return previous;
  }
}
