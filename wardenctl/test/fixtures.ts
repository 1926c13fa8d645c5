import { Writable } from "node:stream";
import type { PackageRecord } from "../src/types/package.js";
import type { AuditEntryInput } from "../src/types/audit.js";

export function pkg(overrides: Partial<PackageRecord> & { name: string }): PackageRecord {
  return {
    version: "1.0.0",
    description: `${overrides.name} package`,
    ecosystem: "pip",
    target: overrides.name,
    compliant: true,
    verified: true,
    trustScore: 0.9,
    dependencies: [],
    author: "Test Author",
    ...overrides,
  };
}

/** rabel passes, shady is unverified, low-trust scores 0.3, rusty is a cargo crate. */
export function scenarioRecords(): PackageRecord[] {
  return [
    pkg({ name: "rabel", description: "Retrieval-augmented belief layer", target: "rabel-dist", trustScore: 0.9 }),
    pkg({ name: "shady", description: "Unreviewed helper", verified: false, trustScore: 0.8 }),
    pkg({ name: "low-trust", description: "Barely known tool", ecosystem: "npm", trustScore: 0.3 }),
    pkg({ name: "rusty", description: "Rust crate", ecosystem: "cargo", trustScore: 0.9 }),
  ];
}

export function entry(overrides: Partial<AuditEntryInput> = {}): AuditEntryInput {
  return {
    package: "rabel",
    actor: "tester",
    outcome: "installed",
    abortReason: null,
    decision: null,
    install: null,
    error: null,
    ...overrides,
  };
}

/** Writable that keeps everything written to it. */
export function captureStream(): { stream: Writable; text: () => string; lines: () => string[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      chunks.push(String(chunk));
      cb();
    },
  });
  const text = () => chunks.join("");
  return { stream, text, lines: () => text().split("\n").filter((l) => l !== "") };
}
