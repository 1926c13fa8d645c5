import { createHash } from "node:crypto";

/** Compute SHA256 hex digest of a string/buffer. */
export function sha256Hex(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/** Chain hash of a record: sha256(previousHash + JSON body). */
export function chainHash(previousHash: string, body: unknown): string {
  return sha256Hex(previousHash + JSON.stringify(body));
}
