import { createHash } from "node:crypto";

/** Derive an article uid: SHA-1 hex digest of the UTF-8 reference string. */
export function deriveUid(reference: string): string {
  return createHash("sha1").update(reference, "utf8").digest("hex");
}
