/**
 * Blob references
 *
 * A blob ref names an immutable blob by the digest of its bytes:
 *   <hashName>-<lowercase hex digest>
 * e.g. "sha224-d14a028c2a3a2bc9476102bb288234c415a2b01f828ea62ac5b3e42f"
 */

import { bytesToHex } from "@noble/hashes/utils";
import { z } from "zod";
import { digest, type HashName } from "./hash.ts";

// ============================================================================
// Format
// ============================================================================

/**
 * Blob ref format. The hash name is not restricted to the locally computable
 * hashes, and the digest length is not checked: refs minted by other stores
 * (or abbreviated in fixtures) parse as long as they are well formed.
 */
export const BLOB_REF_REGEX = /^[a-z][a-z0-9]*-[0-9a-f]+$/;

export const BlobRefSchema = z
  .string()
  .regex(BLOB_REF_REGEX, "Invalid blob ref format")
  .brand<"BlobRef">();

/**
 * A syntactically valid blob ref. Only obtainable through parsing or hashing.
 */
export type BlobRef = z.infer<typeof BlobRefSchema>;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse a blob ref, returning null when the string is not a valid ref
 */
export function parseRef(value: string): BlobRef | null {
  const result = BlobRefSchema.safeParse(value);
  return result.success ? result.data : null;
}

/**
 * Parse a blob ref, throwing when the string is not a valid ref
 */
export function mustParseRef(value: string): BlobRef {
  const ref = parseRef(value);
  if (!ref) {
    throw new Error(`Invalid blob ref: ${JSON.stringify(value)}`);
  }
  return ref;
}

/**
 * Report whether a value is a valid blob ref
 */
export function isBlobRef(value: unknown): value is BlobRef {
  return BlobRefSchema.safeParse(value).success;
}

/**
 * Hash name part of a ref ("sha224" for "sha224-...")
 */
export function refHashName(ref: BlobRef): string {
  return ref.slice(0, ref.indexOf("-"));
}

// ============================================================================
// Hashing
// ============================================================================

/**
 * Compute the ref of a blob's bytes
 */
export function computeRef(data: Uint8Array, hashName: HashName): BlobRef {
  return mustParseRef(`${hashName}-${bytesToHex(digest(hashName, data))}`);
}
