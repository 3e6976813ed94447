/**
 * Hash functions for blob refs, backed by @noble/hashes
 */

import { sha1 } from "@noble/hashes/sha1";
import { sha224 } from "@noble/hashes/sha256";

/**
 * Hash names that can be computed locally
 */
export type HashName = "sha1" | "sha224";

export const HASH_NAMES = ["sha1", "sha224"] as const satisfies readonly HashName[];

/**
 * Hash used for new blobs unless configured otherwise
 */
export const DEFAULT_HASH: HashName = "sha224";

export function isHashName(value: string): value is HashName {
  return HASH_NAMES.some((name) => name === value);
}

/**
 * Compute the digest of data with the named hash
 */
export function digest(hashName: HashName, data: Uint8Array): Uint8Array {
  switch (hashName) {
    case "sha1":
      return sha1(data);
    case "sha224":
      return sha224(data);
  }
}
