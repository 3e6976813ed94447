/**
 * Static set traversal
 */

import type { BlobRef } from "./ref.ts";
import type { FetchBlob } from "./types.ts";
import { decodeSchemaBlob, SchemaDecodeError, StaticSetSchema } from "./validation.ts";

/**
 * Nesting deeper than this is treated as a malformed set
 */
const MAX_SET_DEPTH = 32;

/**
 * Read the members of a static set, following "mergeSets" links in order
 *
 * @returns Member refs in the order they were assembled
 */
export async function readStaticSetMembers(ref: BlobRef, fetchBlob: FetchBlob): Promise<BlobRef[]> {
  return readMembers(ref, fetchBlob, 0);
}

async function readMembers(ref: BlobRef, fetchBlob: FetchBlob, depth: number): Promise<BlobRef[]> {
  if (depth > MAX_SET_DEPTH) {
    throw new SchemaDecodeError(`Static set ${ref} is nested deeper than ${MAX_SET_DEPTH} levels`);
  }

  const bytes = await fetchBlob(ref);
  if (!bytes) {
    throw new SchemaDecodeError(`Static set ${ref} not found`);
  }

  const set = decodeSchemaBlob(StaticSetSchema, bytes);
  if (set.members) {
    return set.members;
  }

  const subsets = await Promise.all(
    (set.mergeSets ?? []).map((subset) => readMembers(subset, fetchBlob, depth + 1))
  );
  return subsets.flat();
}
