/**
 * Static set traversal tests
 */

import { beforeEach, describe, expect, it } from "vitest";
import { mustParseRef, type BlobRef } from "../src/ref.ts";
import { createSchemaBlob, newDirectory, newMergedStaticSet, newStaticSet, type SchemaFields } from "../src/schema.ts";
import { readStaticSetMembers } from "../src/static-set.ts";
import type { FetchBlob } from "../src/types.ts";

describe("readStaticSetMembers", () => {
  let blobs: Map<string, Uint8Array>;
  let fetchBlob: FetchBlob;

  const put = (fields: SchemaFields): BlobRef => {
    const blob = createSchemaBlob(fields, "sha224");
    blobs.set(blob.ref, blob.bytes);
    return blob.ref;
  };

  const refs = ["sha1-a1", "sha1-a2", "sha1-a3", "sha1-a4", "sha1-a5"].map(mustParseRef);

  beforeEach(() => {
    blobs = new Map();
    fetchBlob = async (ref) => blobs.get(ref) ?? null;
  });

  it("should return members of a single set", async () => {
    const ref = put(newStaticSet(refs));
    expect(await readStaticSetMembers(ref, fetchBlob)).toEqual(refs);
  });

  it("should concatenate merged subsets in link order", async () => {
    const first = put(newStaticSet(refs.slice(0, 2)));
    const second = put(newStaticSet(refs.slice(2, 4)));
    const third = put(newStaticSet(refs.slice(4)));
    const middle = put(newMergedStaticSet([second, third]));
    const top = put(newMergedStaticSet([first, middle]));

    expect(await readStaticSetMembers(top, fetchBlob)).toEqual(refs);
  });

  it("should fail on a missing subset", async () => {
    const missing = mustParseRef("sha1-0000");
    const top = put(newMergedStaticSet([missing]));

    await expect(readStaticSetMembers(top, fetchBlob)).rejects.toThrow("Static set sha1-0000 not found");
  });

  it("should fail on a blob that is not a static set", async () => {
    const dir = put(newDirectory("shared-20240305070809", refs[0] ?? mustParseRef("sha1-00")));

    await expect(readStaticSetMembers(dir, fetchBlob)).rejects.toThrow("Invalid schema blob");
  });
});
