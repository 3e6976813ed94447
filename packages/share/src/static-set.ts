/**
 * Static set assembly
 *
 * Members are written into leaf sets of at most maxMembers refs. When more
 * than one leaf is needed, leaves are grouped under "mergeSets" parents,
 * level by level, until a single top-level set remains. Siblings upload
 * concurrently; each level is fully uploaded before its parents are.
 */

import {
  createSchemaBlob,
  DEFAULT_HASH,
  DEFAULT_MAX_SET_MEMBERS,
  newMergedStaticSet,
  newStaticSet,
  type BlobRef,
  type SchemaBlob,
  type StorageClient,
} from "@blobshare/blob-core";
import { ConfigError, describeError, UploadError, ValidationError } from "./errors.ts";
import type { AssembledStaticSet, StaticSetOptions } from "./types.ts";

/**
 * Split refs into consecutive groups of at most size refs
 */
export function chunkRefs(refs: readonly BlobRef[], size: number): BlobRef[][] {
  const chunks: BlobRef[][] = [];
  for (let offset = 0; offset < refs.length; offset += size) {
    chunks.push(refs.slice(offset, offset + size));
  }
  return chunks;
}

/**
 * Assemble and upload a static set over members, in order
 *
 * @throws UploadError when any set blob fails to upload. Sets uploaded
 * before the failure are left in place.
 */
export async function assembleStaticSet(
  members: readonly BlobRef[],
  options: StaticSetOptions
): Promise<AssembledStaticSet> {
  const maxMembers = options.maxMembers ?? DEFAULT_MAX_SET_MEMBERS;
  const hash = options.hash ?? DEFAULT_HASH;

  if (!Number.isInteger(maxMembers) || maxMembers < 2) {
    throw new ConfigError(`maxMembers must be an integer >= 2, got ${maxMembers}`);
  }
  if (members.length === 0) {
    throw new ValidationError("Cannot assemble an empty static set");
  }

  const blobs: SchemaBlob[] = [];
  const upload = async (blob: SchemaBlob): Promise<BlobRef> => {
    await uploadSet(options.storage, blob);
    blobs.push(blob);
    return blob.ref;
  };

  if (members.length <= maxMembers) {
    const ref = await upload(createSchemaBlob(newStaticSet(members), hash));
    return { ref, blobs, depth: 1 };
  }

  let level = await Promise.all(
    chunkRefs(members, maxMembers).map((chunk) => upload(createSchemaBlob(newStaticSet(chunk), hash)))
  );
  let depth = 1;

  while (level.length > maxMembers) {
    level = await Promise.all(
      chunkRefs(level, maxMembers).map((chunk) => upload(createSchemaBlob(newMergedStaticSet(chunk), hash)))
    );
    depth++;
  }

  const ref = await upload(createSchemaBlob(newMergedStaticSet(level), hash));
  return { ref, blobs, depth: depth + 1 };
}

async function uploadSet(storage: StorageClient, blob: SchemaBlob): Promise<void> {
  try {
    await storage.upload(blob);
  } catch (error) {
    throw new UploadError(`Could not upload static set ${blob.ref}: ${describeError(error)}`, { cause: error });
  }
}
