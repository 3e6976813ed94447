/**
 * Directory assembly
 */

import { createSchemaBlob, DEFAULT_HASH, newDirectory, type BlobRef, type SchemaBlob } from "@blobshare/blob-core";
import { describeError, UploadError } from "./errors.ts";
import type { DirectoryOptions } from "./types.ts";

export const SHARED_DIRECTORY_PREFIX = "shared-";

const pad = (value: number, width = 2): string => value.toString().padStart(width, "0");

/**
 * Name of a directory created for a share: "shared-" + UTC YYYYMMDDHHMMSS
 */
export function sharedDirectoryName(date: Date): string {
  return (
    SHARED_DIRECTORY_PREFIX +
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

/**
 * Create and upload a directory whose entries are the members of a static set
 *
 * @returns The uploaded directory blob
 */
export async function assembleDirectory(staticSet: BlobRef, options: DirectoryOptions): Promise<SchemaBlob> {
  const now = options.now ?? (() => new Date());
  const fileName = sharedDirectoryName(now());
  const dir = createSchemaBlob(newDirectory(fileName, staticSet), options.hash ?? DEFAULT_HASH);

  try {
    await options.storage.upload(dir);
  } catch (error) {
    throw new UploadError(`Could not upload directory ${fileName}: ${describeError(error)}`, { cause: error });
  }
  return dir;
}
