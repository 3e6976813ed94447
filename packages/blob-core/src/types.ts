/**
 * Blob store collaborator types
 */

import type { BlobRef } from "./ref.ts";

/**
 * JSON value carried by schema blobs
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Immutable blob bytes with the ref computed from them
 */
export interface RawBlob {
  ref: BlobRef;
  bytes: Uint8Array;
}

/**
 * Blob store the sharing protocol writes to.
 * Uploading a blob that is already present is idempotent.
 */
export interface StorageClient {
  /**
   * Upload a blob
   * @returns The ref the server stored the blob under
   */
  upload(blob: RawBlob): Promise<BlobRef>;

  /**
   * Ref of the server's public key blob, used as claim signer
   */
  getServerIdentityRef(): Promise<BlobRef>;

  /**
   * URL path prefix of the server's share handler (e.g. "/share/")
   */
  getShareRootPath(): Promise<string>;
}

/**
 * Signing service: returns the signed form of an unsigned schema blob
 */
export interface Signer {
  sign(payload: Uint8Array): Promise<Uint8Array>;
}

/**
 * Fetch a blob's bytes by ref, null when absent
 */
export type FetchBlob = (ref: BlobRef) => Promise<Uint8Array | null>;
