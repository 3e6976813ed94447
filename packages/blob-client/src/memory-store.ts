/**
 * In-memory blob store
 *
 * StorageClient backed by a Map, for tests and offline use
 */

import {
  computeRef,
  isHashName,
  refHashName,
  type BlobRef,
  type FetchBlob,
  type RawBlob,
  type StorageClient,
} from "@blobshare/blob-core";

/**
 * MemoryBlobStore options
 */
export interface MemoryBlobStoreOptions {
  /** Ref returned as the server identity */
  identity?: BlobRef;
  /** Share handler path returned by getShareRootPath */
  shareRoot?: string;
}

/**
 * StorageClient with inspection utilities
 */
export type MemoryBlobStore = StorageClient & {
  /** Get a blob's bytes */
  fetchBlob: FetchBlob;
  /** Check if a ref is stored */
  has: (ref: BlobRef) => boolean;
  /** Refs in the order they were first stored */
  keys: () => BlobRef[];
  /** Every upload call, duplicates included */
  uploads: () => BlobRef[];
  /** Get number of stored blobs */
  size: () => number;
};

/**
 * Create an in-memory blob store
 */
export const createMemoryBlobStore = (options: MemoryBlobStoreOptions = {}): MemoryBlobStore => {
  const store = new Map<BlobRef, Uint8Array>();
  const uploads: BlobRef[] = [];

  return {
    upload: async (blob: RawBlob): Promise<BlobRef> => {
      const hashName = refHashName(blob.ref);
      if (isHashName(hashName) && computeRef(blob.bytes, hashName) !== blob.ref) {
        throw new Error(`Blob content does not match ${blob.ref}`);
      }
      uploads.push(blob.ref);
      if (!store.has(blob.ref)) {
        // Store a copy to avoid mutation issues
        store.set(blob.ref, new Uint8Array(blob.bytes));
      }
      return blob.ref;
    },

    getServerIdentityRef: async (): Promise<BlobRef> => {
      if (!options.identity) {
        throw new Error("Store has no signing identity");
      }
      return options.identity;
    },

    getShareRootPath: async (): Promise<string> => {
      if (!options.shareRoot) {
        throw new Error("Store has no share handler");
      }
      return options.shareRoot;
    },

    fetchBlob: async (ref: BlobRef): Promise<Uint8Array | null> => {
      const data = store.get(ref);
      return data ? new Uint8Array(data) : null;
    },

    has: (ref: BlobRef): boolean => store.has(ref),

    keys: (): BlobRef[] => Array.from(store.keys()),

    uploads: (): BlobRef[] => [...uploads],

    size: (): number => store.size,
  };
};
