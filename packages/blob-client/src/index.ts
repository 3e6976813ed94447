/**
 * @blobshare/blob-client
 *
 * Blob store clients for the sharing protocol
 *
 * Main exports:
 * - HttpBlobClient: StorageClient and Signer against a blob server
 * - createMemoryBlobStore: in-memory StorageClient
 * - createKeyPairSigner: local ECDSA P-256 claim signer
 */

// HTTP client
export { HttpBlobClient } from "./http-client.ts";
export {
  DISCOVERY_CONTENT_TYPE,
  DiscoverySchema,
  SigningDiscoverySchema,
  UploadResponseSchema,
  type Discovery,
  type SigningDiscovery,
  type UploadResponse,
} from "./discovery.ts";

// Errors
export { BlobServerError, DiscoveryError } from "./errors.ts";

// Local signing
export {
  base64urlDecode,
  base64urlEncode,
  createKeyPairSigner,
  createPublicKeyBlob,
  generateSigningKeyPair,
  verifySignedBlob,
  type SigningKeyPair,
} from "./keypair-signer.ts";

// Memory store
export { createMemoryBlobStore, type MemoryBlobStore, type MemoryBlobStoreOptions } from "./memory-store.ts";

// Types
export type { BlobClientAuth, FetchFn, HttpBlobClientConfig } from "./types.ts";
