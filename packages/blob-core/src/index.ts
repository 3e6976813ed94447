/**
 * @blobshare/blob-core
 *
 * Blob refs and schema blobs for content-addressable storage
 *
 * Schema blob types:
 * - static-set: ordered refs, split into "mergeSets" subsets when large
 * - directory: named entry pointing at one static set
 * - claim: signed statement, e.g. a "haveref" share
 */

// Constants
export {
  CAMLI_VERSION,
  CLAIM_TYPE,
  DEFAULT_MAX_SET_MEMBERS,
  SCHEMA_TYPE,
  SHARE_AUTH_TYPE,
  SIGNATURE_KEY,
  type SchemaType,
} from "./constants.ts";

// Hashing
export { DEFAULT_HASH, HASH_NAMES, digest, isHashName, type HashName } from "./hash.ts";

// Refs
export {
  BLOB_REF_REGEX,
  BlobRefSchema,
  computeRef,
  isBlobRef,
  mustParseRef,
  parseRef,
  refHashName,
  type BlobRef,
} from "./ref.ts";

// Schema blobs
export {
  createRawBlob,
  createSchemaBlob,
  encodeSchema,
  formatClaimDate,
  newDirectory,
  newMergedStaticSet,
  newShareClaim,
  newStaticSet,
  type SchemaBlob,
  type SchemaFields,
  type ShareClaimInput,
} from "./schema.ts";

// Validation
export {
  DirectorySchema,
  PublicKeySchema,
  SchemaDecodeError,
  ShareClaimSchema,
  StaticSetSchema,
  decodeJson,
  decodeSchemaBlob,
  type Directory,
  type PublicKey,
  type ShareClaim,
  type StaticSet,
} from "./validation.ts";

// Static sets
export { readStaticSetMembers } from "./static-set.ts";

// Collaborator types
export type { FetchBlob, JsonValue, RawBlob, Signer, StorageClient } from "./types.ts";
