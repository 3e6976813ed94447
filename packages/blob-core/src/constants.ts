/**
 * Blob schema constants
 */

/**
 * Schema version written into every schema blob
 */
export const CAMLI_VERSION = 1;

/**
 * Schema blob types
 */
export const SCHEMA_TYPE = {
  /** Ordered set of blob refs (or of subsets, when split) */
  STATIC_SET: "static-set",
  /** Named directory pointing at one static set */
  DIRECTORY: "directory",
  /** Signed claim */
  CLAIM: "claim",
  /** Signer public key */
  PUBLIC_KEY: "public-key",
} as const;

export type SchemaType = (typeof SCHEMA_TYPE)[keyof typeof SCHEMA_TYPE];

/**
 * Claim types understood by this package
 */
export const CLAIM_TYPE = {
  SHARE: "share",
} as const;

/**
 * Share auth types. "haveref" grants access to whoever presents the claim.
 */
export const SHARE_AUTH_TYPE = {
  HAVE_REF: "haveref",
} as const;

/**
 * Maximum number of entries in one static-set blob.
 * Larger sets are split into subsets linked through "mergeSets".
 */
export const DEFAULT_MAX_SET_MEMBERS = 10_000;

/**
 * Key of the signature appended to signed schema blobs
 */
export const SIGNATURE_KEY = "camliSig";
