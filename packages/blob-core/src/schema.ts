/**
 * Schema blobs
 *
 * Schema blobs are JSON documents describing structure (sets, directories,
 * claims) over other blobs. The encoding is canonical so that the same
 * fields always hash to the same ref:
 * - "camliVersion" is the first key, on the opening line
 * - remaining keys follow in sorted order, tab indented
 * - the document ends with a newline
 */

import { CAMLI_VERSION, CLAIM_TYPE, SCHEMA_TYPE, SHARE_AUTH_TYPE, type SchemaType } from "./constants.ts";
import type { HashName } from "./hash.ts";
import { computeRef, type BlobRef } from "./ref.ts";
import type { JsonValue, RawBlob } from "./types.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * Fields of a schema blob, excluding camliVersion
 */
export type SchemaFields = { camliType: SchemaType } & { [key: string]: JsonValue };

/**
 * Encoded schema blob
 */
export interface SchemaBlob extends RawBlob {
  /** Canonical JSON text (the blob's bytes, decoded) */
  text: string;
  /** The fields the blob was built from */
  fields: SchemaFields;
}

/**
 * Input for an unsigned share claim
 */
export interface ShareClaimInput {
  /** Ref of the signer's public key blob */
  signer: BlobRef;
  /** Ref of the shared blob */
  target: BlobRef;
  /** Whether the claim also grants everything reachable from target */
  transitive: boolean;
  /** Claim creation time */
  claimDate: Date;
}

// ============================================================================
// Encoding
// ============================================================================

const encoder = new TextEncoder();

/**
 * Encode schema fields as canonical JSON text
 */
export function encodeSchema(fields: SchemaFields): string {
  const sorted: { [key: string]: JsonValue } = {};
  for (const key of Object.keys(fields).sort()) {
    const value = fields[key];
    if (key !== "camliVersion" && value !== undefined) {
      sorted[key] = value;
    }
  }
  // JSON.stringify(..., "\t") opens with "{\n"; the version takes its place
  const body = JSON.stringify(sorted, null, "\t").slice(2);
  return `{"camliVersion": ${CAMLI_VERSION},\n${body}\n`;
}

/**
 * Wrap raw bytes as a blob, computing its ref
 */
export function createRawBlob(bytes: Uint8Array, hashName: HashName): RawBlob {
  return { ref: computeRef(bytes, hashName), bytes };
}

/**
 * Encode schema fields into a blob
 */
export function createSchemaBlob(fields: SchemaFields, hashName: HashName): SchemaBlob {
  const text = encodeSchema(fields);
  const bytes = encoder.encode(text);
  return { ref: computeRef(bytes, hashName), bytes, text, fields };
}

// ============================================================================
// Builders
// ============================================================================

/**
 * Static set listing blob refs directly
 */
export function newStaticSet(members: readonly BlobRef[]): SchemaFields {
  return { camliType: SCHEMA_TYPE.STATIC_SET, members: [...members] };
}

/**
 * Static set made of the concatenation of other static sets, in order
 */
export function newMergedStaticSet(subsets: readonly BlobRef[]): SchemaFields {
  return { camliType: SCHEMA_TYPE.STATIC_SET, mergeSets: [...subsets] };
}

/**
 * Directory whose entries are the members of a static set
 */
export function newDirectory(fileName: string, entries: BlobRef): SchemaFields {
  return { camliType: SCHEMA_TYPE.DIRECTORY, fileName, entries };
}

/**
 * Unsigned "haveref" share claim
 */
export function newShareClaim(input: ShareClaimInput): SchemaFields {
  return {
    camliType: SCHEMA_TYPE.CLAIM,
    camliSigner: input.signer,
    claimType: CLAIM_TYPE.SHARE,
    claimDate: formatClaimDate(input.claimDate),
    authType: SHARE_AUTH_TYPE.HAVE_REF,
    target: input.target,
    transitive: input.transitive,
  };
}

/**
 * Claim dates are UTC RFC 3339 timestamps
 */
export function formatClaimDate(date: Date): string {
  return date.toISOString();
}
