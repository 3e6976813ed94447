/**
 * Schema blob decoding and validation
 */

import { z } from "zod";
import { CAMLI_VERSION, CLAIM_TYPE, SCHEMA_TYPE, SHARE_AUTH_TYPE } from "./constants.ts";
import { BlobRefSchema } from "./ref.ts";

// ============================================================================
// Errors
// ============================================================================

/**
 * Thrown when blob bytes are not the expected schema blob
 */
export class SchemaDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SchemaDecodeError";
  }
}

// ============================================================================
// Schemas
// ============================================================================

const VersionSchema = z.literal(CAMLI_VERSION);

export const StaticSetSchema = z
  .object({
    camliVersion: VersionSchema,
    camliType: z.literal(SCHEMA_TYPE.STATIC_SET),
    members: z.array(BlobRefSchema).optional(),
    mergeSets: z.array(BlobRefSchema).optional(),
  })
  .refine((set) => (set.members === undefined) !== (set.mergeSets === undefined), {
    message: "A static set has either members or mergeSets",
  });
export type StaticSet = z.infer<typeof StaticSetSchema>;

export const DirectorySchema = z.object({
  camliVersion: VersionSchema,
  camliType: z.literal(SCHEMA_TYPE.DIRECTORY),
  fileName: z.string().min(1),
  entries: BlobRefSchema,
});
export type Directory = z.infer<typeof DirectorySchema>;

export const ShareClaimSchema = z.object({
  camliVersion: VersionSchema,
  camliType: z.literal(SCHEMA_TYPE.CLAIM),
  claimType: z.literal(CLAIM_TYPE.SHARE),
  authType: z.literal(SHARE_AUTH_TYPE.HAVE_REF),
  camliSigner: BlobRefSchema,
  claimDate: z.string().datetime(),
  target: BlobRefSchema,
  transitive: z.boolean(),
  camliSig: z.string().optional(),
});
export type ShareClaim = z.infer<typeof ShareClaimSchema>;

export const PublicKeySchema = z.object({
  camliVersion: VersionSchema,
  camliType: z.literal(SCHEMA_TYPE.PUBLIC_KEY),
  kty: z.literal("EC"),
  crv: z.literal("P-256"),
  x: z.string().min(1),
  y: z.string().min(1),
});
export type PublicKey = z.infer<typeof PublicKeySchema>;

// ============================================================================
// Decoding
// ============================================================================

const decoder = new TextDecoder();

/**
 * Parse blob bytes as JSON
 */
export function decodeJson(bytes: Uint8Array): unknown {
  try {
    return JSON.parse(decoder.decode(bytes));
  } catch (error) {
    throw new SchemaDecodeError("Blob is not a JSON schema blob", { cause: error });
  }
}

/**
 * Decode blob bytes against a schema
 */
export function decodeSchemaBlob<T extends z.ZodTypeAny>(schema: T, bytes: Uint8Array): z.infer<T> {
  const result = schema.safeParse(decodeJson(bytes));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SchemaDecodeError(`Invalid schema blob: ${issues}`);
  }
  return result.data;
}
