/**
 * Server discovery document
 *
 * Fetched once per client from the server root with
 * "Accept: text/x-camli-configuration".
 */

import { BlobRefSchema } from "@blobshare/blob-core";
import { z } from "zod";

export const DISCOVERY_CONTENT_TYPE = "text/x-camli-configuration";

export const SigningDiscoverySchema = z.object({
  /** Ref of the server's public key blob */
  publicKeyBlobRef: BlobRefSchema,
  /** Path of the JSON signing handler */
  signHandler: z.string().min(1),
});

export const DiscoverySchema = z.object({
  /** Path prefix of the blob handler, e.g. "/bs/" */
  blobRoot: z.string().min(1),
  /** Path prefix of the share handler, empty when sharing is disabled */
  shareRoot: z.string().optional().default(""),
  /** Path prefix of the web UI */
  uiRoot: z.string().optional().default(""),
  /** Absent when the server has no signing identity */
  signing: SigningDiscoverySchema.optional(),
});

export type Discovery = z.infer<typeof DiscoverySchema>;
export type SigningDiscovery = z.infer<typeof SigningDiscoverySchema>;

/**
 * Response of the multipart upload handler
 */
export const UploadResponseSchema = z.object({
  received: z
    .array(
      z.object({
        blobRef: z.string(),
        size: z.number().int().nonnegative(),
      })
    )
    .default([]),
  errorText: z.string().optional(),
});

export type UploadResponse = z.infer<typeof UploadResponseSchema>;
