/**
 * Share claim issuance
 *
 * Three sequential steps against the store and the signing service:
 * 1. Look up the signer identity
 * 2. Sign the unsigned "haveref" claim
 * 3. Upload the signed claim
 */

import {
  createRawBlob,
  createSchemaBlob,
  DEFAULT_HASH,
  newShareClaim,
  type BlobRef,
} from "@blobshare/blob-core";
import { describeError, IdentityError, SigningError, UploadError } from "./errors.ts";
import type { ClaimOptions, IssuedClaim } from "./types.ts";

/**
 * Create, sign and upload a transitive "haveref" share claim for target
 */
export async function issueShareClaim(target: BlobRef, options: ClaimOptions): Promise<IssuedClaim> {
  const hash = options.hash ?? DEFAULT_HASH;
  const now = options.now ?? (() => new Date());

  let signer: BlobRef;
  try {
    signer = await options.storage.getServerIdentityRef();
  } catch (error) {
    throw new IdentityError(`Could not get signer: ${describeError(error)}`, { cause: error });
  }

  const unsigned = createSchemaBlob(newShareClaim({ signer, target, transitive: true, claimDate: now() }), hash);

  let signed: Uint8Array;
  try {
    signed = await options.signer.sign(unsigned.bytes);
  } catch (error) {
    throw new SigningError(`Could not get signed share claim: ${describeError(error)}`, { cause: error });
  }

  const blob = createRawBlob(signed, hash);
  let ref: BlobRef;
  try {
    ref = await options.storage.upload(blob);
  } catch (error) {
    throw new UploadError(`Could not upload share claim: ${describeError(error)}`, { cause: error });
  }

  return { ref, signer, blob };
}
