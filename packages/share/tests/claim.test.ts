/**
 * Share claim tests
 */

import { computeRef, mustParseRef, type Signer } from "@blobshare/blob-core";
import { describe, expect, it, vi } from "vitest";
import { issueShareClaim } from "../src/claim.ts";
import { IdentityError, SigningError, UploadError } from "../src/errors.ts";
import { createTestStore, failingUploads, fixedClock, testSigner } from "./helpers.ts";

const TARGET = mustParseRef("sha1-aaa");
const decoder = new TextDecoder();

const SIGNED_CLAIM =
  '{"camliVersion": 1,\n' +
  '\t"authType": "haveref",\n' +
  '\t"camliSigner": "sha1-5e1f",\n' +
  '\t"camliType": "claim",\n' +
  '\t"claimDate": "2024-03-05T07:08:09.000Z",\n' +
  '\t"claimType": "share",\n' +
  '\t"target": "sha1-aaa",\n' +
  '\t"transitive": true\n' +
  ',"camliSig":"test-signature"}\n';

describe("issueShareClaim", () => {
  it("should sign and upload a transitive haveref claim", async () => {
    const store = createTestStore();

    const claim = await issueShareClaim(TARGET, { storage: store, signer: testSigner, now: fixedClock });

    expect(claim.signer).toBe("sha1-5e1f");
    expect(decoder.decode(claim.blob.bytes)).toBe(SIGNED_CLAIM);
    expect(claim.ref).toBe(computeRef(claim.blob.bytes, "sha224"));
    expect(store.keys()).toEqual([claim.ref]);
  });

  it("should run identity, signing and upload in order", async () => {
    const store = createTestStore();
    const calls: string[] = [];
    const storage = {
      upload: vi.fn(async (blob: Parameters<typeof store.upload>[0]) => {
        calls.push("upload");
        return store.upload(blob);
      }),
      getServerIdentityRef: vi.fn(async () => {
        calls.push("identity");
        return store.getServerIdentityRef();
      }),
      getShareRootPath: vi.fn(async () => store.getShareRootPath()),
    };
    const signer: Signer = {
      sign: async (payload) => {
        calls.push("sign");
        return testSigner.sign(payload);
      },
    };

    await issueShareClaim(TARGET, { storage, signer, now: fixedClock });

    expect(calls).toEqual(["identity", "sign", "upload"]);
    expect(storage.getShareRootPath).not.toHaveBeenCalled();
  });

  it("should fail with IdentityError without signing", async () => {
    const sign = vi.fn(testSigner.sign);

    const error = await issueShareClaim(TARGET, {
      storage: createTestStore({ identity: undefined }),
      signer: { sign },
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IdentityError);
    expect(error).toHaveProperty("message", "Could not get signer: Store has no signing identity");
    expect(sign).not.toHaveBeenCalled();
  });

  it("should fail with SigningError without uploading", async () => {
    const store = createTestStore();
    const signer: Signer = {
      sign: async () => {
        throw new Error("signer offline");
      },
    };

    const error = await issueShareClaim(TARGET, { storage: store, signer }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SigningError);
    expect(error).toHaveProperty("message", "Could not get signed share claim: signer offline");
    expect(store.uploads()).toEqual([]);
  });

  it("should fail with UploadError when the claim is not stored", async () => {
    const storage = failingUploads(createTestStore(), () => true);

    const error = await issueShareClaim(TARGET, { storage, signer: testSigner }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UploadError);
    expect(error).toHaveProperty("message", "Could not upload share claim: disk full");
  });
});
