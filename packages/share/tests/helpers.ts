/**
 * Test helpers: in-memory store, deterministic signer, failure injection
 */

import {
  createMemoryBlobStore,
  type FetchFn,
  type MemoryBlobStore,
  type MemoryBlobStoreOptions,
} from "@blobshare/blob-client";
import { mustParseRef, type BlobRef, type RawBlob, type Signer, type StorageClient } from "@blobshare/blob-core";
import { vi } from "vitest";

export const TEST_IDENTITY = mustParseRef("sha1-5e1f");
export const SHARE_ROOT = "/share/";

/** 2024-03-05 07:08:09 UTC */
export const FIXED_DATE = new Date(Date.UTC(2024, 2, 5, 7, 8, 9));
export const fixedClock = (): Date => FIXED_DATE;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function createTestStore(options: MemoryBlobStoreOptions = {}): MemoryBlobStore {
  return createMemoryBlobStore({ identity: TEST_IDENTITY, shareRoot: SHARE_ROOT, ...options });
}

/**
 * Signer appending a fixed signature
 */
export const testSigner: Signer = {
  sign: async (payload: Uint8Array): Promise<Uint8Array> => {
    const unsigned = decoder.decode(payload).trimEnd();
    return encoder.encode(`${unsigned.slice(0, -1)},"camliSig":"test-signature"}\n`);
  },
};

/**
 * Wrap a store so that selected upload calls fail with "disk full"
 */
export function failingUploads(
  store: StorageClient,
  shouldFail: (blob: RawBlob, callIndex: number) => boolean
): StorageClient {
  let calls = 0;
  return {
    upload: async (blob: RawBlob): Promise<BlobRef> => {
      const index = calls++;
      if (shouldFail(blob, index)) {
        throw new Error("disk full");
      }
      return store.upload(blob);
    },
    getServerIdentityRef: () => store.getServerIdentityRef(),
    getShareRootPath: () => store.getShareRootPath(),
  };
}

/**
 * Distinct refs sha1-0000, sha1-0001, ...
 */
export function testRefs(count: number): BlobRef[] {
  return Array.from({ length: count }, (_, i) => mustParseRef(`sha1-${i.toString(16).padStart(4, "0")}`));
}

/**
 * fetch answering discovery, multipart uploads and signing for one server
 */
export function createFakeBlobServer(server: string) {
  const uploaded: string[] = [];
  const json = (body: unknown): Response =>
    new Response(JSON.stringify(body), { headers: { "Content-Type": "application/json" } });

  const fetchFn = vi.fn<FetchFn>(async (url, init) => {
    const route = `${init?.method ?? "GET"} ${url}`;

    if (route === `GET ${server}/`) {
      return json({
        blobRoot: "/bs/",
        shareRoot: SHARE_ROOT,
        signing: { publicKeyBlobRef: TEST_IDENTITY, signHandler: "/sig/sign" },
      });
    }
    if (route === `POST ${server}/bs/camli/upload` && init?.body instanceof FormData) {
      const received: Array<{ blobRef: string; size: number }> = [];
      for (const [name] of init.body.entries()) {
        uploaded.push(name);
        received.push({ blobRef: name, size: 0 });
      }
      return json({ received });
    }
    if (route === `POST ${server}/sig/sign` && init?.body instanceof URLSearchParams) {
      const signed = await testSigner.sign(encoder.encode(init.body.get("json") ?? ""));
      return new Response(decoder.decode(signed));
    }
    return new Response("not found", { status: 404 });
  });

  return { fetchFn, uploaded };
}
