/**
 * HttpBlobClient - blob server access over HTTP
 *
 * Implements both collaborators of the sharing protocol against one server:
 * - StorageClient: multipart blob upload, signer identity and share root
 *   from the discovery document
 * - Signer: the server's JSON signing handler
 */

import { parseRef, type BlobRef, type RawBlob, type Signer, type StorageClient } from "@blobshare/blob-core";
import { DISCOVERY_CONTENT_TYPE, DiscoverySchema, UploadResponseSchema, type Discovery } from "./discovery.ts";
import { BlobServerError, DiscoveryError } from "./errors.ts";
import type { BlobClientAuth, FetchFn, HttpBlobClientConfig } from "./types.ts";

/**
 * HttpBlobClient - operations on a single blob server
 */
export class HttpBlobClient implements StorageClient, Signer {
  private server: string;
  private auth: BlobClientAuth;
  private fetchFn: FetchFn;
  private discovery?: Promise<Discovery>;

  constructor(config: HttpBlobClientConfig) {
    this.server = config.server.replace(/\/$/, "");
    this.auth = config.auth;
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
  }

  // ============================================================================
  // Static Factory Methods
  // ============================================================================

  static fromToken(server: string, token: string, fetchFn?: FetchFn): HttpBlobClient {
    return new HttpBlobClient({ server, auth: { type: "token", token }, fetch: fetchFn });
  }

  static anonymous(server: string): HttpBlobClient {
    return new HttpBlobClient({ server, auth: { type: "none" } });
  }

  // ============================================================================
  // Configuration
  // ============================================================================

  /**
   * Get the server base URL
   */
  getServer(): string {
    return this.server;
  }

  /**
   * Get the discovery document (fetched once, then shared by all callers)
   */
  async discover(): Promise<Discovery> {
    if (!this.discovery) {
      // A failed discovery is retried on the next call
      this.discovery = this.fetchDiscovery().catch((error: unknown) => {
        this.discovery = undefined;
        throw error;
      });
    }
    return this.discovery;
  }

  private async fetchDiscovery(): Promise<Discovery> {
    const res = await this.fetch("/", { headers: { Accept: DISCOVERY_CONTENT_TYPE } });
    if (!res.ok) {
      throw new BlobServerError(`Failed to discover server: ${res.status}`, res.status, await res.text());
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (error) {
      throw new DiscoveryError("Discovery response is not JSON", { cause: error });
    }

    const result = DiscoverySchema.safeParse(body);
    if (!result.success) {
      throw new DiscoveryError(`Invalid discovery document: ${result.error.issues[0]?.message ?? "unknown"}`);
    }
    return result.data;
  }

  // ============================================================================
  // StorageClient
  // ============================================================================

  /**
   * Upload a blob through the multipart upload handler
   */
  async upload(blob: RawBlob): Promise<BlobRef> {
    const { blobRoot } = await this.discover();

    const form = new FormData();
    form.append(blob.ref, new Blob([new Uint8Array(blob.bytes)]), blob.ref);

    const res = await this.fetch(`${blobRoot}camli/upload`, {
      method: "POST",
      body: form,
    });
    if (!res.ok) {
      throw new BlobServerError(`Failed to upload ${blob.ref}: ${res.status}`, res.status, await res.text());
    }

    const parsed = UploadResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new BlobServerError(`Malformed upload response for ${blob.ref}`, res.status);
    }

    const received = parsed.data.received.find((entry) => entry.blobRef === blob.ref);
    const ref = received ? parseRef(received.blobRef) : null;
    if (!ref) {
      const reason = parsed.data.errorText ?? "blob not in received list";
      throw new BlobServerError(`Server did not store ${blob.ref}: ${reason}`, res.status);
    }
    return ref;
  }

  /**
   * Ref of the server's public key blob
   */
  async getServerIdentityRef(): Promise<BlobRef> {
    const { signing } = await this.discover();
    if (!signing) {
      throw new DiscoveryError("Server has no signing identity");
    }
    return signing.publicKeyBlobRef;
  }

  /**
   * Path prefix of the server's share handler
   */
  async getShareRootPath(): Promise<string> {
    const { shareRoot } = await this.discover();
    if (!shareRoot) {
      throw new DiscoveryError("Server has no share handler");
    }
    return shareRoot;
  }

  /**
   * Path prefix of the server's web UI, empty when the server does not say
   */
  async getUiRootPath(): Promise<string> {
    const { uiRoot } = await this.discover();
    return uiRoot;
  }

  // ============================================================================
  // Signer
  // ============================================================================

  /**
   * Sign an unsigned schema blob with the server's identity
   */
  async sign(payload: Uint8Array): Promise<Uint8Array> {
    const { signing } = await this.discover();
    if (!signing) {
      throw new DiscoveryError("Server has no signing handler");
    }

    const res = await this.fetch(signing.signHandler, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({ json: new TextDecoder().decode(payload) }),
    });
    if (!res.ok) {
      throw new BlobServerError(`Failed to sign: ${res.status}`, res.status, await res.text());
    }
    return new Uint8Array(await res.arrayBuffer());
  }

  // ============================================================================
  // HTTP Helpers
  // ============================================================================

  private async fetch(path: string, init?: RequestInit): Promise<Response> {
    const headers = new Headers(init?.headers);
    const authorization = this.getAuthHeader();
    if (authorization) {
      headers.set("Authorization", authorization);
    }
    return this.fetchFn(`${this.server}${path}`, { ...init, headers });
  }

  private getAuthHeader(): string | undefined {
    switch (this.auth.type) {
      case "none":
        return undefined;
      case "token":
        return `Token ${this.auth.token}`;
      case "userpass":
        return `Basic ${btoa(`${this.auth.username}:${this.auth.password}`)}`;
    }
  }
}
