/**
 * Blob Client Types
 */

// ============================================================================
// Authentication Types
// ============================================================================

/**
 * Authentication against the blob server
 */
export type BlobClientAuth =
  | { type: "none" }
  | { type: "token"; token: string }
  | { type: "userpass"; username: string; password: string };

// ============================================================================
// Client Configuration
// ============================================================================

/**
 * The subset of fetch the client calls
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * HttpBlobClient configuration
 */
export interface HttpBlobClientConfig {
  /** Server base URL: https://blobs.example.com */
  server: string;

  /** Authentication */
  auth: BlobClientAuth;

  /** Fetch implementation (defaults to global fetch) */
  fetch?: FetchFn;
}
