/**
 * Share Types
 */

import type { FetchFn } from "@blobshare/blob-client";
import type { BlobRef, HashName, RawBlob, SchemaBlob, Signer, StorageClient } from "@blobshare/blob-core";

// ============================================================================
// Selection Types
// ============================================================================

/**
 * One selected item as handed over by the UI. Nothing about its shape is
 * trusted; the expected keys are:
 *   "blobRef": "sha224-...",  ref of a file or directory
 *   "isDir":   "true" | "false"
 */
export type SelectedItem = Readonly<Record<string, unknown>>;

/**
 * A validated selected item
 */
export interface ResolvedItem {
  ref: BlobRef;
  isDir: boolean;
}

/**
 * Source of the current selection
 */
export interface SelectionSource {
  /**
   * Current selection, usually a list of SelectedItem, or a promise of it.
   * The result is validated before use.
   */
  getSelection(): unknown;
}

// ============================================================================
// Environment Types
// ============================================================================

/**
 * Source of the current page location (e.g. window.location.href)
 */
export interface LocationSource {
  href(): string;
}

/**
 * Clock used for directory names and claim dates
 */
export type Clock = () => Date;

/**
 * Where share outcomes are reported
 */
export interface ShareCallbacks {
  /** Display the share URL, e.g. as an anchor in a dialog */
  showSharedUrl(url: string, anchorText: string): void;
  /** Display a failure */
  alert(message: string): void;
}

// ============================================================================
// Step Types
// ============================================================================

/**
 * Static set assembly options
 */
export interface StaticSetOptions {
  storage: StorageClient;
  /** Maximum entries per set blob (>= 2) */
  maxMembers?: number;
  hash?: HashName;
}

/**
 * Result of static set assembly
 */
export interface AssembledStaticSet {
  /** Top-level set */
  ref: BlobRef;
  /** Every uploaded set blob, the top-level set last */
  blobs: SchemaBlob[];
  /** Number of set levels (1 when no split was needed) */
  depth: number;
}

/**
 * Directory assembly options
 */
export interface DirectoryOptions {
  storage: StorageClient;
  hash?: HashName;
  now?: Clock;
}

/**
 * Claim issuance options
 */
export interface ClaimOptions {
  storage: StorageClient;
  signer: Signer;
  hash?: HashName;
  now?: Clock;
}

/**
 * An uploaded share claim
 */
export interface IssuedClaim {
  /** Ref of the signed claim blob */
  ref: BlobRef;
  /** Signer identity written into the claim */
  signer: BlobRef;
  /** The signed claim blob */
  blob: RawBlob;
}

/**
 * Share URL inputs
 */
export interface ShareUrlInput {
  shareRoot: string;
  claimRef: BlobRef;
  targetRef: BlobRef;
  isDir: boolean;
}

// ============================================================================
// Share Action Types
// ============================================================================

/**
 * ShareAction configuration
 */
export interface ShareActionConfig {
  selection: SelectionSource;
  storage: StorageClient;
  signer: Signer;
  location: LocationSource;
  /** Path of the web UI, used to find the server prefix in the location */
  uiRoot: string;
  callbacks: ShareCallbacks;
  /** Maximum entries per static-set blob */
  maxSetMembers?: number;
  hash?: HashName;
  now?: Clock;
  /** Suppress progress logging */
  quiet?: boolean;
}

/**
 * ShareAction configuration when the server's web UI config provides the
 * credentials and the UI root
 */
export type UiConfigShareOptions = Omit<ShareActionConfig, "storage" | "signer" | "uiRoot"> & {
  /** fetch used by the blob server client */
  fetch?: FetchFn;
};

/**
 * Result of a successful share
 */
export interface ShareResult {
  /** Share URL relative to the server */
  url: string;
  /** Shared blob: the selected item, or the assembled directory */
  target: BlobRef;
  /** Whether target is a directory */
  isDir: boolean;
  claim: IssuedClaim;
  /** Present when several items were assembled into a directory */
  assembled?: {
    staticSet: AssembledStaticSet;
    directory: SchemaBlob;
  };
}
