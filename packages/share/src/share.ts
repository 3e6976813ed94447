/**
 * ShareAction - shares the current selection
 *
 * Flow (no back edges; any step failing ends the share):
 *   resolve selection
 *   -> one item:   share it with its own isDir flag
 *   -> many items: static set -> directory, shared as a directory
 *   -> issue claim -> share root -> URL
 *
 * Blobs uploaded before a failure are not deleted. Nothing references them
 * without a claim, so the store's garbage collection reclaims them.
 */

import { HttpBlobClient } from "@blobshare/blob-client";
import { DEFAULT_HASH, type BlobRef, type HashName, type Signer, type StorageClient } from "@blobshare/blob-core";
import { issueShareClaim } from "./claim.ts";
import { parseUiConfig } from "./config.ts";
import { assembleDirectory } from "./directory.ts";
import { describeError, ShareRootError } from "./errors.ts";
import { resolveSelection } from "./resolver.ts";
import { assembleStaticSet } from "./static-set.ts";
import type {
  Clock,
  LocationSource,
  ResolvedItem,
  SelectionSource,
  ShareActionConfig,
  ShareCallbacks,
  ShareResult,
  UiConfigShareOptions,
} from "./types.ts";
import { abbreviateUrl, absoluteShareUrl, buildShareUrl, resolveUrlPrefix } from "./url.ts";

/**
 * ShareAction - one instance per share button
 */
export class ShareAction {
  private selection: SelectionSource;
  private storage: StorageClient;
  private signer: Signer;
  private location: LocationSource;
  private uiRoot: string;
  private callbacks: ShareCallbacks;
  private maxSetMembers?: number;
  private hash: HashName;
  private now: Clock;
  private quiet: boolean;

  constructor(config: ShareActionConfig) {
    this.selection = config.selection;
    this.storage = config.storage;
    this.signer = config.signer;
    this.location = config.location;
    this.uiRoot = config.uiRoot;
    this.callbacks = config.callbacks;
    this.maxSetMembers = config.maxSetMembers;
    this.hash = config.hash ?? DEFAULT_HASH;
    this.now = config.now ?? (() => new Date());
    this.quiet = config.quiet ?? false;
  }

  // ============================================================================
  // Static Factory Methods
  // ============================================================================

  /**
   * Create a ShareAction for the server hosting the web UI, from the UI
   * config the server advertises
   *
   * The server is the prefix of the current location before uiRoot; requests
   * authenticate with the config's authToken.
   *
   * @throws ShareRootError when the server has no share handler
   * @throws ConfigError when the config is malformed
   * @throws PrefixResolutionError when uiRoot is not in the current location
   */
  static fromUiConfig(document: unknown, options: UiConfigShareOptions): ShareAction {
    const { fetch: fetchFn, ...config } = options;
    const uiConfig = parseUiConfig(document);
    const server = resolveUrlPrefix(config.location.href(), uiConfig.uiRoot);
    const client = HttpBlobClient.fromToken(server, uiConfig.authToken, fetchFn);
    return new ShareAction({ ...config, storage: client, signer: client, uiRoot: uiConfig.uiRoot });
  }

  // ============================================================================
  // Entry Points
  // ============================================================================

  /**
   * Share the current selection and report the outcome through the callbacks
   *
   * Share failures are reported with alert and do not reject.
   */
  async trigger(): Promise<void> {
    let result: ShareResult;
    try {
      result = await this.share();
    } catch (error) {
      this.logError("Share failed:", error);
      this.callbacks.alert(describeError(error));
      return;
    }

    let url: string;
    try {
      url = absoluteShareUrl(result.url, this.location.href(), this.uiRoot);
    } catch (error) {
      this.logError("Cannot resolve share URL prefix:", error);
      this.callbacks.alert(`Cannot display full share URL: ${describeError(error)}`);
      return;
    }

    this.callbacks.showSharedUrl(url, abbreviateUrl(url));
  }

  /**
   * Share the current selection
   *
   * @returns The server-relative share URL and everything created for it
   */
  async share(): Promise<ShareResult> {
    const items = resolveSelection(await this.selection.getSelection());
    this.log(`Sharing ${items.length} item(s)`);

    const only = items.length === 1 ? items[0] : undefined;
    if (only) {
      return this.shareTarget(only.ref, only.isDir);
    }

    const assembled = await this.assemble(items);
    const result = await this.shareTarget(assembled.directory.ref, true);
    return { ...result, assembled };
  }

  // ============================================================================
  // Steps
  // ============================================================================

  /**
   * Wrap several items in a new directory
   */
  private async assemble(items: readonly ResolvedItem[]): Promise<NonNullable<ShareResult["assembled"]>> {
    const staticSet = await assembleStaticSet(
      items.map((item) => item.ref),
      { storage: this.storage, maxMembers: this.maxSetMembers, hash: this.hash }
    );
    const directory = await assembleDirectory(staticSet.ref, {
      storage: this.storage,
      hash: this.hash,
      now: this.now,
    });
    this.log(`Created directory ${directory.ref} over ${staticSet.blobs.length} set blob(s)`);
    return { staticSet, directory };
  }

  private async shareTarget(target: BlobRef, isDir: boolean): Promise<ShareResult> {
    const claim = await issueShareClaim(target, {
      storage: this.storage,
      signer: this.signer,
      hash: this.hash,
      now: this.now,
    });

    let shareRoot: string;
    try {
      shareRoot = await this.storage.getShareRootPath();
    } catch (error) {
      throw new ShareRootError(`Could not get share root: ${describeError(error)}`, { cause: error });
    }

    const url = buildShareUrl({ shareRoot, claimRef: claim.ref, targetRef: target, isDir });
    this.log(`Shared ${target} via claim ${claim.ref}`);
    return { url, target, isDir, claim };
  }

  // ============================================================================
  // Logging
  // ============================================================================

  private log(message: string): void {
    if (!this.quiet) {
      console.log(`[Share] ${message}`);
    }
  }

  private logError(message: string, error: unknown): void {
    if (!this.quiet) {
      console.error(`[Share] ${message}`, error);
    }
  }
}
