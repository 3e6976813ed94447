/**
 * Share URLs
 *
 * Directory shares are fetched through the claim alone; file shares name the
 * file and reach it via the claim:
 *   dir:  <shareRoot><claimRef>
 *   file: <shareRoot><targetRef>?via=<claimRef>&assemble=1
 */

import { PrefixResolutionError } from "./errors.ts";
import type { ShareUrlInput } from "./types.ts";

/**
 * Build the server-relative share URL
 */
export function buildShareUrl(input: ShareUrlInput): string {
  if (input.isDir) {
    return `${input.shareRoot}${input.claimRef}`;
  }
  return `${input.shareRoot}${input.targetRef}?via=${input.claimRef}&assemble=1`;
}

/**
 * Find the scheme and host the UI is served from, given the current location
 * and the UI root path
 *
 * @throws PrefixResolutionError when uiRoot does not occur in currentUrl
 */
export function resolveUrlPrefix(currentUrl: string, uiRoot: string): string {
  // An empty UI root is a suffix of every URL: the whole location is the prefix
  if (currentUrl.endsWith(uiRoot)) {
    return currentUrl.slice(0, currentUrl.length - uiRoot.length);
  }
  const index = currentUrl.indexOf(uiRoot);
  if (index === -1) {
    throw new PrefixResolutionError(`Could not guess our URL prefix: ${JSON.stringify(uiRoot)} not in ${currentUrl}`);
  }
  return currentUrl.slice(0, index);
}

/**
 * Resolve a server-relative share URL against the current location
 */
export function absoluteShareUrl(path: string, currentUrl: string, uiRoot: string): string {
  return resolveUrlPrefix(currentUrl, uiRoot) + path;
}

const ANCHOR_EDGE = 20;

/**
 * Shortened form of a long URL for display: first and last 20 characters
 */
export function abbreviateUrl(url: string): string {
  if (url.length <= ANCHOR_EDGE * 2 + 3) {
    return url;
  }
  return `${url.slice(0, ANCHOR_EDGE)}...${url.slice(-ANCHOR_EDGE)}`;
}
