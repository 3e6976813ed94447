/**
 * @blobshare/share
 *
 * Shares a selection of blobs through one bearer URL backed by a signed
 * "haveref" claim, without touching the blobs' own access control.
 *
 * Main exports:
 * - ShareAction: selection -> claim -> absolute URL, reported via callbacks
 * - resolveSelection, assembleStaticSet, assembleDirectory, issueShareClaim:
 *   the individual steps
 * - buildShareUrl, resolveUrlPrefix: URL construction
 */

// Action
export { ShareAction } from "./share.ts";

// Steps
export { parseBool, resolveSelection } from "./resolver.ts";
export { assembleStaticSet, chunkRefs } from "./static-set.ts";
export { assembleDirectory, SHARED_DIRECTORY_PREFIX, sharedDirectoryName } from "./directory.ts";
export { issueShareClaim } from "./claim.ts";
export { abbreviateUrl, absoluteShareUrl, buildShareUrl, resolveUrlPrefix } from "./url.ts";

// Configuration
export { parseUiConfig, UiConfigSchema, type UiConfig } from "./config.ts";

// Errors
export {
  ConfigError,
  describeError,
  IdentityError,
  PrefixResolutionError,
  ShareError,
  ShareRootError,
  SigningError,
  UploadError,
  ValidationError,
  type ShareErrorCode,
} from "./errors.ts";

// Types
export type {
  AssembledStaticSet,
  ClaimOptions,
  Clock,
  DirectoryOptions,
  IssuedClaim,
  LocationSource,
  ResolvedItem,
  SelectedItem,
  SelectionSource,
  ShareActionConfig,
  ShareCallbacks,
  ShareResult,
  ShareUrlInput,
  StaticSetOptions,
  UiConfigShareOptions,
} from "./types.ts";
