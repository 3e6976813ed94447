/**
 * Share Errors
 *
 * Every step throws one of these; only ShareAction reports them to the user.
 */

export type ShareErrorCode =
  | "VALIDATION"
  | "IDENTITY"
  | "SIGNING"
  | "UPLOAD"
  | "SHARE_ROOT"
  | "PREFIX_RESOLUTION"
  | "CONFIG";

/**
 * Base class of all share failures
 */
export class ShareError extends Error {
  constructor(
    message: string,
    public readonly code: ShareErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ShareError";
  }
}

/**
 * Malformed or missing selection fields. The message is shown to the user as is.
 */
export class ValidationError extends ShareError {
  constructor(message: string) {
    super(message, "VALIDATION");
    this.name = "ValidationError";
  }
}

/**
 * The signer identity could not be retrieved
 */
export class IdentityError extends ShareError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "IDENTITY", options);
    this.name = "IdentityError";
  }
}

/**
 * The signing service failed
 */
export class SigningError extends ShareError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "SIGNING", options);
    this.name = "SigningError";
  }
}

/**
 * A set, directory or claim blob could not be uploaded
 */
export class UploadError extends ShareError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "UPLOAD", options);
    this.name = "UploadError";
  }
}

/**
 * The server has no share handler, or its path could not be retrieved
 */
export class ShareRootError extends ShareError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "SHARE_ROOT", options);
    this.name = "ShareRootError";
  }
}

/**
 * The UI root does not occur in the current location.
 * The share itself may have succeeded.
 */
export class PrefixResolutionError extends ShareError {
  constructor(message: string) {
    super(message, "PREFIX_RESOLUTION");
    this.name = "PrefixResolutionError";
  }
}

/**
 * Invalid configuration
 */
export class ConfigError extends ShareError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
