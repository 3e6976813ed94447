/**
 * Blob Client Errors
 */

/**
 * Non-2xx response, or a 2xx response that does not confirm the request
 */
export class BlobServerError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body?: string
  ) {
    super(message);
    this.name = "BlobServerError";
  }
}

/**
 * Server discovery document is missing or lacks a required field
 */
export class DiscoveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DiscoveryError";
  }
}
