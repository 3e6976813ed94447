/**
 * Web UI configuration
 *
 * The server advertises a flat string map to its web UI. Sharing needs three
 * of its keys: shareRoot (absent or empty when the server has no share
 * handler), authToken and uiRoot.
 */

import { z } from "zod";
import { ConfigError, ShareRootError } from "./errors.ts";

export const UiConfigSchema = z.object({
  shareRoot: z.string().optional(),
  authToken: z.string({ required_error: "authToken is required" }),
  uiRoot: z.string({ required_error: "uiRoot is required" }),
});

export interface UiConfig {
  shareRoot: string;
  authToken: string;
  uiRoot: string;
}

/**
 * Validate the web UI config for sharing
 *
 * @throws ShareRootError when the server has no share handler
 * @throws ConfigError when a required key is missing
 */
export function parseUiConfig(config: unknown): UiConfig {
  const result = UiConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message).join("; ");
    throw new ConfigError(`Invalid web UI config: ${issues}`);
  }

  const { shareRoot, authToken, uiRoot } = result.data;
  if (!shareRoot) {
    throw new ShareRootError("Server has no share handler");
  }
  return { shareRoot, authToken, uiRoot };
}
