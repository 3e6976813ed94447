/**
 * CLI configuration from environment variables
 *
 *   BLOBSHARE_SERVER           server base URL
 *   BLOBSHARE_AUTH             "none" | "token:<token>" | "userpass:<user>:<password>"
 *   BLOBSHARE_UI_ROOT          web UI path (default: discovered, else "/ui/")
 *   BLOBSHARE_UI_CONFIG        web UI config JSON providing authToken and uiRoot
 *   BLOBSHARE_MAX_SET_MEMBERS  entries per static-set blob (default 10000)
 *   BLOBSHARE_HASH             "sha1" | "sha224" (default "sha224")
 */

import type { BlobClientAuth } from "@blobshare/blob-client";
import { DEFAULT_HASH, DEFAULT_MAX_SET_MEMBERS, HASH_NAMES, type HashName } from "@blobshare/blob-core";
import { ConfigError } from "@blobshare/share";
import { z } from "zod";

export const EnvSchema = z.object({
  BLOBSHARE_SERVER: z.string().url().optional(),
  BLOBSHARE_AUTH: z.string().default("none"),
  BLOBSHARE_UI_ROOT: z.string().min(1).optional(),
  BLOBSHARE_UI_CONFIG: z.string().min(1).optional(),
  BLOBSHARE_MAX_SET_MEMBERS: z.coerce.number().int().min(2).default(DEFAULT_MAX_SET_MEMBERS),
  BLOBSHARE_HASH: z.enum(HASH_NAMES).default(DEFAULT_HASH),
});

/**
 * Web UI path used when neither the environment nor the server names one
 */
export const DEFAULT_UI_ROOT = "/ui/";

export interface CliConfig {
  server?: string;
  auth: BlobClientAuth;
  /** Unset: ask the server */
  uiRoot?: string;
  /** Web UI config document (JSON); its authToken and uiRoot take precedence */
  uiConfig?: string;
  maxSetMembers: number;
  hash: HashName;
}

/**
 * Parse an auth string
 */
export function parseAuth(value: string): BlobClientAuth {
  if (value === "none") {
    return { type: "none" };
  }

  const [mode, ...rest] = value.split(":");
  if (mode === "token" && rest.length > 0 && rest.join(":") !== "") {
    return { type: "token", token: rest.join(":") };
  }
  if (mode === "userpass" && rest.length >= 2) {
    const [username, ...password] = rest;
    if (username) {
      return { type: "userpass", username, password: password.join(":") };
    }
  }
  throw new ConfigError(`Invalid auth ${JSON.stringify(mode)}: expected none, token:<token> or userpass:<user>:<password>`);
}

/**
 * Load CLI configuration from the environment
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): CliConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid environment: ${issues}`);
  }

  return {
    server: result.data.BLOBSHARE_SERVER,
    auth: parseAuth(result.data.BLOBSHARE_AUTH),
    uiRoot: result.data.BLOBSHARE_UI_ROOT,
    uiConfig: result.data.BLOBSHARE_UI_CONFIG,
    maxSetMembers: result.data.BLOBSHARE_MAX_SET_MEMBERS,
    hash: result.data.BLOBSHARE_HASH,
  };
}
