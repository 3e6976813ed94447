/**
 * CLI commands
 */

import { HttpBlobClient, type FetchFn } from "@blobshare/blob-client";
import { ConfigError, describeError, parseUiConfig, ShareAction } from "@blobshare/share";
import chalk from "chalk";
import { DEFAULT_UI_ROOT, type CliConfig } from "./config.ts";
import { parseSelectionArgs } from "./selection.ts";

/**
 * Output streams of a command
 */
export interface CommandIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const consoleIO: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(chalk.red(line)),
};

/**
 * Share items on the configured server and print the absolute share URL
 *
 * With a web UI config, its authToken authenticates the requests and its
 * uiRoot locates the UI. Otherwise the configured auth is used, with the UI
 * root from the environment, the server or the default, in that order.
 *
 * @returns Process exit code
 */
export async function runShare(
  items: readonly string[],
  config: CliConfig,
  io: CommandIO = consoleIO,
  fetchFn?: FetchFn
): Promise<number> {
  const server = config.server;
  if (!server) {
    io.err("[CLI] No server configured: pass --server or set BLOBSHARE_SERVER");
    return 1;
  }

  let sharedUrl: string | undefined;
  let failure: string | undefined;
  const options = {
    selection: { getSelection: () => parseSelectionArgs(items) },
    callbacks: {
      showSharedUrl: (url: string) => {
        sharedUrl = url;
      },
      alert: (message: string) => {
        failure = message;
      },
    },
    maxSetMembers: config.maxSetMembers,
    hash: config.hash,
    quiet: true,
  };

  let action: ShareAction;
  try {
    if (config.uiConfig !== undefined) {
      const document = parseJson(config.uiConfig);
      const { uiRoot } = parseUiConfig(document);
      // The CLI has no page location; the UI would be served under the server URL
      const location = { href: () => `${server.replace(/\/$/, "")}${uiRoot}` };
      action = ShareAction.fromUiConfig(document, { ...options, location, fetch: fetchFn });
    } else {
      const client = new HttpBlobClient({ server, auth: config.auth, fetch: fetchFn });
      const uiRoot = config.uiRoot ?? ((await client.getUiRootPath()) || DEFAULT_UI_ROOT);
      const location = { href: () => `${client.getServer()}${uiRoot}` };
      action = new ShareAction({ ...options, storage: client, signer: client, location, uiRoot });
    }
  } catch (error) {
    io.err(`[CLI] ${describeError(error)}`);
    return 1;
  }

  await action.trigger();

  if (sharedUrl === undefined) {
    io.err(`[CLI] ${failure ?? "Share failed"}`);
    return 1;
  }
  io.out(sharedUrl);
  return 0;
}

/**
 * Validate a web UI config document and print its sharing fields
 *
 * @returns Process exit code
 */
export function runParseConfig(json: string, io: CommandIO = consoleIO): number {
  try {
    const config = parseUiConfig(parseJson(json));
    io.out(`shareRoot: ${config.shareRoot}`);
    io.out(`uiRoot: ${config.uiRoot}`);
    io.out(`authToken: ${config.authToken ? "(set)" : "(empty)"}`);
    return 0;
  } catch (error) {
    io.err(`[CLI] ${describeError(error)}`);
    return 1;
  }
}

function parseJson(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch (error) {
    throw new ConfigError("Config is not valid JSON", { cause: error });
  }
}
