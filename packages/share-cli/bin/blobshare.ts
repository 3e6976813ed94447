#!/usr/bin/env -S node --import tsx
/**
 * blobshare CLI
 *
 * Usage:
 *   blobshare share <items...>        Share blobs, print the share URL
 *   blobshare parse-config <json>     Check a web UI config document
 */

import { describeError } from "@blobshare/share";
import chalk from "chalk";
import { Command } from "commander";
import { loadConfig, parseAuth, type CliConfig } from "../src/config.ts";
import { runParseConfig, runShare } from "../src/run.ts";

interface ShareCommandOptions {
  server?: string;
  auth?: string;
  uiRoot?: string;
  uiConfig?: string;
  maxSetMembers?: string;
}

const program = new Command();

program.name("blobshare").description("Share content-addressed blobs through signed claims").version("0.1.0");

// share command
program
  .command("share")
  .description("Share one or more blobs; a trailing / marks a directory")
  .argument("<items...>", "blob refs to share")
  .option("-s, --server <url>", "Blob server base URL")
  .option("-a, --auth <auth>", "none, token:<token> or userpass:<user>:<password>")
  .option("--ui-root <path>", "Web UI path on the server")
  .option("--ui-config <json>", "Web UI config document providing authToken and uiRoot")
  .option("--max-set-members <n>", "Maximum entries per static-set blob")
  .action(async (items: string[], options: ShareCommandOptions) => {
    let config: CliConfig;
    try {
      config = loadConfig({
        ...process.env,
        BLOBSHARE_SERVER: options.server ?? process.env.BLOBSHARE_SERVER,
        BLOBSHARE_UI_ROOT: options.uiRoot ?? process.env.BLOBSHARE_UI_ROOT,
        BLOBSHARE_UI_CONFIG: options.uiConfig ?? process.env.BLOBSHARE_UI_CONFIG,
        BLOBSHARE_MAX_SET_MEMBERS: options.maxSetMembers ?? process.env.BLOBSHARE_MAX_SET_MEMBERS,
      });
      if (options.auth) {
        config.auth = parseAuth(options.auth);
      }
    } catch (error) {
      console.error(chalk.red(`[CLI] ${describeError(error)}`));
      process.exit(1);
    }
    process.exit(await runShare(items, config));
  });

// parse-config command
program
  .command("parse-config")
  .description("Validate a web UI config JSON document for sharing")
  .argument("<json>", "config document")
  .action((json: string) => {
    process.exit(runParseConfig(json));
  });

await program.parseAsync(process.argv);
