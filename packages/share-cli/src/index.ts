/**
 * @blobshare/share-cli
 */

export { DEFAULT_UI_ROOT, EnvSchema, loadConfig, parseAuth, type CliConfig } from "./config.ts";
export { consoleIO, runParseConfig, runShare, type CommandIO } from "./run.ts";
export { parseSelectionArgs } from "./selection.ts";
