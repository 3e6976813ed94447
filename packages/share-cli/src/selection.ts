/**
 * Command-line selection parsing
 */

import type { SelectedItem } from "@blobshare/share";

/**
 * Turn command-line items into selected items. A trailing "/" marks a
 * directory: "sha224-abc/" shares a directory, "sha224-abc" a file.
 */
export function parseSelectionArgs(args: readonly string[]): SelectedItem[] {
  return args.map((arg) => {
    const isDir = arg.endsWith("/");
    return {
      blobRef: isDir ? arg.slice(0, -1) : arg,
      isDir: isDir ? "true" : "false",
    };
  });
}
