/**
 * Selection resolution
 */

import { parseRef } from "@blobshare/blob-core";
import { ValidationError } from "./errors.ts";
import type { ResolvedItem, SelectedItem } from "./types.ts";

const TRUE_VALUES = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_VALUES = new Set(["0", "f", "F", "FALSE", "false", "False"]);

/**
 * Parse a boolean flag, null when the value is not a boolean spelling
 */
export function parseBool(value: unknown): boolean | null {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return null;
  }
  if (TRUE_VALUES.has(value)) {
    return true;
  }
  if (FALSE_VALUES.has(value)) {
    return false;
  }
  return null;
}

const isItem = (value: unknown): value is SelectedItem => typeof value === "object" && value !== null;

/**
 * Validate selected items into refs with directory flags, keeping their order
 *
 * The selection comes from the UI and is checked down to its shape.
 *
 * @throws ValidationError on an empty selection or a malformed item
 */
export function resolveSelection(items: unknown): ResolvedItem[] {
  if (!Array.isArray(items)) {
    throw new ValidationError("Cannot share selection, it's not a list of items");
  }
  if (items.length === 0) {
    throw new ValidationError("Nothing selected to share");
  }

  return items.map((item: unknown) => {
    if (!isItem(item) || Array.isArray(item)) {
      throw new ValidationError(`Cannot share ${JSON.stringify(item) ?? String(item)}, it's not an item`);
    }

    const blobRef = item["blobRef"];
    if (blobRef === undefined) {
      throw new ValidationError("Cannot share item, it's missing a blobRef");
    }
    const ref = typeof blobRef === "string" ? parseRef(blobRef) : null;
    if (!ref) {
      throw new ValidationError(`Cannot share ${JSON.stringify(blobRef)}, not a valid blobRef`);
    }

    const rawIsDir = item["isDir"];
    if (rawIsDir === undefined) {
      throw new ValidationError(`Cannot share ${ref}, it's missing isDir`);
    }
    const isDir = parseBool(rawIsDir);
    if (isDir === null) {
      throw new ValidationError(`Invalid boolean value ${JSON.stringify(rawIsDir)} for isDir`);
    }

    return { ref, isDir };
  });
}
