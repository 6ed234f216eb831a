/**
 * Table-update guardrail.
 *
 * The content endpoint only replaces tables as a whole; commands that target
 * a single cell, header cell or row leave the table half-updated. They are
 * rejected here, before any resource download or request.
 */

import { TableUpdateError } from "../errors.js";
import type { UpdateCommand } from "./commands.js";

export const TABLE_PART_PREFIXES = ["td:", "th:", "tr:"] as const;

export function isTablePartTarget(target: string): boolean {
  return TABLE_PART_PREFIXES.some((prefix) => target.startsWith(prefix));
}

/** Throws TableUpdateError listing every offending target. */
export function validateTableUpdates(commands: readonly UpdateCommand[]): void {
  const offending = commands.map((c) => c.target).filter(isTablePartTarget);
  if (offending.length > 0) {
    throw new TableUpdateError(offending);
  }
}
