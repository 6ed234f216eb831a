/**
 * Opaque identifier validation and URL id extraction.
 *
 * Graph assigns OneNote ids such as "0-4D24C77F19546939!40109": alphanumerics,
 * hyphens and exclamation marks only. Every id is checked against that
 * grammar before it is interpolated into a request URL.
 */

import { ValidationError } from "../errors.js";

const MAX_ID_LENGTH = 100;
const ID_PATTERN = /^[A-Za-z0-9\-!]+$/;

const PAGE_ITEM_ID_RE = /\/resources\/([A-Za-z0-9\-!]+)\/\$value/;
const PAGE_ID_RE = /\/onenote\/pages\/([A-Za-z0-9\-!]+)/;

/**
 * Trim and validate an id. `label` names the id in the error message
 * (e.g. "pageID", "targetSectionID").
 */
export function sanitizeId(raw: string, label: string): string {
  const id = raw.trim();
  if (!id) {
    throw new ValidationError(`${label} cannot be empty`);
  }
  if (id.length > MAX_ID_LENGTH) {
    throw new ValidationError(`${label} is too long`);
  }
  if (!ID_PATTERN.test(id)) {
    throw new ValidationError(`${label} contains invalid characters`);
  }
  return id;
}

/**
 * Pull the resource id out of a resource download URL, either the Graph form
 * (.../onenote/resources/{id}/$value) or the legacy onenote.com one.
 * Returns "" when the URL does not have that shape.
 */
export function extractPageItemId(url: string): string {
  const match = PAGE_ITEM_ID_RE.exec(url);
  return match ? match[1] : "";
}

/**
 * Pull the page id out of an operation's resourceLocation URL.
 * Returns "" when the URL does not point at a page.
 */
export function extractPageIdFromLocation(url: string): string {
  const match = PAGE_ID_RE.exec(url);
  return match ? match[1] : "";
}
