/**
 * Embedded page resources ("page items"): images and attached files that
 * page HTML references through .../resources/{id}/$value URLs.
 */

import type { GraphConfig } from "../config.js";
import { ensureSuccess, type Transport } from "../graph/transport.js";
import { extractPageItemId, sanitizeId } from "../graph/sanitize.js";
import { attributeMap, parsePageHtml, resourceTag, urlAttribute, type ResourceTag } from "./html.js";

export interface PageItemInfo {
  tagName: ResourceTag;
  pageItemId: string;
  attributes: Record<string, string>;
  originalUrl: string;
}

export interface PageItemData {
  contentType: string;
  filename: string;
  size: number;
  content: Buffer;
  tagName: ResourceTag;
  attributes: Record<string, string>;
  originalUrl: string;
}

export interface PageItemSummary {
  pageItemId: string;
  tagName: ResourceTag;
  type: "image" | "attachment" | "object";
  mimeType?: string;
  dataAttachment?: string;
}

/** HTML metadata the caller already has for the resource, if any. */
export type FetchResourceFn = (pageId: string, resourceId: string, info?: PageItemInfo) => Promise<PageItemData>;

const DEFAULT_CONTENT_TYPE = "application/octet-stream";

const EXTENSIONS: ReadonlyArray<readonly [string, string]> = [
  ["image/jpeg", ".jpg"],
  ["image/png", ".png"],
  ["image/gif", ".gif"],
  ["image/bmp", ".bmp"],
  ["image/webp", ".webp"],
  ["image/svg", ".svg"],
  ["application/pdf", ".pdf"],
  ["text/plain", ".txt"],
  ["text/html", ".html"],
  ["application/json", ".json"],
  ["application/xml", ".xml"],
  ["application/zip", ".zip"],
  ["application/vnd.openxmlformats-officedocument.wordprocessingml", ".docx"],
  ["application/vnd.openxmlformats-officedocument.spreadsheetml", ".xlsx"],
  ["application/vnd.openxmlformats-officedocument.presentationml", ".pptx"],
];

export function extensionFor(contentType: string): string {
  const type = contentType.toLowerCase();
  for (const [prefix, ext] of EXTENSIONS) {
    if (type.startsWith(prefix)) return ext;
  }
  return ".bin";
}

/**
 * Every img[src] / object[data] in the page whose URL carries a resource
 * id, in document order.
 */
export function findPageItems(html: string): PageItemInfo[] {
  const items: PageItemInfo[] = [];
  for (const element of parsePageHtml(html).resourceElements()) {
    const tag = resourceTag(element);
    if (!tag) continue;
    const url = element.getAttribute(urlAttribute(tag)) ?? "";
    const pageItemId = extractPageItemId(url);
    if (!pageItemId) continue;
    items.push({ tagName: tag, pageItemId, attributes: attributeMap(element), originalUrl: url });
  }
  return items;
}

export function summarizePageItem(info: PageItemInfo): PageItemSummary {
  const attachment = info.attributes["data-attachment"];
  let type: PageItemSummary["type"] = "image";
  if (info.tagName === "object") {
    type = attachment === "true" ? "attachment" : "object";
  }

  const mimeType =
    info.attributes["data-src-type"] || (info.tagName === "object" ? info.attributes.type : undefined);

  return {
    pageItemId: info.pageItemId,
    tagName: info.tagName,
    type,
    ...(mimeType ? { mimeType } : {}),
    ...(attachment !== undefined ? { dataAttachment: attachment } : {}),
  };
}

function contentTypeFromMetadata(info: PageItemInfo | undefined): string | undefined {
  if (!info) return undefined;
  if (info.tagName === "object" && info.attributes.type) return info.attributes.type;
  return info.attributes["data-src-type"] || undefined;
}

export function createResourceFetcher(transport: Transport, graph: Pick<GraphConfig, "base_url">): FetchResourceFn {
  return async (pageId, resourceId, info) => {
    sanitizeId(pageId, "pageID");
    const id = sanitizeId(resourceId, "pageItemID");

    const url = `${graph.base_url}/me/onenote/resources/${id}/$value`;
    const response = await transport.request("GET", url);
    ensureSuccess(response, "GetPageItem");

    const contentType = contentTypeFromMetadata(info) || response.headers["content-type"] || DEFAULT_CONTENT_TYPE;
    console.debug(`[pages] fetched page item ${id} (${contentType}, ${response.body.length} bytes)`);

    return {
      contentType,
      filename: `${id}${extensionFor(contentType)}`,
      size: response.body.length,
      content: response.body,
      tagName: info?.tagName ?? "img",
      attributes: info?.attributes ?? {},
      originalUrl: info?.originalUrl ?? url,
    };
  };
}
