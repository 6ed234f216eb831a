/**
 * Embedded-resource rewriter.
 *
 * The content endpoint cannot take references to existing resources; the
 * bytes have to travel in the same multipart request. Each img/object whose
 * URL points at a page resource is downloaded and its reference replaced by
 * `name:partK`, the multipart field carrying the bytes.
 *
 * Runs in three steps over a call-private tree: collect candidates, fetch
 * them in document order, apply the rewrite plan and render.
 */

import { errorMessage } from "../errors.js";
import { extractPageItemId } from "../graph/sanitize.js";
import {
  attributeMap,
  parsePageHtml,
  resourceTag,
  urlAttribute,
  type ResourceElement,
} from "./html.js";
import type { FetchResourceFn, PageItemInfo } from "./resources.js";

export interface ResourcePart {
  contentId: string;
  content: Buffer;
  contentType: string;
  filename: string;
}

export interface RewriteOptions {
  /** Only URLs under this prefix are rewritten, e.g. "https://graph.microsoft.com/". */
  resourceHost: string;
  fetchResource: FetchResourceFn;
  /** Number of the first content id. Default 1. */
  firstPartIndex?: number;
}

export interface RewriteResult {
  html: string;
  parts: ResourcePart[];
}

interface Candidate {
  element: ResourceElement;
  info: PageItemInfo;
}

interface PlannedRewrite {
  element: ResourceElement;
  attribute: "src" | "data";
  value: string;
}

function collectCandidates(elements: ResourceElement[], resourceHost: string): Candidate[] {
  const candidates: Candidate[] = [];
  for (const element of elements) {
    const tag = resourceTag(element);
    if (!tag) continue;
    const url = element.getAttribute(urlAttribute(tag)) ?? "";
    if (!url.startsWith(resourceHost)) continue;

    const pageItemId = extractPageItemId(url);
    if (!pageItemId) {
      console.warn(`[pages] could not extract resource id from ${tag} URL, leaving it as is: ${url}`);
      continue;
    }
    candidates.push({
      element,
      info: { tagName: tag, pageItemId, attributes: attributeMap(element), originalUrl: url },
    });
  }
  return candidates;
}

function applyRewrite(plan: PlannedRewrite): void {
  const names = Array.from(plan.element.attributes).map((attr) => attr.name);
  for (const name of names) {
    plan.element.removeAttribute(name);
  }
  plan.element.setAttribute(plan.attribute, plan.value);
}

export async function rewriteEmbeddedResources(
  html: string,
  pageId: string,
  options: RewriteOptions,
): Promise<RewriteResult> {
  const page = parsePageHtml(html);
  const candidates = collectCandidates(page.resourceElements(), options.resourceHost);
  if (candidates.length === 0) {
    return { html, parts: [] };
  }

  let next = options.firstPartIndex ?? 1;
  const parts: ResourcePart[] = [];
  const plan: PlannedRewrite[] = [];

  for (const { element, info } of candidates) {
    try {
      const data = await options.fetchResource(pageId, info.pageItemId, info);
      const contentId = `part${next++}`;
      parts.push({
        contentId,
        content: data.content,
        contentType: data.contentType,
        filename: data.filename,
      });
      plan.push({ element, attribute: urlAttribute(info.tagName), value: `name:${contentId}` });
    } catch (error) {
      console.warn(`[pages] failed to fetch resource ${info.pageItemId}, leaving reference as is: ${errorMessage(error)}`);
    }
  }

  if (plan.length === 0) {
    return { html, parts: [] };
  }

  plan.forEach(applyRewrite);
  console.log(`[pages] rewrote ${plan.length} embedded resource reference(s)`);
  return { html: page.render(), parts };
}
