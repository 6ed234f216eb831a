/**
 * Page client: content updates and the page-level operations around them.
 *
 * updatePage runs the whole update pipeline: sanitize, validate, guardrail,
 * convert content to HTML, rewrite embedded resources, assemble the
 * multipart body, PATCH.
 */

import type { GraphConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import { sanitizeId } from "../graph/sanitize.js";
import { ensureSuccess, parseJsonBody, type Transport } from "../graph/transport.js";
import { logContent } from "../logger.js";
import { convertToHtml, escapeHtml } from "./content-format.js";
import { validateDisplayName } from "./display-name.js";
import { parseUpdateCommands, serializeCommands, type UpdateCommand } from "./commands.js";
import { assembleUpdatePayload } from "./multipart.js";
import {
  createResourceFetcher,
  findPageItems,
  summarizePageItem,
  type FetchResourceFn,
  type PageItemData,
  type PageItemSummary,
} from "./resources.js";
import { rewriteEmbeddedResources, type ResourcePart } from "./rewriter.js";
import { validateTableUpdates } from "./table-guardrail.js";

export interface PageClientOptions {
  transport: Transport;
  graph: Pick<GraphConfig, "base_url">;
  /** Log page HTML and command JSON at debug level. */
  logContent?: boolean;
  /** Override resource retrieval. Defaults to the Graph resource endpoint. */
  fetchResource?: FetchResourceFn;
}

export interface UpdatePageResult {
  commandCount: number;
  resourceParts: number;
}

export interface GetPageContentOptions {
  /** Ask for generated element ids, which update commands target. */
  forUpdate?: boolean;
}

export interface PageClient {
  updatePage(pageId: string, commands: readonly UpdateCommand[]): Promise<UpdatePageResult>;
  updatePageSimple(pageId: string, content: string): Promise<UpdatePageResult>;
  getPageContent(pageId: string, options?: GetPageContentOptions): Promise<string>;
  createPage(sectionId: string, title: string, html: string): Promise<Record<string, unknown>>;
  deletePage(pageId: string): Promise<void>;
  listPageItems(pageId: string): Promise<PageItemSummary[]>;
  getPageItem(pageId: string, pageItemId: string): Promise<PageItemData>;
}

export function wrapPageHtml(title: string, html: string): string {
  if (html.toLowerCase().includes("<title>")) {
    return html;
  }
  return `<html><head><title>${escapeHtml(title)}</title></head><body>${html}</body></html>`;
}

export function createPageClient(options: PageClientOptions): PageClient {
  const { transport, graph } = options;
  const base = graph.base_url;
  const resourceHost = `${new URL(base).origin}/`;
  const fetchResource = options.fetchResource ?? createResourceFetcher(transport, graph);
  const showContent = options.logContent ?? false;

  async function getPageContent(pageId: string, opts: GetPageContentOptions = {}): Promise<string> {
    const id = sanitizeId(pageId, "pageID");
    const query = opts.forUpdate ? "?includeIDs=true" : "";
    const response = await transport.request("GET", `${base}/me/onenote/pages/${id}/content${query}`);
    ensureSuccess(response, "GetPageContent");
    const html = response.body.toString("utf-8");
    logContent(showContent, `page ${id} content`, html);
    return html;
  }

  async function updatePage(pageId: string, commands: readonly UpdateCommand[]): Promise<UpdatePageResult> {
    const id = sanitizeId(pageId, "pageID");
    if (commands.length === 0) {
      throw new ValidationError("commands cannot be empty");
    }
    const checked = parseUpdateCommands(commands);
    validateTableUpdates(checked);

    const rewritten: UpdateCommand[] = [];
    const parts: ResourcePart[] = [];
    for (const command of checked) {
      if (!command.content) {
        rewritten.push({ ...command });
        continue;
      }
      const converted = convertToHtml(command.content);
      if (converted.format !== "html") {
        console.debug(`[pages] ${command.action} ${command.target}: converted ${converted.format} content to HTML`);
      }
      const result = await rewriteEmbeddedResources(converted.html, id, {
        resourceHost,
        fetchResource,
        firstPartIndex: parts.length + 1,
      });
      parts.push(...result.parts);
      rewritten.push({ ...command, content: result.html });
    }

    logContent(showContent, `update commands for page ${id}`, serializeCommands(rewritten));

    const payload = await assembleUpdatePayload(rewritten, parts);
    const response = await transport.request("PATCH", `${base}/me/onenote/pages/${id}/content`, payload.body, {
      "Content-Type": payload.contentType,
    });
    ensureSuccess(response, "UpdatePageContent");

    console.log(`[pages] updated page ${id}: ${rewritten.length} command(s), ${parts.length} resource part(s)`);
    return { commandCount: rewritten.length, resourceParts: parts.length };
  }

  return {
    updatePage,

    updatePageSimple(pageId, content) {
      return updatePage(pageId, [{ target: "body", action: "replace", content }]);
    },

    getPageContent,

    async createPage(sectionId, title, html) {
      const id = sanitizeId(sectionId, "sectionID");
      validateDisplayName(title, "title");
      const content = wrapPageHtml(title, convertToHtml(html).html);
      logContent(showContent, `new page in section ${id}`, content);

      const response = await transport.request("POST", `${base}/me/onenote/sections/${id}/pages`, content, {
        "Content-Type": "application/xhtml+xml",
      });
      ensureSuccess(response, "CreatePage");
      const page = parseJsonBody(response, "CreatePage");
      console.log(`[pages] created page ${typeof page.id === "string" ? page.id : "(no id)"} in section ${id}`);
      return page;
    },

    async deletePage(pageId) {
      const id = sanitizeId(pageId, "pageID");
      const response = await transport.request("DELETE", `${base}/me/onenote/pages/${id}`);
      ensureSuccess(response, "DeletePage");
      console.log(`[pages] deleted page ${id}`);
    },

    async listPageItems(pageId) {
      const html = await getPageContent(pageId);
      return findPageItems(html).map(summarizePageItem);
    },

    async getPageItem(pageId, pageItemId) {
      const itemId = sanitizeId(pageItemId, "pageItemID");
      const html = await getPageContent(pageId);
      const info = findPageItems(html).find((item) => item.pageItemId === itemId);
      return fetchResource(pageId, itemId, info);
    },
  };
}
