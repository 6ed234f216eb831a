import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { rewriteEmbeddedResources } from "./rewriter.js";
import type { FetchResourceFn, PageItemData } from "./resources.js";

const HOST = "https://graph.microsoft.com/";
const resourceUrl = (id: string) => `https://graph.microsoft.com/v1.0/me/onenote/resources/${id}/$value`;

function itemData(id: string, contentType: string): PageItemData {
  return {
    contentType,
    filename: `${id}.bin`,
    size: 4,
    content: Buffer.from(`data-${id}`),
    tagName: "img",
    attributes: {},
    originalUrl: resourceUrl(id),
  };
}

describe("rewriteEmbeddedResources", () => {
  let fetchResource: Mock<FetchResourceFn>;

  beforeEach(() => {
    fetchResource = vi.fn<FetchResourceFn>(async (_pageId, resourceId) => itemData(resourceId, "image/png"));
  });

  it("replaces each resource reference with a sequential part name", async () => {
    const html =
      `<p>Hello</p>` +
      `<img src="${resourceUrl("0-AA!1")}" width="320" data-src-type="image/png">` +
      `<img src="${resourceUrl("0-BB!2")}">` +
      `<object data="${resourceUrl("0-CC!3")}" type="application/pdf" data-attachment="true"></object>`;

    const result = await rewriteEmbeddedResources(html, "0-PAGE!1", { resourceHost: HOST, fetchResource });

    expect(result.html.match(/name:part\d+/g)).toEqual(["name:part1", "name:part2", "name:part3"]);
    expect(result.parts.map((p) => p.contentId)).toEqual(["part1", "part2", "part3"]);
    expect(result.html).toContain("<p>Hello</p>");
    expect(result.html).toContain('<object data="name:part3"></object>');
    expect(result.html).not.toContain("width=");
    expect(result.html).not.toContain("data-attachment");
    expect(result.html).not.toContain("<body>");
    expect(fetchResource).toHaveBeenCalledTimes(3);
  });

  it("carries the fetched bytes and metadata into the parts", async () => {
    fetchResource.mockImplementation(async (_pageId, resourceId) => ({
      ...itemData(resourceId, "application/pdf"),
      filename: `${resourceId}.pdf`,
    }));

    const result = await rewriteEmbeddedResources(
      `<object data="${resourceUrl("0-CC!3")}" type="application/pdf"></object>`,
      "0-PAGE!1",
      { resourceHost: HOST, fetchResource },
    );

    expect(result.parts).toEqual([
      {
        contentId: "part1",
        content: Buffer.from("data-0-CC!3"),
        contentType: "application/pdf",
        filename: "0-CC!3.pdf",
      },
    ]);
  });

  it("passes the element metadata to the fetcher", async () => {
    await rewriteEmbeddedResources(
      `<img src="${resourceUrl("0-AA!1")}" width="320" data-src-type="image/jpeg">`,
      "0-PAGE!1",
      { resourceHost: HOST, fetchResource },
    );

    expect(fetchResource).toHaveBeenCalledWith("0-PAGE!1", "0-AA!1", {
      tagName: "img",
      pageItemId: "0-AA!1",
      attributes: { src: resourceUrl("0-AA!1"), width: "320", "data-src-type": "image/jpeg" },
      originalUrl: resourceUrl("0-AA!1"),
    });
  });

  it("returns the input unchanged when there are no resource references", async () => {
    const html = `<p class="x">Plain &amp; simple<br>text</p><img src="https://example.com/cat.png">`;

    const result = await rewriteEmbeddedResources(html, "0-PAGE!1", { resourceHost: HOST, fetchResource });

    expect(result.html).toBe(html);
    expect(result.parts).toEqual([]);
    expect(fetchResource).not.toHaveBeenCalled();
  });

  it("leaves graph URLs without a resource id untouched", async () => {
    const html = `<img src="https://graph.microsoft.com/v1.0/me/onenote/pages/0-X!1">`;

    const result = await rewriteEmbeddedResources(html, "0-PAGE!1", { resourceHost: HOST, fetchResource });

    expect(result.html).toBe(html);
    expect(fetchResource).not.toHaveBeenCalled();
  });

  it("skips a resource whose download fails and keeps numbering the rest", async () => {
    fetchResource.mockImplementation(async (_pageId, resourceId) => {
      if (resourceId === "0-AA!1") throw new Error("HTTP 404");
      return itemData(resourceId, "image/png");
    });
    const html = `<img src="${resourceUrl("0-AA!1")}"><img src="${resourceUrl("0-BB!2")}">`;

    const result = await rewriteEmbeddedResources(html, "0-PAGE!1", { resourceHost: HOST, fetchResource });

    expect(result.parts.map((p) => p.contentId)).toEqual(["part1"]);
    expect(result.html).toContain(`src="${resourceUrl("0-AA!1")}"`);
    expect(result.html).toContain('src="name:part1"');
  });

  it("returns the input unchanged when every download fails", async () => {
    fetchResource.mockRejectedValue(new Error("offline"));
    const html = `<img src="${resourceUrl("0-AA!1")}" alt="x">`;

    const result = await rewriteEmbeddedResources(html, "0-PAGE!1", { resourceHost: HOST, fetchResource });

    expect(result).toEqual({ html, parts: [] });
  });

  it("starts numbering at firstPartIndex", async () => {
    const result = await rewriteEmbeddedResources(`<img src="${resourceUrl("0-AA!1")}">`, "0-PAGE!1", {
      resourceHost: HOST,
      fetchResource,
      firstPartIndex: 3,
    });

    expect(result.parts[0].contentId).toBe("part3");
    expect(result.html).toContain('src="name:part3"');
  });

  it("keeps full documents as documents", async () => {
    const html = `<html><head><title>Notes</title></head><body><img src="${resourceUrl("0-AA!1")}"></body></html>`;

    const result = await rewriteEmbeddedResources(html, "0-PAGE!1", { resourceHost: HOST, fetchResource });

    expect(result.html).toContain("<title>Notes</title>");
    expect(result.html).toContain('src="name:part1"');
  });
});
